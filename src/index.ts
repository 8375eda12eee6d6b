/**
 * Root entrypoint: re-exports the Gamma client, the generic request pipeline, types, and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

/**
 * Typed client for the Gamma metadata API, and its production host.
 */
export { DEFAULT_HOST, GammaClient, type GammaClientProps } from './gamma/client.js';

/**
 * Declarative endpoint table backing {@link GammaClient}.
 */
export { gammaEndpoints } from './gamma/endpoints.js';

/**
 * Resource and request shapes, as types and as the zod schemas that decode them.
 */
export * from './gamma/schemas.js';

/**
 * Generic pipeline: builds, sends and decodes requests for any {@link EndpointDefinition}.
 */
export { RequestClient, type RequestClientProps } from './core/client.js';

/**
 * Shape of endpoint definitions consumed by {@link RequestClient}.
 */
export type { EndpointDefinition, EndpointDefinitions, EndpointParams, EndpointResponse } from './core/types.js';

/**
 * Environment variable naming the default log level.
 */
export { LOG_LEVEL_ENV } from './core/config.js';

/**
 * Default fetch-based transport.
 */
export { DEFAULT_USER_AGENT, FetchClient, type FetchClientOptions } from './fetch/client.js';

/**
 * Request-level types shared by the client and transports.
 */
export type {
  FetchClientProvider,
  FetchClientProviderDefinition,
  HeaderOptions,
  HttpMethod,
  RequestDescriptor,
  RequestOptions,
} from './types/request.js';

/**
 * pino-based logger factory used for request diagnostics.
 */
export { createLogger, type Logger, type LoggerOptions, type LogLevel } from './utils/logger.js';

/**
 * Error-first tuple results returned by every call.
 */
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';

/**
 * Error taxonomy and helpers.
 */
export * from './error/index.js';
