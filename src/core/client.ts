import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ConfigurationError } from '../error/configurationError.js';
import { DecodeError } from '../error/decodeError.js';
import type { GammaClientError } from '../error/index.js';
import { NOT_FOUND_MESSAGE, StatusError } from '../error/statusError.js';
import { FetchClient } from '../fetch/client.js';
import type {
  FetchClientProvider,
  FetchClientProviderDefinition,
  HeaderOptions,
  RequestDescriptor,
  RequestOptions,
} from '../types/request.js';
import { constructUrl } from '../utils/constructUrl.js';
import { getResponseData, getResponseText } from '../utils/getResponseData.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { validator } from '../utils/validator.js';
import { type SafeWrapAsync, safeWrap } from '../utils/wrap.js';
import { resolveLogLevel } from './config.js';
import type { EndpointDefinition, EndpointParams } from './types.js';

/** Configuration for constructing a {@link RequestClient}. */
export interface RequestClientProps {
  /** Absolute base URL of the API (e.g. `https://api.example.com`). */
  host: string;
  /** Default headers layered over the built-in ones; `null` removes a built-in header. */
  headers?: HeaderOptions;
  /** Value of the `User-Agent` header. */
  userAgent?: string;
  /**
   * Logger receiving request diagnostics.
   * Defaults to a pino logger at the level given by `GAMMA_LOG_LEVEL`, silent when unset or not a level.
   */
  logger?: Logger;
  /** HTTP transport implementation. Defaults to {@link FetchClient}. */
  fetchProvider?: FetchClientProvider;
}

/**
 * HTTP client that:
 * - builds request descriptors from declarative {@link EndpointDefinition}s,
 * - executes them over a pluggable transport,
 * - classifies the outcome and decodes the JSON body through the endpoint's response schema.
 *
 * Immutable once constructed, so a single instance can serve any number of concurrent calls.
 * All request methods return error-first tuples via {@link SafeWrapAsync}; nothing is retried.
 */
export class RequestClient {
  /** Underlying transport instance. */
  #fetchClient: FetchClientProviderDefinition;
  /** Diagnostics sink. */
  #logger: Logger;

  /**
   * @param props - Host, default headers and collaborators.
   * @throws {ConfigurationError} when `host` is not an absolute URL.
   */
  constructor({ host, headers, userAgent, logger, fetchProvider = FetchClient }: RequestClientProps) {
    const [errHost, url] = safeWrap(() => new URL(host));
    if (errHost) {
      throw new ConfigurationError(`error parsing host ${host}`, host, { cause: errHost });
    }

    this.#logger = logger ?? RequestClient.#defaultLogger();
    this.#fetchClient = new fetchProvider(url, { headers, userAgent });
  }

  static #defaultLogger(): Logger {
    const [errLevel, level] = resolveLogLevel();
    if (errLevel) {
      return createLogger({ level: 'silent' });
    }

    return createLogger({ level });
  }

  /**
   * Normalized base host, its path always ending with `/`. Returned as a copy.
   */
  get host(): URL {
    return this.#fetchClient.host;
  }

  /**
   * Builds the descriptor for one call to an endpoint without sending it.
   *
   * @returns `[ConfigurationError, null]` when the params fail their schemas or leave a placeholder unfilled.
   */
  async buildRequest<PathInput, SearchInput, Output>(
    endpoint: EndpointDefinition<PathInput, SearchInput, Output>,
    params: EndpointParams<PathInput, SearchInput> = {},
  ): SafeWrapAsync<ConfigurationError, RequestDescriptor> {
    const [errUrl, relative] = await constructUrl(endpoint.path, params, endpoint);
    if (errUrl) {
      return [errUrl, null];
    }

    return [null, { method: endpoint.method, url: this.#fetchClient.url(relative) }];
  }

  /**
   * Calls an endpoint: builds its request from `params`, then runs it through {@link RequestClient.execute}
   * with the endpoint's response schema.
   *
   * @param opts - `headers` replace the default headers for this call.
   * @returns A promise resolving to `[error, data]`.
   */
  async request<PathInput, SearchInput, Output>(
    endpoint: EndpointDefinition<PathInput, SearchInput, Output>,
    params: EndpointParams<PathInput, SearchInput> = {},
    opts: RequestOptions = {},
  ): SafeWrapAsync<GammaClientError, Output> {
    const [errRequest, request] = await this.buildRequest(endpoint, params);
    if (errRequest) {
      this.#logger.warn({ err: errRequest, endpoint: endpoint.path }, 'Gamma API request could not be built');
      return [errRequest, null];
    }

    return this.execute(request, endpoint.response, opts.headers);
  }

  /**
   * Runs one request/response cycle.
   *
   * - `headers`, when given, fully replace the default headers; they are not merged.
   * - No response from the transport: `TransportError`.
   * - Non-2xx: `StatusError` with the response body text (`''` if it cannot be read).
   * - 2xx with a JSON `null` body: `StatusError` 404 with {@link NOT_FOUND_MESSAGE}.
   *   The API answers "nothing found" this way, so it is reported exactly like an explicit 404.
   * - 2xx whose body is empty, is not JSON or fails `schema`: `DecodeError`.
   *
   * @returns A promise resolving to `[error, data]`, `data` being the schema's output.
   */
  async execute<Output>(
    request: RequestDescriptor,
    schema: StandardSchemaV1<unknown, Output>,
    headers?: HeaderOptions,
  ): SafeWrapAsync<GammaClientError, Output> {
    const { method } = request;
    const path = request.url.pathname;
    const logger = this.#logger.child({ method, path });

    logger.debug('Gamma API request');

    const [errFetch, response] = await this.#fetchClient.execute(request, headers);
    if (errFetch) {
      logger.warn({ err: errFetch }, 'Gamma API request failed in transport');
      return [errFetch, null];
    }

    logger.debug({ status: response.status }, 'Gamma API response');

    if (!response.ok) {
      const body = await getResponseText(response);
      logger.warn({ status: response.status, message: body }, 'Gamma API request failed');
      return [new StatusError(response.status, method, path, body), null];
    }

    const [errBody, data] = await getResponseData(response);
    if (errBody) {
      logger.warn({ err: errBody }, 'Gamma API response body could not be parsed');
      return [new DecodeError('error parsing response body', method, path, [], { cause: errBody }), null];
    }

    if (data === null) {
      logger.warn('Gamma API resource not found');
      return [new StatusError(404, method, path, NOT_FOUND_MESSAGE), null];
    }

    const [errValidate, value] = await validator(data, schema);
    if (errValidate) {
      logger.warn({ issues: errValidate.issues }, 'Gamma API response did not match schema');
      return [
        new DecodeError('error validating response body', method, path, errValidate.issues, { cause: errValidate }),
        null,
      ];
    }

    return [null, value];
  }
}
