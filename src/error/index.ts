/**
 * Error entrypoint: exports the client's error taxonomy and helpers for identifying and unwrapping error types.
 * Use this when you only need error utilities without the client.
 * @module
 */

import type { ConfigurationError } from './configurationError.js';
import type { DecodeError } from './decodeError.js';
import type { StatusError } from './statusError.js';
import type { TransportError } from './transportError.js';

/** Error raised for an unusable host, setting or request input. */
export { ConfigurationError, getConfigurationError, isConfigurationError } from './configurationError.js';
/** Error raised when a 2xx body is not JSON or does not match its schema. */
export { DecodeError, getDecodeError, isDecodeError } from './decodeError.js';
/** Abstract base of every error the client returns. */
export { GammaError, type GammaErrorKind } from './gammaError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Error raised for non-2xx responses and for empty successful responses. */
export { getStatusError, isStatusError, NOT_FOUND_MESSAGE, StatusError } from './statusError.js';
/** Error raised when no HTTP response was received. */
export { getTransportError, isTransportError, TransportError } from './transportError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { unwrapErrorType } from './unwrapErrorType.js';
/** Schema validation failure, attached as `cause` by the pipeline. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';

/**
 * Every error a client call can return, discriminated by `kind`.
 */
export type GammaClientError = ConfigurationError | TransportError | StatusError | DecodeError;
