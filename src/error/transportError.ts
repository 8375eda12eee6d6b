import type { HttpMethod } from '../types/request.js';
import { GammaError } from './gammaError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when the request never produced an HTTP response (DNS, connection, TLS, abort).
 * The underlying failure is kept as `cause`.
 */
export class TransportError extends GammaError {
  /** TransportError error-name */
  static name = 'TransportError';
  readonly kind = 'transport';
  /** Method of the failed request */
  readonly method: HttpMethod;
  /** URL pathname of the failed request */
  readonly path: string;

  constructor(message: string, method: HttpMethod, path: string, opts?: ErrorOptions) {
    super(message, opts);
    this.method = method;
    this.path = path;
  }
}

/**
 * Extract a {@link TransportError} from an unknown error value, following nested causes.
 */
export function getTransportError(error: unknown): null | TransportError {
  return unwrapErrorType(TransportError, error);
}

/**
 * Type guard for {@link TransportError}.
 */
export function isTransportError(error: unknown): error is TransportError {
  return isErrorType(TransportError, error);
}
