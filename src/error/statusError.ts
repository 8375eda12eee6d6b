import type { HttpMethod } from '../types/request.js';
import { GammaError } from './gammaError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Body text used when a 2xx response carries a JSON `null` payload.
 * Such responses surface as a {@link StatusError} with status 404.
 */
export const NOT_FOUND_MESSAGE = 'Unable to find requested resource';

/**
 * Error representing an HTTP response with a non-2xx status code, or a successful
 * response whose payload was `null` (normalized to 404).
 */
export class StatusError extends GammaError {
  /** StatusError error-name */
  static name = 'StatusError';
  readonly kind = 'status';
  /** HTTP status code */
  readonly status: number;
  /** Method of the failed request */
  readonly method: HttpMethod;
  /** URL pathname of the failed request */
  readonly path: string;
  /** Response body text as sent by the server, or {@link NOT_FOUND_MESSAGE} */
  readonly body: string;

  /** Creates a new StatusError, the message defaulting to a summary of the exchange */
  constructor(status: number, method: HttpMethod, path: string, body: string, opts?: ErrorOptions) {
    super(`error status ${status} for ${method} ${path}${body ? `: ${body}` : ''}`, opts);
    this.status = status;
    this.method = method;
    this.path = path;
    this.body = body;
  }

  /** Whether this error stands for a missing resource */
  get notFound(): boolean {
    return this.status === 404;
  }
}

/**
 * Extracts a {@link StatusError} from an unknown error value.
 */
export function getStatusError(error: unknown): null | StatusError {
  return unwrapErrorType(StatusError, error);
}

/**
 * Type guard that checks if an error is a {@link StatusError}.
 */
export function isStatusError(error: unknown): error is StatusError {
  return isErrorType(StatusError, error);
}
