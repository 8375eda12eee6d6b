import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { HttpMethod } from '../types/request.js';
import { GammaError } from './gammaError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a 2xx body that is not valid JSON, or that does not match the
 * expected response schema.
 */
export class DecodeError extends GammaError {
  /** DecodeError error-name */
  static name = 'DecodeError';
  readonly kind = 'decode';
  /** Method of the request whose body failed to decode */
  readonly method: HttpMethod;
  /** URL pathname of the request whose body failed to decode */
  readonly path: string;
  /** Schema validation issues, empty when the body was not JSON at all */
  readonly issues: ReadonlyArray<StandardSchemaV1.Issue>;

  constructor(
    message: string,
    method: HttpMethod,
    path: string,
    issues: ReadonlyArray<StandardSchemaV1.Issue> = [],
    opts?: ErrorOptions,
  ) {
    super(`${message} for ${method} ${path}; issues: ${JSON.stringify(issues)}`, opts);
    this.method = method;
    this.path = path;
    this.issues = issues;
  }
}

/**
 * Extracts a {@link DecodeError} from an unknown error value.
 */
export function getDecodeError(error: unknown): null | DecodeError {
  return unwrapErrorType(DecodeError, error);
}

/**
 * Type guard that checks if an error is a {@link DecodeError}.
 */
export function isDecodeError(error: unknown): error is DecodeError {
  return isErrorType(DecodeError, error);
}
