import { GammaError } from './gammaError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when the client is given configuration it cannot use: a host that is
 * not an absolute URL, an unknown log level, or request input that cannot be turned
 * into a URL.
 */
export class ConfigurationError extends GammaError {
  /** ConfigurationError error-name */
  static name = 'ConfigurationError';
  readonly kind = 'configuration';
  /** The rejected value */
  #value: string;

  /** Creates a new instance of a ConfigurationError with the offending input */
  constructor(message: string, value: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#value = value;
  }

  /** Host, URL template or setting that could not be used */
  get value(): string {
    return this.#value;
  }
}

/**
 * Extract a {@link ConfigurationError} from an unknown error value, following nested causes.
 */
export function getConfigurationError(error: unknown): null | ConfigurationError {
  return unwrapErrorType(ConfigurationError, error);
}

/**
 * Type guard for {@link ConfigurationError}.
 */
export function isConfigurationError(error: unknown): error is ConfigurationError {
  return isErrorType(ConfigurationError, error);
}
