/** Discriminant carried by every error the client returns. */
export type GammaErrorKind = 'configuration' | 'transport' | 'status' | 'decode';

/**
 * Base of the client's error taxonomy. Callers switch on `kind` to tell client bugs
 * (`configuration`, `decode`) from missing resources (`status` 404) and transient
 * network failures (`transport`).
 */
export abstract class GammaError extends Error {
  /** GammaError error-name */
  static name = 'GammaError';
  /** Which branch of the taxonomy this error belongs to */
  abstract readonly kind: GammaErrorKind;
}
