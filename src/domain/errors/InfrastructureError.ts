/**
 * InfrastructureError
 *
 * Thrown when infrastructure-level operations fail, including:
 * - Database connection failures
 * - Query or transaction failures reported by the driver
 * - Malformed rows returned by the store
 *
 * This error type allows the application layer to handle store failures
 * without knowing the specific database technology in use. The driver error,
 * when there is one, is kept as `cause`.
 */
export class InfrastructureError extends Error {
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InfrastructureError';

    // Maintains proper stack trace for where error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InfrastructureError);
    }
  }
}
