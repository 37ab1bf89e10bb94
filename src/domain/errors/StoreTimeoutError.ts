import { InfrastructureError } from './InfrastructureError';

/**
 * Thrown when a store call does not settle before its deadline.
 *
 * The outcome of a timed-out write is unknown, so callers must not retry it
 * blindly.
 */
export class StoreTimeoutError extends InfrastructureError {
  public readonly operation: string;
  public readonly timeoutMs: number;

  public constructor(operation: string, timeoutMs: number) {
    super(`Store operation ${operation} timed out after ${timeoutMs}ms`);
    this.name = 'StoreTimeoutError';
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}
