import { DomainError } from './DomainError';

/**
 * Thrown when an argument is malformed before any store call is made
 *
 * `details` names the offending values, e.g. `{ maxAttempts: 0 }`.
 */
export class ValidationError extends DomainError {
  public readonly details: Readonly<Record<string, unknown>>;

  public constructor(message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.details = details;
  }
}
