import { DomainError } from './DomainError';

/**
 * Error thrown when an optimistic locking conflict cannot be resolved.
 * This occurs when every attempt found the record's version advanced by another
 * writer between its read and its compare-and-set.
 */
export class OptimisticLockError extends DomainError {
  public readonly recordId: string;
  public readonly attempts: number;

  public constructor(recordId: string, attempts: number) {
    super(
      `Inventory record ${recordId} was modified by another transaction on each of ${attempts} attempt(s)`
    );
    this.name = 'OptimisticLockError';
    this.recordId = recordId;
    this.attempts = attempts;
  }
}
