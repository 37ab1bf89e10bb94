import { OutcomeKind, type FailedOutcome } from '../../domain/value-objects/UpdateOutcome';
import { InventoryRecordNotFoundError } from '../../../../domain/errors/InventoryRecordNotFoundError';
import { InsufficientInventoryError } from '../../../../domain/errors/InsufficientInventoryError';
import { OptimisticLockError } from '../../../../domain/errors/OptimisticLockError';

/**
 * Maps a failed outcome to the error a throw-style caller would expect
 *
 * - NotFound → InventoryRecordNotFoundError
 * - InsufficientInventory → InsufficientInventoryError
 * - VersionConflictExhausted → OptimisticLockError
 * - StoreError → the underlying cause
 */
export function outcomeToError(outcome: FailedOutcome): Error {
  switch (outcome.kind) {
    case OutcomeKind.NOT_FOUND:
      return new InventoryRecordNotFoundError(outcome.id);
    case OutcomeKind.INSUFFICIENT_INVENTORY:
      return new InsufficientInventoryError(outcome.id, outcome.delta, outcome.observedQuantity);
    case OutcomeKind.VERSION_CONFLICT_EXHAUSTED:
      return new OptimisticLockError(outcome.id, outcome.attempts);
    case OutcomeKind.STORE_ERROR:
      return outcome.cause;
  }
}
