import { AdjustInventoryDTO, AdjustInventorySchema } from '../../../../shared/validation/schemas';
import type { OptimisticUpdater } from '../services/OptimisticUpdater';
import { OutcomeKind, type UpdateOutcome } from '../../domain/value-objects/UpdateOutcome';
import { logger } from '../../../../shared/logger';

/**
 * AdjustInventoryUseCase
 *
 * **Purpose:**
 * Applies a signed delta to an inventory record through the optimistic updater
 * and records the terminal outcome in the logs.
 *
 * **Logging:**
 *
 * | Outcome | Level |
 * |---------|-------|
 * | Success | info |
 * | InsufficientInventory | info (expected business refusal) |
 * | NotFound | warn |
 * | VersionConflictExhausted | warn |
 * | StoreError | error |
 *
 * The outcome is returned unchanged; translating it into HTTP responses or
 * thrown errors is left to the caller (see outcomeToError).
 */
export class AdjustInventoryUseCase {
  public constructor(private readonly updater: OptimisticUpdater) {}

  /**
   * @param recordId - Record to adjust
   * @param dto - Delta and optional attempt bound
   * @returns Terminal outcome of the update
   * @throws ZodError if input validation fails
   */
  public async execute(recordId: string, dto: AdjustInventoryDTO): Promise<UpdateOutcome> {
    const { delta, maxAttempts } = AdjustInventorySchema.parse(dto);
    const startTime = Date.now();

    const outcome = await this.updater.apply(recordId, delta, maxAttempts);
    const durationMs = Date.now() - startTime;

    switch (outcome.kind) {
      case OutcomeKind.SUCCESS:
        logger.info({
          msg: 'Inventory adjusted',
          recordId,
          delta,
          quantity: outcome.finalQuantity,
          version: outcome.version,
          attempts: outcome.attempts,
          durationMs,
        });
        break;
      case OutcomeKind.INSUFFICIENT_INVENTORY:
        logger.info({
          msg: 'Inventory adjustment refused - quantity would go negative',
          recordId,
          delta,
          observedQuantity: outcome.observedQuantity,
          observedVersion: outcome.observedVersion,
          durationMs,
        });
        break;
      case OutcomeKind.NOT_FOUND:
        logger.warn({ msg: 'Inventory record not found for adjustment', recordId, delta });
        break;
      case OutcomeKind.VERSION_CONFLICT_EXHAUSTED:
        logger.warn({
          msg: 'Inventory adjustment gave up after repeated version conflicts',
          recordId,
          delta,
          attempts: outcome.attempts,
          durationMs,
        });
        break;
      case OutcomeKind.STORE_ERROR:
        logger.error({
          msg: 'Inventory adjustment failed with store error',
          recordId,
          delta,
          operation: outcome.operation,
          error: outcome.cause.message,
          stack: outcome.cause.stack,
          durationMs,
        });
        break;
    }

    return outcome;
  }
}
