import { DomainError } from './DomainError';

/**
 * InventoryRecordNotFoundError - Application-level error for missing records
 *
 * **HTTP Status:** 404 Not Found
 *
 * **Usage:**
 * ```typescript
 * const record = await repository.findById(recordId);
 * if (!record) {
 *   throw new InventoryRecordNotFoundError(recordId);
 * }
 * ```
 */
export class InventoryRecordNotFoundError extends DomainError {
  public constructor(public readonly recordId: string) {
    super(`Inventory record not found: ${recordId}`);
  }
}
