import { DomainError } from './DomainError';

/**
 * Thrown when provisioning a record whose id is already taken
 */
export class InventoryRecordAlreadyExistsError extends DomainError {
  public constructor(recordId: string) {
    super(`Inventory record already exists: ${recordId}`);
  }
}
