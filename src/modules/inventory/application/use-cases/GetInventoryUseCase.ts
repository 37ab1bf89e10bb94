import type { IInventoryRepository } from '../ports/IInventoryRepository';
import type { InventoryRecord } from '../../domain/entities/InventoryRecord';

/**
 * GetInventoryUseCase - Retrieve an inventory record by id
 *
 * **Returns:**
 * - InventoryRecord if found
 * - null if the record does not exist
 *
 * **Throws:**
 * - InfrastructureError if the store fails
 */
export class GetInventoryUseCase {
  public constructor(private readonly inventoryRepository: IInventoryRepository) {}

  public async execute(recordId: string): Promise<InventoryRecord | null> {
    return await this.inventoryRepository.findById(recordId);
  }
}
