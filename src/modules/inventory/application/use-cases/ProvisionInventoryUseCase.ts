import { randomUUID } from 'crypto';
import { ProvisionInventoryDTO, ProvisionInventorySchema } from '../../../../shared/validation/schemas';
import type { IInventoryRepository } from '../ports/IInventoryRepository';
import { InventoryRecord } from '../../domain/entities/InventoryRecord';
import { logger } from '../../../../shared/logger';

/**
 * ProvisionInventoryUseCase - Creates a new inventory record at version 0
 *
 * Provisioning is the only way a record comes into existence; afterwards it is
 * changed exclusively through AdjustInventoryUseCase.
 */
export class ProvisionInventoryUseCase {
  public constructor(private readonly inventoryRepository: IInventoryRepository) {}

  /**
   * @param dto - Initial quantity and optional id
   * @returns The stored record
   * @throws ZodError if input validation fails
   * @throws InventoryRecordAlreadyExistsError if the id is taken
   * @throws InfrastructureError if the store fails
   */
  public async execute(dto: ProvisionInventoryDTO): Promise<InventoryRecord> {
    const validatedDto = ProvisionInventorySchema.parse(dto);

    const record = InventoryRecord.provision(validatedDto.id ?? randomUUID(), validatedDto.quantity);
    const saved = await this.inventoryRepository.create(record);

    logger.info({
      msg: 'Inventory record provisioned',
      recordId: saved.id,
      quantity: saved.quantity,
    });

    return saved;
  }
}
