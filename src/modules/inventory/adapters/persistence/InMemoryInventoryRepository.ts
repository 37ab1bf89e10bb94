import { setImmediate as yieldToEventLoop } from 'timers/promises';
import type { IInventoryRepository } from '../../application/ports/IInventoryRepository';
import type { RowsAffected, VersionedSnapshot } from '../../application/ports/IVersionedStore';
import { InventoryRecord } from '../../domain/entities/InventoryRecord';
import { InventoryRecordAlreadyExistsError } from '../../../../domain/errors/InventoryRecordAlreadyExistsError';
import { InfrastructureError } from '../../../../domain/errors/InfrastructureError';

/**
 * Map-backed implementation of IInventoryRepository.
 *
 * Every call yields to the event loop before touching the map, so concurrent
 * callers interleave the way they would against a remote store. The check and
 * the write of compareAndSet run in one synchronous step after that yield,
 * which makes them atomic with respect to other callers.
 *
 * Negative quantities are refused with InfrastructureError, as the SQL stores'
 * CHECK constraint does.
 */
export class InMemoryInventoryRepository implements IInventoryRepository {
  private readonly records = new Map<string, InventoryRecord>();

  public async create(record: InventoryRecord): Promise<InventoryRecord> {
    await yieldToEventLoop();

    if (this.records.has(record.id)) {
      throw new InventoryRecordAlreadyExistsError(record.id);
    }
    assertNonNegative(record.id, record.quantity);
    this.records.set(record.id, record);
    return record;
  }

  public async findById(id: string): Promise<InventoryRecord | null> {
    await yieldToEventLoop();
    return this.records.get(id) ?? null;
  }

  public async read(id: string): Promise<VersionedSnapshot | null> {
    await yieldToEventLoop();
    return this.records.get(id)?.toSnapshot() ?? null;
  }

  public async compareAndSet(
    id: string,
    newQuantity: number,
    expectedVersion: number
  ): Promise<RowsAffected> {
    await yieldToEventLoop();

    const current = this.records.get(id);
    if (!current || current.version !== expectedVersion) {
      return 0;
    }
    assertNonNegative(id, newQuantity);
    this.records.set(id, current.commit(newQuantity));
    return 1;
  }
}

function assertNonNegative(id: string, quantity: number): void {
  if (quantity < 0) {
    throw new InfrastructureError(
      `Inventory record ${id} rejected: quantity ${quantity} violates quantity >= 0`
    );
  }
}
