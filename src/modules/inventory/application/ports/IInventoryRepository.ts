import type { InventoryRecord } from '../../domain/entities/InventoryRecord';
import type { IVersionedStore } from './IVersionedStore';

/**
 * Repository interface for inventory persistence.
 *
 * Extends the versioned-store contract with provisioning and lookup, which
 * the HTTP adapter and the demo need but the optimistic updater does not.
 */
/* eslint-disable @typescript-eslint/naming-convention */
export interface IInventoryRepository extends IVersionedStore {
  /**
   * Provisions a new record.
   *
   * @param record - Record to insert, normally at version 0
   * @returns The stored record
   * @throws InventoryRecordAlreadyExistsError if the id is taken
   * @throws InfrastructureError if the store fails
   */
  create(record: InventoryRecord): Promise<InventoryRecord>;

  /**
   * Finds a record by id.
   *
   * @returns The record, or null when absent
   */
  findById(id: string): Promise<InventoryRecord | null>;
}
