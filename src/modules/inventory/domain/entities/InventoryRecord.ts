import { DateTime } from 'luxon';
import type { InventoryRecordProps } from '../../../../domain/schemas/EntitySchemas';
import type { VersionedSnapshot } from '../../application/ports/IVersionedStore';

/**
 * InventoryRecord entity
 * A single versioned quantity owned by the store. Callers only ever hold
 * snapshots of it; the authoritative copy lives in the repository.
 * Immutable - state change methods return new instances
 */
export class InventoryRecord {
  public readonly id: string;
  public readonly quantity: number;
  public readonly version: number;
  public readonly createdAt: DateTime;
  public readonly updatedAt: DateTime;

  public constructor(props: InventoryRecordProps) {
    this.id = props.id;
    this.quantity = props.quantity;
    this.version = props.version;
    this.createdAt = props.createdAt;
    this.updatedAt = props.updatedAt;
  }

  /**
   * Creates a freshly provisioned record at version 0
   */
  public static provision(id: string, quantity: number, now: DateTime = DateTime.now()): InventoryRecord {
    return new InventoryRecord({
      id,
      quantity,
      version: 0,
      createdAt: now,
      updatedAt: now,
    });
  }

  /**
   * Returns the record as it looks after a committed compare-and-set
   * @param newQuantity The quantity written by the winning attempt
   * @returns A new InventoryRecord one version ahead
   */
  public commit(newQuantity: number, now: DateTime = DateTime.now()): InventoryRecord {
    return new InventoryRecord({
      ...this,
      quantity: newQuantity,
      version: this.version + 1,
      updatedAt: now,
    });
  }

  public toSnapshot(): VersionedSnapshot {
    return { quantity: this.quantity, version: this.version };
  }
}
