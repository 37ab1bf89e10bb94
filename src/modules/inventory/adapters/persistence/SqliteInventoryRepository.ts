import Database from 'better-sqlite3';
import type { IInventoryRepository } from '../../application/ports/IInventoryRepository';
import type { RowsAffected, VersionedSnapshot } from '../../application/ports/IVersionedStore';
import type { InventoryRecord } from '../../domain/entities/InventoryRecord';
import { inventoryToDomain, inventoryToRow, snapshotToDomain } from './mappers/inventoryMapper';
import { InfrastructureError } from '../../../../domain/errors/InfrastructureError';
import { InventoryRecordAlreadyExistsError } from '../../../../domain/errors/InventoryRecordAlreadyExistsError';

const CREATE_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS inventory_records (
    id TEXT PRIMARY KEY,
    quantity INTEGER NOT NULL CHECK (quantity >= 0),
    version INTEGER NOT NULL DEFAULT 0 CHECK (version >= 0),
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )
`;

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * SQLite implementation of IInventoryRepository using better-sqlite3.
 *
 * better-sqlite3 is synchronous, so each statement runs to completion inside
 * one event-loop turn. compareAndSet still runs in an IMMEDIATE transaction so
 * that the version check and the write hold the database write lock together
 * when several processes share one file.
 */
export class SqliteInventoryRepository implements IInventoryRepository {
  private readonly compareAndSetTx: (
    id: string,
    newQuantity: number,
    expectedVersion: number,
    updatedAt: string
  ) => number;

  public constructor(private readonly db: Database.Database) {
    db.exec(CREATE_TABLE_SQL);

    const update = db.prepare(
      `UPDATE inventory_records
         SET quantity = ?, version = version + 1, updated_at = ?
       WHERE id = ? AND version = ?`
    );
    const transaction = db.transaction(
      (id: string, newQuantity: number, expectedVersion: number, updatedAt: string): number =>
        update.run(newQuantity, updatedAt, id, expectedVersion).changes
    );
    this.compareAndSetTx = (id, newQuantity, expectedVersion, updatedAt) =>
      transaction.immediate(id, newQuantity, expectedVersion, updatedAt);
  }

  /**
   * Opens a database file (or an in-memory database) with the table in place
   *
   * @param filename - Path to the database file; ':memory:' by default
   */
  public static open(filename = ':memory:'): SqliteInventoryRepository {
    const db = new Database(filename);
    db.pragma('journal_mode = WAL');
    return new SqliteInventoryRepository(db);
  }

  public async create(record: InventoryRecord): Promise<InventoryRecord> {
    const row = inventoryToRow(record);

    try {
      this.db
        .prepare(
          `INSERT INTO inventory_records (id, quantity, version, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?)`
        )
        .run(row.id, row.quantity, row.version, row.created_at, row.updated_at);
    } catch (error) {
      if (hasErrorCode(error, 'SQLITE_CONSTRAINT_PRIMARYKEY')) {
        throw new InventoryRecordAlreadyExistsError(record.id);
      }
      throw new InfrastructureError(`Failed to create inventory record ${record.id}`, {
        cause: error,
      });
    }

    return record;
  }

  public async findById(id: string): Promise<InventoryRecord | null> {
    const row = this.run(`find inventory record ${id}`, () =>
      this.db
        .prepare(
          'SELECT id, quantity, version, created_at, updated_at FROM inventory_records WHERE id = ?'
        )
        .get(id)
    );

    return row === undefined ? null : inventoryToDomain(row);
  }

  public async read(id: string): Promise<VersionedSnapshot | null> {
    const row = this.run(`read inventory record ${id}`, () =>
      this.db.prepare('SELECT quantity, version FROM inventory_records WHERE id = ?').get(id)
    );

    return row === undefined ? null : snapshotToDomain(row);
  }

  public async compareAndSet(
    id: string,
    newQuantity: number,
    expectedVersion: number
  ): Promise<RowsAffected> {
    const changes = this.run(`compare-and-set inventory record ${id}`, () =>
      this.compareAndSetTx(id, newQuantity, expectedVersion, new Date().toISOString())
    );

    return changes === 1 ? 1 : 0;
  }

  public close(): void {
    this.db.close();
  }

  private run<T>(description: string, statement: () => T): T {
    try {
      return statement();
    } catch (error) {
      throw new InfrastructureError(`Failed to ${description}`, { cause: error });
    }
  }
}
