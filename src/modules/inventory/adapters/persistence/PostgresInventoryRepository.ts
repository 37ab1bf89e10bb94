import type { Pool, PoolClient } from 'pg';
import type { IInventoryRepository } from '../../application/ports/IInventoryRepository';
import type { RowsAffected, VersionedSnapshot } from '../../application/ports/IVersionedStore';
import type { InventoryRecord } from '../../domain/entities/InventoryRecord';
import { inventoryToDomain, inventoryToRow, snapshotToDomain } from './mappers/inventoryMapper';
import { InfrastructureError } from '../../../../domain/errors/InfrastructureError';
import { InventoryRecordAlreadyExistsError } from '../../../../domain/errors/InventoryRecordAlreadyExistsError';
import { logger } from '../../../../shared/logger';

const UNIQUE_VIOLATION = '23505';

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * PostgreSQL implementation of IInventoryRepository using node-postgres.
 *
 * **Compare-and-set:**
 * ```sql
 * UPDATE inventory_records SET quantity = $2, version = $3 + 1, updated_at = now()
 *  WHERE id = $1 AND version = $3
 * ```
 * runs inside BEGIN/COMMIT on a dedicated pool client. The row lock taken by
 * the UPDATE serializes competing writers: the loser re-evaluates
 * `version = $3` against the committed row, matches nothing, and reports
 * rowCount 0.
 *
 * **Error Handling:**
 * - Duplicate id on create → InventoryRecordAlreadyExistsError
 * - Any other driver failure → InfrastructureError (original error as `cause`)
 * - A failed compare-and-set transaction is rolled back before the error is raised
 */
export class PostgresInventoryRepository implements IInventoryRepository {
  public constructor(private readonly pool: Pool) {}

  /**
   * Creates the inventory table if it does not exist
   */
  public async ensureSchema(): Promise<void> {
    await this.query('create inventory schema', () =>
      this.pool.query(`
        CREATE TABLE IF NOT EXISTS inventory_records (
          id TEXT PRIMARY KEY,
          quantity BIGINT NOT NULL CHECK (quantity >= 0),
          version BIGINT NOT NULL DEFAULT 0 CHECK (version >= 0),
          created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
          updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
        )
      `)
    );
  }

  public async create(record: InventoryRecord): Promise<InventoryRecord> {
    const row = inventoryToRow(record);

    try {
      const result = await this.pool.query(
        `INSERT INTO inventory_records (id, quantity, version, created_at, updated_at)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING id, quantity, version, created_at, updated_at`,
        [row.id, row.quantity, row.version, row.created_at, row.updated_at]
      );
      return inventoryToDomain(result.rows[0]);
    } catch (error) {
      if (hasErrorCode(error, UNIQUE_VIOLATION)) {
        throw new InventoryRecordAlreadyExistsError(record.id);
      }
      if (error instanceof InfrastructureError) {
        throw error;
      }
      throw new InfrastructureError(`Failed to create inventory record ${record.id}`, {
        cause: error,
      });
    }
  }

  public async findById(id: string): Promise<InventoryRecord | null> {
    const result = await this.query(`find inventory record ${id}`, () =>
      this.pool.query(
        'SELECT id, quantity, version, created_at, updated_at FROM inventory_records WHERE id = $1',
        [id]
      )
    );

    const row: unknown = result.rows[0];
    return row === undefined ? null : inventoryToDomain(row);
  }

  public async read(id: string): Promise<VersionedSnapshot | null> {
    const result = await this.query(`read inventory record ${id}`, () =>
      this.pool.query('SELECT quantity, version FROM inventory_records WHERE id = $1', [id])
    );

    const row: unknown = result.rows[0];
    return row === undefined ? null : snapshotToDomain(row);
  }

  public async compareAndSet(
    id: string,
    newQuantity: number,
    expectedVersion: number
  ): Promise<RowsAffected> {
    const client = await this.query('acquire connection', () => this.pool.connect());

    let releaseError: Error | undefined;
    try {
      await client.query('BEGIN');
      const result = await client.query(
        `UPDATE inventory_records
            SET quantity = $2, version = $3 + 1, updated_at = now()
          WHERE id = $1 AND version = $3`,
        [id, newQuantity, expectedVersion]
      );
      await client.query('COMMIT');

      return result.rowCount === 1 ? 1 : 0;
    } catch (error) {
      releaseError = await this.rollback(client, id);
      throw new InfrastructureError(`Failed to compare-and-set inventory record ${id}`, {
        cause: error,
      });
    } finally {
      // Destroy the connection instead of pooling it when ROLLBACK failed
      client.release(releaseError);
    }
  }

  private async rollback(client: PoolClient, id: string): Promise<Error | undefined> {
    try {
      await client.query('ROLLBACK');
      return undefined;
    } catch (rollbackError) {
      logger.error({
        msg: 'Rollback failed after compare-and-set error',
        recordId: id,
        error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError),
      });
      return rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
    }
  }

  private async query<T>(description: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      throw new InfrastructureError(`Failed to ${description}`, { cause: error });
    }
  }
}
