import { z, ZodError } from 'zod';
import { DateTime } from 'luxon';
import { InventoryRecord } from '../../../domain/entities/InventoryRecord';
import type { VersionedSnapshot } from '../../../application/ports/IVersionedStore';
import { InfrastructureError } from '../../../../../domain/errors/InfrastructureError';

/**
 * Row shape shared by the SQL adapters.
 *
 * `pg` returns BIGINT columns as strings and SQLite stores timestamps as ISO
 * text, so numbers and dates are coerced before validation.
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const InventoryRowSchema = z.object({
  id: z.string().min(1),
  quantity: z.coerce.number().int().nonnegative().safe(),
  version: z.coerce.number().int().nonnegative().safe(),
  created_at: z.coerce.date(),
  updated_at: z.coerce.date(),
});

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const SnapshotRowSchema = InventoryRowSchema.pick({ quantity: true, version: true });

export type InventoryRow = z.infer<typeof InventoryRowSchema>;

function parseRow<T>(parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    if (error instanceof ZodError) {
      throw new InfrastructureError('Malformed inventory row returned by the store', {
        cause: error,
      });
    }
    throw error;
  }
}

/**
 * Converts a database row to a domain InventoryRecord
 * @throws InfrastructureError if the row does not match the table layout
 */
export function inventoryToDomain(row: unknown): InventoryRecord {
  const parsed = parseRow(() => InventoryRowSchema.parse(row));

  return new InventoryRecord({
    id: parsed.id,
    quantity: parsed.quantity,
    version: parsed.version,
    createdAt: DateTime.fromJSDate(parsed.created_at),
    updatedAt: DateTime.fromJSDate(parsed.updated_at),
  });
}

/**
 * Converts a (quantity, version) row to a snapshot
 * @throws InfrastructureError if the row does not match the table layout
 */
export function snapshotToDomain(row: unknown): VersionedSnapshot {
  return parseRow(() => SnapshotRowSchema.parse(row));
}

/**
 * Converts a domain InventoryRecord to column values
 */
export function inventoryToRow(record: InventoryRecord): {
  id: string;
  quantity: number;
  version: number;
  created_at: string;
  updated_at: string;
} {
  return {
    id: record.id,
    quantity: record.quantity,
    version: record.version,
    created_at: toIso(record.createdAt),
    updated_at: toIso(record.updatedAt),
  };
}

function toIso(value: DateTime): string {
  return value.toUTC().toISO() ?? new Date(value.toMillis()).toISOString();
}
