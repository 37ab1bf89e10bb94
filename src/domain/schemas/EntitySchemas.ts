import { z } from 'zod';
import { DateTime } from 'luxon';

/**
 * Domain Entity Schemas
 *
 * Zod schemas describing entity properties with domain-specific types
 * (Luxon DateTime instead of JavaScript Date).
 *
 * Validation Strategy:
 * - Runtime validation: Performed at adapter boundaries (API, Repository)
 * - Type derivation: Used in domain layer via z.infer<typeof Schema>
 * - Domain constructors: Trust input (already validated at adapters)
 */

/**
 * Custom Zod schema for Luxon DateTime instances
 */
const DateTimeSchema = z.custom<DateTime>((val) => val instanceof DateTime, {
  message: 'Must be a Luxon DateTime instance',
});

/**
 * Zod schema for InventoryRecord entity properties
 *
 * - quantity: never negative for a committed record
 * - version: starts at 0 and grows by exactly 1 per committed write
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const InventoryRecordPropsSchema = z.object({
  id: z.string().min(1),
  quantity: z.number().int().nonnegative().safe(),
  version: z.number().int().nonnegative().safe(),
  createdAt: DateTimeSchema,
  updatedAt: DateTimeSchema,
});

export type InventoryRecordProps = z.infer<typeof InventoryRecordPropsSchema>;
