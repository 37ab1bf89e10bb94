import { z } from 'zod';

/**
 * Record identifiers: 1-128 characters of letters, digits, '.', '_', ':' or '-'
 */
const RecordIdSchema = z
  .string()
  .min(1, 'Record id is required')
  .max(128, 'Record id cannot exceed 128 characters')
  .regex(/^[A-Za-z0-9._:-]+$/, 'Record id may only contain letters, digits, ".", "_", ":" and "-"');

/**
 * Zod schema for ProvisionInventory input validation
 *
 * This schema serves as the single source of truth for:
 * - Runtime validation (via schema.parse())
 * - Compile-time types (via z.infer<>)
 * - API request validation (POST /inventory)
 *
 * Validation Rules:
 * - id: optional; a random UUID is assigned when omitted
 * - quantity: required, non-negative safe integer
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const ProvisionInventorySchema = z.object({
  id: RecordIdSchema.optional(),
  quantity: z
    .number()
    .int('Quantity must be an integer')
    .nonnegative('Quantity cannot be negative')
    .safe(),
});

/**
 * TypeScript type derived from ProvisionInventorySchema
 *
 * DO NOT manually define this type - always derive it from the schema using z.infer<>
 */
export type ProvisionInventoryDTO = z.infer<typeof ProvisionInventorySchema>;

/**
 * Zod schema for AdjustInventory input validation
 *
 * Validation Rules:
 * - delta: required, signed safe integer
 * - maxAttempts: optional override of the configured attempt bound, 1-100
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const AdjustInventorySchema = z.object({
  delta: z.number().int('Delta must be an integer').safe(),
  maxAttempts: z.number().int().min(1).max(100).optional(),
});

export type AdjustInventoryDTO = z.infer<typeof AdjustInventorySchema>;

/**
 * Zod schema for URL parameters containing a record id
 *
 * Used by GET /inventory/:id and POST /inventory/:id/adjustments
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const InventoryParamsSchema = z.object({
  id: RecordIdSchema,
});

export type InventoryParams = z.infer<typeof InventoryParamsSchema>;

/**
 * Zod schema for InventoryRecord response serialization
 *
 * Response Fields:
 * - id: record identifier
 * - quantity: non-negative integer
 * - version: committed writes so far
 * - createdAt / updatedAt: ISO 8601 datetime strings
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const InventoryResponseSchema = z.object({
  id: z.string(),
  quantity: z.number().int().nonnegative(),
  version: z.number().int().nonnegative(),
  createdAt: z.string().datetime({ offset: true }),
  updatedAt: z.string().datetime({ offset: true }),
});

export type InventoryResponse = z.infer<typeof InventoryResponseSchema>;

/**
 * Zod schema for a successful adjustment response
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const AdjustmentResponseSchema = z.object({
  id: z.string(),
  quantity: z.number().int().nonnegative(),
  version: z.number().int().positive(),
  attempts: z.number().int().positive(),
});

export type AdjustmentResponse = z.infer<typeof AdjustmentResponseSchema>;
