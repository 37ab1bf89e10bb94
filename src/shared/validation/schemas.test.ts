import {
  AdjustInventorySchema,
  AdjustmentResponseSchema,
  InventoryParamsSchema,
  InventoryResponseSchema,
  ProvisionInventorySchema,
} from './schemas';

describe('Validation Schemas', () => {
  describe('ProvisionInventorySchema', () => {
    it('should accept a quantity with an explicit id', () => {
      const result = ProvisionInventorySchema.safeParse({ id: 'sku-123', quantity: 5 });

      expect(result.success).toBe(true);
    });

    it('should accept a quantity without an id', () => {
      const result = ProvisionInventorySchema.parse({ quantity: 0 });

      expect(result).toEqual({ quantity: 0 });
    });

    it('should reject a negative quantity', () => {
      const result = ProvisionInventorySchema.safeParse({ quantity: -1 });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues[0]?.message).toBe('Quantity cannot be negative');
      }
    });

    it('should reject a fractional quantity', () => {
      const result = ProvisionInventorySchema.safeParse({ quantity: 1.5 });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues[0]?.message).toBe('Quantity must be an integer');
      }
    });

    it('should reject ids with spaces', () => {
      const result = ProvisionInventorySchema.safeParse({ id: 'sku 123', quantity: 1 });

      expect(result.success).toBe(false);
    });
  });

  describe('AdjustInventorySchema', () => {
    it('should accept negative and positive deltas', () => {
      expect(AdjustInventorySchema.safeParse({ delta: -3 }).success).toBe(true);
      expect(AdjustInventorySchema.safeParse({ delta: 3 }).success).toBe(true);
    });

    it('should accept a maxAttempts override', () => {
      expect(AdjustInventorySchema.parse({ delta: 1, maxAttempts: 5 })).toEqual({
        delta: 1,
        maxAttempts: 5,
      });
    });

    it('should reject maxAttempts below 1', () => {
      expect(AdjustInventorySchema.safeParse({ delta: 1, maxAttempts: 0 }).success).toBe(false);
    });

    it('should reject a missing delta', () => {
      const result = AdjustInventorySchema.safeParse({});

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues[0]?.path).toEqual(['delta']);
      }
    });

    it('should reject a delta sent as a string', () => {
      expect(AdjustInventorySchema.safeParse({ delta: '-1' }).success).toBe(false);
    });
  });

  describe('InventoryParamsSchema', () => {
    it('should accept ids with dots, colons and dashes', () => {
      expect(InventoryParamsSchema.parse({ id: 'warehouse:eu.sku-1' })).toEqual({
        id: 'warehouse:eu.sku-1',
      });
    });

    it('should reject ids longer than 128 characters', () => {
      expect(InventoryParamsSchema.safeParse({ id: 'x'.repeat(129) }).success).toBe(false);
    });
  });

  describe('InventoryResponseSchema', () => {
    it('should accept ISO timestamps with an offset', () => {
      const result = InventoryResponseSchema.safeParse({
        id: 'sku-1',
        quantity: 2,
        version: 4,
        createdAt: '2025-06-01T12:00:00.000Z',
        updatedAt: '2025-06-01T14:00:00.000+02:00',
      });

      expect(result.success).toBe(true);
    });
  });

  describe('AdjustmentResponseSchema', () => {
    it('should reject version 0 since a committed adjustment advances it', () => {
      const result = AdjustmentResponseSchema.safeParse({
        id: 'sku-1',
        quantity: 2,
        version: 0,
        attempts: 1,
      });

      expect(result.success).toBe(false);
    });
  });
});
