import { OptimisticUpdater } from './OptimisticUpdater';
import type { IVersionedStore, RowsAffected, VersionedSnapshot } from '../ports/IVersionedStore';
import { InMemoryInventoryRepository } from '../../adapters/persistence/InMemoryInventoryRepository';
import { InventoryRecord } from '../../domain/entities/InventoryRecord';
import { OutcomeKind, isSuccess, type UpdateOutcome } from '../../domain/value-objects/UpdateOutcome';
import { ValidationError } from '../../../../domain/errors/ValidationError';
import { InfrastructureError } from '../../../../domain/errors/InfrastructureError';
import { StoreTimeoutError } from '../../../../domain/errors/StoreTimeoutError';

describe('OptimisticUpdater', () => {
  let mockStore: jest.Mocked<IVersionedStore>;

  beforeEach(() => {
    mockStore = {
      read: jest.fn(),
      compareAndSet: jest.fn(),
    } as jest.Mocked<IVersionedStore>;
  });

  describe('constructor', () => {
    it('should reject a maxAttempts below 1', () => {
      expect(() => new OptimisticUpdater(mockStore, { maxAttempts: 0 })).toThrow(ValidationError);
    });

    it('should reject a non-integer maxAttempts', () => {
      expect(() => new OptimisticUpdater(mockStore, { maxAttempts: 1.5 })).toThrow(
        'maxAttempts must be an integer >= 1'
      );
    });

    it('should reject a store timeout beyond the largest timer delay', () => {
      expect(() => new OptimisticUpdater(mockStore, { storeTimeoutMs: 3_000_000_000 })).toThrow(
        'storeTimeoutMs must be a positive number of milliseconds no greater than 2147483647'
      );
    });

    it('should reject an infinite store timeout', () => {
      expect(() => new OptimisticUpdater(mockStore, { storeTimeoutMs: Infinity })).toThrow(
        ValidationError
      );
    });

    it('should accept the largest timer delay as a store timeout', () => {
      expect(() => new OptimisticUpdater(mockStore, { storeTimeoutMs: 2_147_483_647 })).not.toThrow();
    });

    it('should reject a non-positive store timeout', () => {
      expect(() => new OptimisticUpdater(mockStore, { storeTimeoutMs: 0 })).toThrow(
        ValidationError
      );
    });
  });

  describe('apply - single attempt outcomes', () => {
    it('should commit on the first attempt when there is no contention', async () => {
      // Arrange
      mockStore.read.mockResolvedValue({ quantity: 5, version: 0 });
      mockStore.compareAndSet.mockResolvedValue(1);
      const updater = new OptimisticUpdater(mockStore);

      // Act
      const outcome = await updater.apply('sku-1', -2, 3);

      // Assert
      expect(outcome).toEqual({
        kind: OutcomeKind.SUCCESS,
        id: 'sku-1',
        finalQuantity: 3,
        version: 1,
        attempts: 1,
      });
      expect(mockStore.compareAndSet).toHaveBeenCalledWith('sku-1', 3, 0);
    });

    it('should allow a delta that brings the quantity to exactly zero', async () => {
      mockStore.read.mockResolvedValue({ quantity: 2, version: 7 });
      mockStore.compareAndSet.mockResolvedValue(1);
      const updater = new OptimisticUpdater(mockStore);

      const outcome = await updater.apply('sku-1', -2);

      expect(outcome).toMatchObject({ kind: OutcomeKind.SUCCESS, finalQuantity: 0, version: 8 });
    });

    it('should return InsufficientInventory without writing (quantity 1, version 5, delta -2)', async () => {
      // Arrange
      mockStore.read.mockResolvedValue({ quantity: 1, version: 5 });
      const updater = new OptimisticUpdater(mockStore);

      // Act
      const outcome = await updater.apply('sku-1', -2, 1);

      // Assert
      expect(outcome).toEqual({
        kind: OutcomeKind.INSUFFICIENT_INVENTORY,
        id: 'sku-1',
        delta: -2,
        observedQuantity: 1,
        observedVersion: 5,
        attempts: 1,
      });
      expect(mockStore.compareAndSet).not.toHaveBeenCalled();
    });

    it('should not retry InsufficientInventory even with attempts left', async () => {
      mockStore.read.mockResolvedValue({ quantity: 0, version: 1 });
      const updater = new OptimisticUpdater(mockStore);

      const outcome = await updater.apply('sku-1', -1, 5);

      expect(outcome.kind).toBe(OutcomeKind.INSUFFICIENT_INVENTORY);
      expect(mockStore.read).toHaveBeenCalledTimes(1);
    });

    it('should reject a delta that would overflow the safe integer range, without writing', async () => {
      // Arrange
      mockStore.read.mockResolvedValue({ quantity: Number.MAX_SAFE_INTEGER, version: 0 });
      const updater = new OptimisticUpdater(mockStore);

      // Act
      const result = updater.apply('sku-1', Number.MAX_SAFE_INTEGER);

      // Assert
      await expect(result).rejects.toThrow(
        'delta would take the quantity outside the safe integer range'
      );
      expect(mockStore.read).toHaveBeenCalledTimes(1);
      expect(mockStore.compareAndSet).not.toHaveBeenCalled();
    });

    it('should keep a record at the safe integer ceiling usable after an overflowing delta', async () => {
      // Arrange
      const repository = new InMemoryInventoryRepository();
      await repository.create(InventoryRecord.provision('sku-max', Number.MAX_SAFE_INTEGER));
      const updater = new OptimisticUpdater(repository);

      // Act
      await expect(updater.apply('sku-max', Number.MAX_SAFE_INTEGER)).rejects.toThrow(
        ValidationError
      );
      const outcome = await updater.apply('sku-max', -1);

      // Assert
      expect(outcome).toEqual({
        kind: OutcomeKind.SUCCESS,
        id: 'sku-max',
        finalQuantity: Number.MAX_SAFE_INTEGER - 1,
        version: 1,
        attempts: 1,
      });
    });

    it('should return NotFound on the first read and never write', async () => {
      mockStore.read.mockResolvedValue(null);
      const updater = new OptimisticUpdater(mockStore);

      const outcome = await updater.apply('missing', 1, 3);

      expect(outcome).toEqual({ kind: OutcomeKind.NOT_FOUND, id: 'missing', attempts: 1 });
      expect(mockStore.read).toHaveBeenCalledTimes(1);
      expect(mockStore.compareAndSet).not.toHaveBeenCalled();
    });

    it('should return StoreError when the read fails, without retrying', async () => {
      const cause = new InfrastructureError('connection refused');
      mockStore.read.mockRejectedValue(cause);
      const updater = new OptimisticUpdater(mockStore);

      const outcome = await updater.apply('sku-1', 1, 3);

      expect(outcome).toEqual({
        kind: OutcomeKind.STORE_ERROR,
        id: 'sku-1',
        operation: 'read',
        cause,
        attempts: 1,
      });
      expect(mockStore.read).toHaveBeenCalledTimes(1);
    });

    it('should return StoreError when the compare-and-set fails, without retrying', async () => {
      const cause = new InfrastructureError('transaction aborted');
      mockStore.read.mockResolvedValue({ quantity: 4, version: 2 });
      mockStore.compareAndSet.mockRejectedValue(cause);
      const updater = new OptimisticUpdater(mockStore);

      const outcome = await updater.apply('sku-1', 1, 3);

      expect(outcome).toMatchObject({
        kind: OutcomeKind.STORE_ERROR,
        operation: 'compareAndSet',
        attempts: 1,
      });
      expect(mockStore.read).toHaveBeenCalledTimes(1);
      expect(mockStore.compareAndSet).toHaveBeenCalledTimes(1);
    });

    it('should wrap non-Error rejections in InfrastructureError', async () => {
      mockStore.read.mockRejectedValue('socket hang up');
      const updater = new OptimisticUpdater(mockStore);

      const outcome = await updater.apply('sku-1', 1);

      expect(outcome.kind).toBe(OutcomeKind.STORE_ERROR);
      if (outcome.kind === OutcomeKind.STORE_ERROR) {
        expect(outcome.cause).toBeInstanceOf(InfrastructureError);
        expect(outcome.cause.message).toBe('Store call failed: socket hang up');
      }
    });
  });

  describe('apply - version conflicts', () => {
    it('should exhaust when a concurrent writer commits between read and compare-and-set (quantity 3, version 2)', async () => {
      // Arrange - another writer advanced the version to 3 after this call's read
      mockStore.read.mockResolvedValue({ quantity: 3, version: 2 });
      mockStore.compareAndSet.mockResolvedValue(0);
      const updater = new OptimisticUpdater(mockStore);

      // Act
      const outcome = await updater.apply('sku-1', -1, 1);

      // Assert
      expect(outcome).toEqual({
        kind: OutcomeKind.VERSION_CONFLICT_EXHAUSTED,
        id: 'sku-1',
        attempts: 1,
      });
      expect(mockStore.compareAndSet).toHaveBeenCalledWith('sku-1', 2, 2);
    });

    it('should issue exactly maxAttempts reads when every attempt conflicts', async () => {
      mockStore.read.mockResolvedValue({ quantity: 10, version: 1 });
      mockStore.compareAndSet.mockResolvedValue(0);
      const updater = new OptimisticUpdater(mockStore);

      const outcome = await updater.apply('sku-1', -1, 4);

      expect(outcome).toEqual({
        kind: OutcomeKind.VERSION_CONFLICT_EXHAUSTED,
        id: 'sku-1',
        attempts: 4,
      });
      expect(mockStore.read).toHaveBeenCalledTimes(4);
      expect(mockStore.compareAndSet).toHaveBeenCalledTimes(4);
    });

    it('should re-read after a conflict and write against the fresh version', async () => {
      // Arrange
      mockStore.read
        .mockResolvedValueOnce({ quantity: 5, version: 0 })
        .mockResolvedValueOnce({ quantity: 3, version: 1 });
      mockStore.compareAndSet.mockResolvedValueOnce(0).mockResolvedValueOnce(1);
      const updater = new OptimisticUpdater(mockStore);

      // Act
      const outcome = await updater.apply('sku-1', -1, 3);

      // Assert
      expect(outcome).toEqual({
        kind: OutcomeKind.SUCCESS,
        id: 'sku-1',
        finalQuantity: 2,
        version: 2,
        attempts: 2,
      });
      expect(mockStore.compareAndSet).toHaveBeenNthCalledWith(1, 'sku-1', 4, 0);
      expect(mockStore.compareAndSet).toHaveBeenNthCalledWith(2, 'sku-1', 2, 1);
    });

    it('should stop with InsufficientInventory when a retry observes a drained quantity', async () => {
      mockStore.read
        .mockResolvedValueOnce({ quantity: 2, version: 0 })
        .mockResolvedValueOnce({ quantity: 0, version: 1 });
      mockStore.compareAndSet.mockResolvedValueOnce(0);
      const updater = new OptimisticUpdater(mockStore);

      const outcome = await updater.apply('sku-1', -2, 3);

      expect(outcome).toEqual({
        kind: OutcomeKind.INSUFFICIENT_INVENTORY,
        id: 'sku-1',
        delta: -2,
        observedQuantity: 0,
        observedVersion: 1,
        attempts: 2,
      });
      expect(mockStore.compareAndSet).toHaveBeenCalledTimes(1);
    });

    it('should return NotFound when the record disappears between attempts', async () => {
      mockStore.read.mockResolvedValueOnce({ quantity: 2, version: 0 }).mockResolvedValueOnce(null);
      mockStore.compareAndSet.mockResolvedValueOnce(0);
      const updater = new OptimisticUpdater(mockStore);

      const outcome = await updater.apply('sku-1', 1, 3);

      expect(outcome).toEqual({ kind: OutcomeKind.NOT_FOUND, id: 'sku-1', attempts: 2 });
    });
  });

  describe('apply - backoff', () => {
    it('should wait the policy delay between conflicting attempts only', async () => {
      // Arrange
      mockStore.read.mockResolvedValue({ quantity: 10, version: 1 });
      mockStore.compareAndSet.mockResolvedValue(0);
      const sleep = jest.fn<Promise<void>, [number]>().mockResolvedValue(undefined);
      const backoffPolicy = jest.fn((attempt: number) => attempt * 10);
      const updater = new OptimisticUpdater(mockStore, { backoffPolicy, sleep });

      // Act
      await updater.apply('sku-1', 1, 3);

      // Assert - no wait after the final attempt
      expect(backoffPolicy.mock.calls).toEqual([[1], [2]]);
      expect(sleep.mock.calls).toEqual([[10], [20]]);
    });

    it('should not sleep when the policy returns 0', async () => {
      mockStore.read.mockResolvedValue({ quantity: 10, version: 1 });
      mockStore.compareAndSet.mockResolvedValueOnce(0).mockResolvedValueOnce(1);
      const sleep = jest.fn<Promise<void>, [number]>().mockResolvedValue(undefined);
      const updater = new OptimisticUpdater(mockStore, { sleep });

      await updater.apply('sku-1', 1, 2);

      expect(sleep).not.toHaveBeenCalled();
    });

    it('should not consult the policy when the first attempt succeeds', async () => {
      mockStore.read.mockResolvedValue({ quantity: 1, version: 0 });
      mockStore.compareAndSet.mockResolvedValue(1);
      const backoffPolicy = jest.fn(() => 5);
      const updater = new OptimisticUpdater(mockStore, { backoffPolicy });

      await updater.apply('sku-1', 1);

      expect(backoffPolicy).not.toHaveBeenCalled();
    });
  });

  describe('apply - store deadline', () => {
    it('should surface a read that misses its deadline as StoreError', async () => {
      // Arrange
      mockStore.read.mockReturnValue(new Promise<VersionedSnapshot | null>(() => undefined));
      const updater = new OptimisticUpdater(mockStore, { storeTimeoutMs: 20 });

      // Act
      const outcome = await updater.apply('sku-1', 1, 3);

      // Assert
      expect(outcome.kind).toBe(OutcomeKind.STORE_ERROR);
      if (outcome.kind === OutcomeKind.STORE_ERROR) {
        expect(outcome.operation).toBe('read');
        expect(outcome.cause).toBeInstanceOf(StoreTimeoutError);
      }
      expect(mockStore.read).toHaveBeenCalledTimes(1);
    });

    it('should not retry a compare-and-set that times out', async () => {
      mockStore.read.mockResolvedValue({ quantity: 1, version: 0 });
      mockStore.compareAndSet.mockReturnValue(new Promise<RowsAffected>(() => undefined));
      const updater = new OptimisticUpdater(mockStore, { storeTimeoutMs: 20 });

      const outcome = await updater.apply('sku-1', 1, 3);

      expect(outcome).toMatchObject({ kind: OutcomeKind.STORE_ERROR, operation: 'compareAndSet' });
      expect(mockStore.compareAndSet).toHaveBeenCalledTimes(1);
    });

    it('should pass through calls that settle in time', async () => {
      mockStore.read.mockResolvedValue({ quantity: 1, version: 0 });
      mockStore.compareAndSet.mockResolvedValue(1);
      const updater = new OptimisticUpdater(mockStore, { storeTimeoutMs: 1000 });

      const outcome = await updater.apply('sku-1', 1);

      expect(outcome.kind).toBe(OutcomeKind.SUCCESS);
    });
  });

  describe('apply - argument validation', () => {
    it.each([0, -1, 2.5, Number.NaN])('should reject maxAttempts %p before reading', async (max) => {
      const updater = new OptimisticUpdater(mockStore);

      await expect(updater.apply('sku-1', 1, max)).rejects.toThrow(ValidationError);
      expect(mockStore.read).not.toHaveBeenCalled();
    });

    it('should reject a non-integer delta', async () => {
      const updater = new OptimisticUpdater(mockStore);

      await expect(updater.apply('sku-1', 0.5)).rejects.toThrow('delta must be a safe integer');
    });

    it('should reject an empty id', async () => {
      const updater = new OptimisticUpdater(mockStore);

      await expect(updater.apply('', 1)).rejects.toThrow(ValidationError);
    });
  });

  describe('apply - concurrent writers against one record', () => {
    let repository: InMemoryInventoryRepository;

    beforeEach(async () => {
      repository = new InMemoryInventoryRepository();
      await repository.create(InventoryRecord.provision('sku-1', 5));
    });

    function successes(outcomes: UpdateOutcome[]): number {
      return outcomes.filter(isSuccess).length;
    }

    it('should keep version and quantity consistent with the successful calls (5 writers, maxAttempts 3)', async () => {
      // Arrange
      const deltas = [-1, -2, -2, 2, -1];
      const updater = new OptimisticUpdater(repository, { maxAttempts: 3 });

      // Act
      const outcomes = await Promise.all(deltas.map((delta) => updater.apply('sku-1', delta)));

      // Assert
      const appliedSum = outcomes.reduce(
        (sum, outcome, index) => (isSuccess(outcome) ? sum + (deltas[index] ?? 0) : sum),
        0
      );
      const final = await repository.read('sku-1');

      expect(successes(outcomes)).toBeGreaterThanOrEqual(1);
      expect(final).toEqual({ quantity: 5 + appliedSum, version: successes(outcomes) });
      for (const outcome of outcomes) {
        expect([
          OutcomeKind.SUCCESS,
          OutcomeKind.INSUFFICIENT_INVENTORY,
          OutcomeKind.VERSION_CONFLICT_EXHAUSTED,
        ]).toContain(outcome.kind);
        if (isSuccess(outcome)) {
          expect(outcome.finalQuantity).toBeGreaterThanOrEqual(0);
        }
      }
    });

    it('should give every successful call a distinct version', async () => {
      const updater = new OptimisticUpdater(repository, { maxAttempts: 20 });

      const outcomes = await Promise.all(
        Array.from({ length: 8 }, () => updater.apply('sku-1', 1))
      );

      const versions = outcomes.filter(isSuccess).map((outcome) => outcome.version);
      expect(outcomes.every(isSuccess)).toBe(true);
      expect(new Set(versions).size).toBe(8);
      expect([...versions].sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
      await expect(repository.read('sku-1')).resolves.toEqual({ quantity: 13, version: 8 });
    });

    it('should leave the record unchanged after a failed call', async () => {
      const updater = new OptimisticUpdater(repository);

      const outcome = await updater.apply('sku-1', -6);

      expect(outcome.kind).toBe(OutcomeKind.INSUFFICIENT_INVENTORY);
      await expect(repository.read('sku-1')).resolves.toEqual({ quantity: 5, version: 0 });
    });

    it('should let only one of two simultaneous single-attempt writers win', async () => {
      const updater = new OptimisticUpdater(repository, { maxAttempts: 1 });

      const [first, second] = await Promise.all([
        updater.apply('sku-1', -1),
        updater.apply('sku-1', -1),
      ]);

      expect(first?.kind).toBe(OutcomeKind.SUCCESS);
      expect(second?.kind).toBe(OutcomeKind.VERSION_CONFLICT_EXHAUSTED);
      await expect(repository.read('sku-1')).resolves.toEqual({ quantity: 4, version: 1 });
    });
  });
});
