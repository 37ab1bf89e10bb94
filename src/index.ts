/**
 * Public entry point for optimistic inventory updates
 *
 * @example
 * ```typescript
 * import { OptimisticUpdater, SqliteInventoryRepository, InventoryRecord } from 'inventory-occ';
 *
 * const repository = SqliteInventoryRepository.open();
 * await repository.create(InventoryRecord.provision('sku-1', 5));
 *
 * const updater = new OptimisticUpdater(repository, { maxAttempts: 3 });
 * const outcome = await updater.apply('sku-1', -2);
 * // { kind: 'Success', id: 'sku-1', finalQuantity: 3, version: 1, attempts: 1 }
 * ```
 */

export { OptimisticUpdater } from './modules/inventory/application/services/OptimisticUpdater';
export type { OptimisticUpdaterOptions } from './modules/inventory/application/services/OptimisticUpdater';
export { outcomeToError } from './modules/inventory/application/services/outcomeToError';
export type {
  IVersionedStore,
  RowsAffected,
  VersionedSnapshot,
} from './modules/inventory/application/ports/IVersionedStore';
export type { IInventoryRepository } from './modules/inventory/application/ports/IInventoryRepository';
export { InventoryRecord } from './modules/inventory/domain/entities/InventoryRecord';
export {
  OutcomeKind,
  isSuccess,
  type FailedOutcome,
  type InsufficientInventoryOutcome,
  type NotFoundOutcome,
  type StoreErrorOutcome,
  type StoreOperation,
  type SuccessOutcome,
  type UpdateOutcome,
  type VersionConflictExhaustedOutcome,
} from './modules/inventory/domain/value-objects/UpdateOutcome';
export {
  exponentialJitterBackoff,
  noBackoff,
  type BackoffPolicy,
  type ExponentialJitterOptions,
} from './modules/inventory/domain/services/BackoffPolicy';
export { InMemoryInventoryRepository } from './modules/inventory/adapters/persistence/InMemoryInventoryRepository';
export { SqliteInventoryRepository } from './modules/inventory/adapters/persistence/SqliteInventoryRepository';
export { PostgresInventoryRepository } from './modules/inventory/adapters/persistence/PostgresInventoryRepository';
export {
  createBackoffPolicy,
  getOccConfig,
  DEFAULT_OCC_CONFIG,
  type OccConfig,
} from './modules/inventory/config/occ-config';
export { runContentionDemo } from './modules/inventory/demo/contention-demo';
export { createServer, startServer } from './adapters/primary/http/server';
export { registerInventoryRoutes } from './adapters/primary/http/routes/inventory.routes';
export { DomainError } from './domain/errors/DomainError';
export { ValidationError } from './domain/errors/ValidationError';
export { InfrastructureError } from './domain/errors/InfrastructureError';
export { StoreTimeoutError } from './domain/errors/StoreTimeoutError';
export { OptimisticLockError } from './domain/errors/OptimisticLockError';
export { InsufficientInventoryError } from './domain/errors/InsufficientInventoryError';
export { InventoryRecordNotFoundError } from './domain/errors/InventoryRecordNotFoundError';
export { InventoryRecordAlreadyExistsError } from './domain/errors/InventoryRecordAlreadyExistsError';
