import type { IInventoryRepository } from '../application/ports/IInventoryRepository';
import { OptimisticUpdater } from '../application/services/OptimisticUpdater';
import type { BackoffPolicy } from '../domain/services/BackoffPolicy';
import { noBackoff } from '../domain/services/BackoffPolicy';
import { InventoryRecord } from '../domain/entities/InventoryRecord';
import type { UpdateOutcome } from '../domain/value-objects/UpdateOutcome';
import { SqliteInventoryRepository } from '../adapters/persistence/SqliteInventoryRepository';
import { logger } from '../../../shared/logger';

export interface ContentionDemoOptions {
  id: string;
  initialQuantity: number;
  /** One concurrent writer per entry */
  deltas: readonly number[];
  maxAttempts: number;
  backoffPolicy?: BackoffPolicy;
}

export interface ContentionDemoReport {
  outcomes: Array<{ delta: number; outcome: UpdateOutcome }>;
  finalQuantity: number;
  finalVersion: number;
}

export const DEFAULT_CONTENTION_DEMO: ContentionDemoOptions = {
  id: 'demo-sku',
  initialQuantity: 5,
  deltas: [-1, -2, -2, 2, -1],
  maxAttempts: 3,
};

/**
 * Provisions a record and races one apply() per delta against it.
 *
 * Outcomes are reported in the order of `deltas`, not in completion order.
 */
export async function runContentionDemo(
  repository: IInventoryRepository,
  options: ContentionDemoOptions = DEFAULT_CONTENTION_DEMO
): Promise<ContentionDemoReport> {
  await repository.create(InventoryRecord.provision(options.id, options.initialQuantity));

  const updater = new OptimisticUpdater(repository, {
    maxAttempts: options.maxAttempts,
    backoffPolicy: options.backoffPolicy ?? noBackoff,
  });

  const outcomes = await Promise.all(
    options.deltas.map(async (delta) => ({
      delta,
      outcome: await updater.apply(options.id, delta),
    }))
  );

  const final = await repository.read(options.id);
  if (final === null) {
    throw new Error(`Demo record ${options.id} disappeared`);
  }

  return { outcomes, finalQuantity: final.quantity, finalVersion: final.version };
}

async function main(): Promise<void> {
  const repository = SqliteInventoryRepository.open();
  try {
    const report = await runContentionDemo(repository);

    for (const { delta, outcome } of report.outcomes) {
      logger.info({ msg: 'Writer finished', delta, ...outcome });
    }
    logger.info({
      msg: 'Final inventory record',
      quantity: report.finalQuantity,
      version: report.finalVersion,
    });
  } finally {
    repository.close();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error({ msg: 'Contention demo failed', error });
    process.exitCode = 1;
  });
}
