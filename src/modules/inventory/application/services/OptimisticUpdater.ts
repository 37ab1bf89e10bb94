import { setTimeout as delay } from 'timers/promises';
import type { IVersionedStore, RowsAffected, VersionedSnapshot } from '../ports/IVersionedStore';
import type { BackoffPolicy } from '../../domain/services/BackoffPolicy';
import { noBackoff } from '../../domain/services/BackoffPolicy';
import {
  toOutcome,
  type AttemptResult,
  type StoreOperation,
  type UpdateOutcome,
  OutcomeKind,
} from '../../domain/value-objects/UpdateOutcome';
import { ValidationError } from '../../../../domain/errors/ValidationError';
import { InfrastructureError } from '../../../../domain/errors/InfrastructureError';
import { StoreTimeoutError } from '../../../../domain/errors/StoreTimeoutError';
import { logger } from '../../../../shared/logger';

export interface OptimisticUpdaterOptions {
  /** Default attempt bound for apply(); must be an integer >= 1 */
  maxAttempts?: number;
  /** Delay before re-reading after a conflict; defaults to no delay */
  backoffPolicy?: BackoffPolicy;
  /** Deadline for every individual read and compare-and-set */
  storeTimeoutMs?: number | null;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_MAX_ATTEMPTS = 3;
// Largest delay setTimeout honours; anything above fires after 1 ms
const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * OptimisticUpdater
 *
 * Applies a signed delta to a versioned inventory record with optimistic
 * concurrency control.
 *
 * **Protocol (per attempt):**
 * 1. Read the current snapshot (quantity, version)
 * 2. Compute `quantity + delta`
 * 3. Refuse the write if the result would be negative
 * 4. Compare-and-set against the version that was read
 * 5. On a lost race, back off and start again from a fresh read
 *
 * **Terminal outcomes:**
 *
 * | Outcome | Cause | Retried? |
 * |---------|-------|----------|
 * | Success | compare-and-set affected 1 row | - |
 * | NotFound | read returned null | No |
 * | InsufficientInventory | quantity + delta < 0 | No |
 * | StoreError | read or compare-and-set rejected / timed out | No |
 * | VersionConflictExhausted | maxAttempts conflicts in a row | After each conflict but the last |
 *
 * Insufficient inventory is reported on the first snapshot that cannot absorb
 * the delta, even though a concurrent credit might have made a later attempt
 * succeed.
 *
 * No lock is taken and nothing is cached between attempts; the store's atomic
 * compare-and-set is the only arbiter between concurrent writers. Instances
 * hold no mutable state, so one updater can serve any number of concurrent
 * apply() calls.
 */
export class OptimisticUpdater {
  private readonly maxAttempts: number;
  private readonly backoffPolicy: BackoffPolicy;
  private readonly storeTimeoutMs: number | null;
  private readonly sleep: (ms: number) => Promise<void>;

  public constructor(
    private readonly store: IVersionedStore,
    options: OptimisticUpdaterOptions = {}
  ) {
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.backoffPolicy = options.backoffPolicy ?? noBackoff;
    this.storeTimeoutMs = options.storeTimeoutMs ?? null;
    this.sleep = options.sleep ?? ((ms: number) => delay(ms));

    assertMaxAttempts(this.maxAttempts);
    if (
      this.storeTimeoutMs !== null &&
      !(this.storeTimeoutMs > 0 && this.storeTimeoutMs <= MAX_TIMER_DELAY_MS)
    ) {
      throw new ValidationError(
        `storeTimeoutMs must be a positive number of milliseconds no greater than ${MAX_TIMER_DELAY_MS}`,
        {
          storeTimeoutMs: this.storeTimeoutMs,
        }
      );
    }
  }

  /**
   * Applies `delta` to the record's quantity
   *
   * @param id - Record identifier
   * @param delta - Signed change to the quantity
   * @param maxAttempts - Attempt bound for this call; defaults to the configured one
   * @returns The terminal outcome; store failures are returned, not thrown
   * @throws ValidationError if id, delta or maxAttempts is malformed (no store call is made),
   *   or if the observed quantity plus delta is not a safe integer (nothing is written)
   */
  public async apply(
    id: string,
    delta: number,
    maxAttempts: number = this.maxAttempts
  ): Promise<UpdateOutcome> {
    if (id.length === 0) {
      throw new ValidationError('Record id must not be empty');
    }
    if (!Number.isSafeInteger(delta)) {
      throw new ValidationError('delta must be a safe integer', { delta });
    }
    assertMaxAttempts(maxAttempts);

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const result = await this.attempt(id, delta);

      if (result.type !== 'conflict') {
        return toOutcome(id, delta, result, attempt);
      }

      if (attempt === maxAttempts) {
        break;
      }

      const waitMs = this.backoffPolicy(attempt);
      logger.debug({
        msg: 'Version conflict, retrying with a fresh read',
        recordId: id,
        delta,
        attempt,
        maxAttempts,
        backoffMs: waitMs,
      });
      if (waitMs > 0) {
        await this.sleep(waitMs);
      }
    }

    logger.debug({
      msg: 'Version conflict retries exhausted',
      recordId: id,
      delta,
      attempts: maxAttempts,
    });
    return { kind: OutcomeKind.VERSION_CONFLICT_EXHAUSTED, id, attempts: maxAttempts };
  }

  /**
   * One read-compute-write cycle. Steps 2-3 are pure and run between the two
   * store calls without touching the store.
   */
  private async attempt(id: string, delta: number): Promise<AttemptResult> {
    let snapshot: VersionedSnapshot | null;
    try {
      snapshot = await this.callStore('read', () => this.store.read(id));
    } catch (error) {
      return { type: 'storeError', operation: 'read', cause: toError(error) };
    }

    if (snapshot === null) {
      return { type: 'notFound' };
    }

    const { quantity, version } = snapshot;
    const newQuantity = quantity + delta;
    if (!Number.isSafeInteger(newQuantity)) {
      throw new ValidationError('delta would take the quantity outside the safe integer range', {
        recordId: id,
        delta,
        observedQuantity: quantity,
      });
    }
    if (newQuantity < 0) {
      return { type: 'invariantViolation', observedQuantity: quantity, observedVersion: version };
    }

    let rowsAffected: RowsAffected;
    try {
      rowsAffected = await this.callStore('compareAndSet', () =>
        this.store.compareAndSet(id, newQuantity, version)
      );
    } catch (error) {
      return { type: 'storeError', operation: 'compareAndSet', cause: toError(error) };
    }

    if (rowsAffected === 1) {
      return { type: 'committed', newQuantity, version: version + 1 };
    }
    return { type: 'conflict' };
  }

  /**
   * Runs a store call, bounded by the configured deadline when there is one.
   * The timer is always cleared so no handle outlives the call.
   */
  private async callStore<T>(operation: StoreOperation, call: () => Promise<T>): Promise<T> {
    const timeoutMs = this.storeTimeoutMs;
    if (timeoutMs === null) {
      return call();
    }

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => reject(new StoreTimeoutError(operation, timeoutMs)), timeoutMs);
    });

    try {
      return await Promise.race([call(), deadline]);
    } finally {
      clearTimeout(timer);
    }
  }
}

function assertMaxAttempts(maxAttempts: number): void {
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new ValidationError('maxAttempts must be an integer >= 1', { maxAttempts });
  }
}

function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  return new InfrastructureError(`Store call failed: ${String(error)}`, { cause: error });
}
