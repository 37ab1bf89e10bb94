/**
 * Store operation that produced a StoreError
 */
export type StoreOperation = 'read' | 'compareAndSet';

/**
 * Outcome discriminants
 * Every apply() call ends in exactly one of these
 */
export enum OutcomeKind {
  SUCCESS = 'Success',
  INSUFFICIENT_INVENTORY = 'InsufficientInventory',
  VERSION_CONFLICT_EXHAUSTED = 'VersionConflictExhausted',
  NOT_FOUND = 'NotFound',
  STORE_ERROR = 'StoreError',
}

export interface SuccessOutcome {
  kind: OutcomeKind.SUCCESS;
  id: string;
  finalQuantity: number;
  /** Version written by the winning compare-and-set */
  version: number;
  attempts: number;
}

export interface InsufficientInventoryOutcome {
  kind: OutcomeKind.INSUFFICIENT_INVENTORY;
  id: string;
  delta: number;
  observedQuantity: number;
  observedVersion: number;
  attempts: number;
}

export interface VersionConflictExhaustedOutcome {
  kind: OutcomeKind.VERSION_CONFLICT_EXHAUSTED;
  id: string;
  attempts: number;
}

export interface NotFoundOutcome {
  kind: OutcomeKind.NOT_FOUND;
  id: string;
  attempts: number;
}

export interface StoreErrorOutcome {
  kind: OutcomeKind.STORE_ERROR;
  id: string;
  operation: StoreOperation;
  cause: Error;
  attempts: number;
}

/**
 * Terminal result of one optimistic update
 */
export type UpdateOutcome =
  | SuccessOutcome
  | InsufficientInventoryOutcome
  | VersionConflictExhaustedOutcome
  | NotFoundOutcome
  | StoreErrorOutcome;

/**
 * Any outcome other than Success
 */
export type FailedOutcome = Exclude<UpdateOutcome, SuccessOutcome>;

/**
 * Result of a single read-compute-write attempt.
 *
 * Internal to the retry loop: a conflict drives another attempt, every other
 * variant ends the loop.
 */
export type AttemptResult =
  | { type: 'committed'; newQuantity: number; version: number }
  | { type: 'conflict' }
  | { type: 'invariantViolation'; observedQuantity: number; observedVersion: number }
  | { type: 'notFound' }
  | { type: 'storeError'; operation: StoreOperation; cause: Error };

export function isSuccess(outcome: UpdateOutcome): outcome is SuccessOutcome {
  return outcome.kind === OutcomeKind.SUCCESS;
}

/**
 * Converts a terminal attempt into the outcome handed to the caller
 *
 * @param id - Record identifier
 * @param delta - Delta the caller asked for
 * @param attempt - Final attempt result (never a conflict)
 * @param attempts - Number of reads issued so far
 */
export function toOutcome(
  id: string,
  delta: number,
  attempt: Exclude<AttemptResult, { type: 'conflict' }>,
  attempts: number
): UpdateOutcome {
  switch (attempt.type) {
    case 'committed':
      return {
        kind: OutcomeKind.SUCCESS,
        id,
        finalQuantity: attempt.newQuantity,
        version: attempt.version,
        attempts,
      };
    case 'invariantViolation':
      return {
        kind: OutcomeKind.INSUFFICIENT_INVENTORY,
        id,
        delta,
        observedQuantity: attempt.observedQuantity,
        observedVersion: attempt.observedVersion,
        attempts,
      };
    case 'notFound':
      return { kind: OutcomeKind.NOT_FOUND, id, attempts };
    case 'storeError':
      return {
        kind: OutcomeKind.STORE_ERROR,
        id,
        operation: attempt.operation,
        cause: attempt.cause,
        attempts,
      };
  }
}
