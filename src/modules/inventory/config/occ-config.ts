import { z } from 'zod';
import { logger } from '../../../shared/logger';
import {
  exponentialJitterBackoff,
  noBackoff,
  type BackoffPolicy,
} from '../domain/services/BackoffPolicy';

/**
 * Retry configuration for optimistic inventory updates
 */
export interface OccConfig {
  /** Reads allowed per apply() call, at least 1 */
  maxAttempts: number;
  /** 0 disables backoff between conflicting attempts */
  backoffBaseDelayMs: number;
  backoffMaxDelayMs: number;
  /** Deadline for each store call; null leaves calls unbounded */
  storeTimeoutMs: number | null;
}

export const DEFAULT_OCC_CONFIG: OccConfig = {
  maxAttempts: 3,
  backoffBaseDelayMs: 0,
  backoffMaxDelayMs: 100,
  storeTimeoutMs: null,
};

const PositiveIntSchema = z.coerce.number().int().min(1).max(1000);
const DelaySchema = z.coerce.number().int().min(0).max(60_000);
const TimeoutSchema = z.coerce.number().int().min(1).max(600_000);

/**
 * Parses one numeric environment variable.
 *
 * Invalid values are logged and ignored rather than thrown, so a typo in the
 * environment never stops the server from starting.
 *
 * @returns The parsed value, or undefined when unset or invalid
 */
function readVariable(env: NodeJS.ProcessEnv, name: string, schema: z.ZodNumber): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }

  const parsed = schema.safeParse(raw.trim());
  if (!parsed.success) {
    logger.warn({
      msg: 'Ignoring invalid OCC configuration value',
      variable: name,
      value: raw,
    });
    return undefined;
  }
  return parsed.data;
}

/**
 * Resolve OCC configuration from the environment
 *
 * **Variables:**
 * - OCC_MAX_ATTEMPTS: attempts per update (default 3)
 * - OCC_BACKOFF_BASE_MS: first backoff ceiling in ms (default 0, no backoff)
 * - OCC_BACKOFF_MAX_MS: largest backoff ceiling in ms (default 100)
 * - OCC_STORE_TIMEOUT_MS: per store call deadline in ms (default unset)
 *
 * @example
 * // OCC_MAX_ATTEMPTS=5 OCC_BACKOFF_BASE_MS=2
 * getOccConfig();
 * // { maxAttempts: 5, backoffBaseDelayMs: 2, backoffMaxDelayMs: 100, storeTimeoutMs: null }
 */
export function getOccConfig(env: NodeJS.ProcessEnv = process.env): OccConfig {
  const backoffBaseDelayMs =
    readVariable(env, 'OCC_BACKOFF_BASE_MS', DelaySchema) ?? DEFAULT_OCC_CONFIG.backoffBaseDelayMs;
  const backoffMaxDelayMs =
    readVariable(env, 'OCC_BACKOFF_MAX_MS', DelaySchema) ?? DEFAULT_OCC_CONFIG.backoffMaxDelayMs;

  return {
    maxAttempts:
      readVariable(env, 'OCC_MAX_ATTEMPTS', PositiveIntSchema) ?? DEFAULT_OCC_CONFIG.maxAttempts,
    backoffBaseDelayMs,
    backoffMaxDelayMs: Math.max(backoffMaxDelayMs, backoffBaseDelayMs),
    storeTimeoutMs:
      readVariable(env, 'OCC_STORE_TIMEOUT_MS', TimeoutSchema) ?? DEFAULT_OCC_CONFIG.storeTimeoutMs,
  };
}

/**
 * Builds the backoff policy described by a configuration
 */
export function createBackoffPolicy(config: OccConfig): BackoffPolicy {
  if (config.backoffBaseDelayMs === 0) {
    return noBackoff;
  }
  return exponentialJitterBackoff({
    baseDelayMs: config.backoffBaseDelayMs,
    maxDelayMs: config.backoffMaxDelayMs,
  });
}
