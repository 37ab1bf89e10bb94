/**
 * Delay in milliseconds to wait before the read that follows a version
 * conflict. `attempt` is the number of the attempt that just lost (1-based).
 */
export type BackoffPolicy = (attempt: number) => number;

export interface ExponentialJitterOptions {
  baseDelayMs: number;
  maxDelayMs: number;
  /** Uniform source in [0, 1); defaults to Math.random */
  random?: () => number;
}

/**
 * Retry immediately
 */
export const noBackoff: BackoffPolicy = () => 0;

/**
 * Capped exponential backoff with full jitter.
 *
 * The ceiling doubles per attempt (`baseDelayMs * 2^(attempt - 1)`) up to
 * `maxDelayMs`, and the delay is drawn uniformly below that ceiling, so
 * writers that collided once are unlikely to collide again.
 *
 * @example
 * const backoff = exponentialJitterBackoff({ baseDelayMs: 5, maxDelayMs: 100 });
 * backoff(1); // somewhere in [0, 5)
 * backoff(3); // somewhere in [0, 20)
 */
export function exponentialJitterBackoff(options: ExponentialJitterOptions): BackoffPolicy {
  const { baseDelayMs, maxDelayMs } = options;
  const random = options.random ?? Math.random;

  if (baseDelayMs < 0 || maxDelayMs < 0) {
    throw new RangeError('Backoff delays must not be negative');
  }

  return (attempt: number): number => {
    const ceiling = Math.min(maxDelayMs, baseDelayMs * 2 ** Math.max(0, attempt - 1));
    return Math.floor(random() * ceiling);
  };
}
