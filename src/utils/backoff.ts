/**
 * Reconnection delay calculation
 */

export interface BackoffOptions {
  /** Delay before the first retry in ms */
  baseDelay: number;
  multiplier: number;
  maxDelay: number;
  /** Fraction of the delay added at random, 0 for none */
  jitter?: number;
  random?: () => number;
}

/**
 * Exponential backoff: baseDelay * multiplier^(attempt - 1), capped at maxDelay,
 * plus up to `jitter` of the capped delay at random. `attempt` is 1-based.
 */
export function computeBackoffDelay(attempt: number, options: BackoffOptions): number {
  const exponent = Math.max(0, attempt - 1);
  const delay = Math.min(options.baseDelay * Math.pow(options.multiplier, exponent), options.maxDelay);

  const jitter = options.jitter ?? 0;
  if (jitter <= 0) {
    return Math.floor(delay);
  }

  const random = options.random ?? Math.random;
  return Math.floor(delay + delay * jitter * random());
}
