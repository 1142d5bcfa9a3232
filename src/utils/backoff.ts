/**
 * Exponential Backoff with Jitter
 *
 * Delay doubles each attempt from baseDelayMs, capped at maxDelayMs, with
 * +/- jitterFraction randomness so concurrent page calls do not retry in lockstep.
 *
 * @module utils/backoff
 */

export interface BackoffConfig {
  /** Base delay in milliseconds (default: 1000) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs: number;
  /** Maximum number of attempts, including the first (default: 3) */
  maxAttempts: number;
  /** Jitter fraction +/- (default: 0.25 = +/-25%) */
  jitterFraction: number;
}

const DEFAULT_BACKOFF: BackoffConfig = {
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  maxAttempts: 3,
  jitterFraction: 0.25,
};

/**
 * Delay for a zero-indexed attempt: min(base * 2^attempt, max) +/- jitter, never negative.
 */
export function calculateBackoffDelay(attempt: number, config?: Partial<BackoffConfig>): number {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  const cappedDelay = Math.min(cfg.baseDelayMs * Math.pow(2, attempt), cfg.maxDelayMs);

  const jitterRange = cappedDelay * cfg.jitterFraction;
  const jitter = (Math.random() * 2 - 1) * jitterRange;

  return Math.max(0, Math.round(cappedDelay + jitter));
}

export function backoffSleep(
  attempt: number,
  config?: Partial<BackoffConfig>,
  label = 'Backoff'
): Promise<void> {
  const delay = calculateBackoffDelay(attempt, config);
  console.error(`[${label}] Attempt ${attempt + 1} failed, retrying in ${delay}ms`);
  return new Promise((resolve) => setTimeout(resolve, delay));
}

/**
 * Run fn, retrying errors accepted by shouldRetry up to maxAttempts times.
 * Errors rejected by shouldRetry are re-thrown immediately.
 *
 * @throws The last error once attempts are exhausted
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  shouldRetry: (error: unknown) => boolean,
  config?: Partial<BackoffConfig>,
  label?: string
): Promise<T> {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  let lastError: unknown;

  for (let attempt = 0; attempt < cfg.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (!shouldRetry(error)) throw error;
      if (attempt < cfg.maxAttempts - 1) {
        await backoffSleep(attempt, cfg, label);
      }
    }
  }

  throw lastError;
}
