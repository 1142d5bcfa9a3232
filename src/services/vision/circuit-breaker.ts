/**
 * Circuit Breaker for the vision model endpoint
 *
 * Opens after `failureThreshold` consecutive server-side failures and rejects
 * calls until the recovery window passes; then lets calls through in HALF_OPEN
 * and closes again after `halfOpenSuccessThreshold` successes.
 *
 * Only server-side failures (HTTP 429/5xx, connection errors, model still
 * loading) count. Bad model output (unparseable JSON, schema mismatch) and
 * unsupported inputs do not.
 *
 * @module services/vision/circuit-breaker
 */

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN',
}

const SERVER_STATUS_PATTERN = /\b(429|500|502|503|504)\b/;
const NETWORK_ERROR_PATTERN =
  /ECONNRESET|ETIMEDOUT|ENOTFOUND|ECONNREFUSED|socket hang up|fetch failed|timed out/i;
const OVERLOAD_PATTERN =
  /rate.?limit|server.?(error|overloaded|unavailable)|service.?unavailable|model.*load/i;

function describeError(error: Error): string {
  const cause: unknown = error.cause;
  if (!(cause instanceof Error)) return error.message;
  const code = 'code' in cause && typeof cause.code === 'string' ? cause.code : '';
  return `${error.message} ${cause.message} ${code}`;
}

/**
 * Whether an error is the server's fault (and therefore worth retrying and
 * counting against the breaker).
 */
export function isServerError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if (error.name === 'AbortError' || error.name === 'TimeoutError') {
    return true;
  }

  const text = describeError(error);
  return (
    SERVER_STATUS_PATTERN.test(text) ||
    NETWORK_ERROR_PATTERN.test(text) ||
    OVERLOAD_PATTERN.test(text)
  );
}

export interface CircuitBreakerConfig {
  failureThreshold: number;
  recoveryTimeMs: number;
  halfOpenSuccessThreshold: number;
}

const DEFAULT_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  recoveryTimeMs: 60000,
  halfOpenSuccessThreshold: 2,
};

/** Recovery time never grows past 16x the base window */
const MAX_RECOVERY_MULTIPLIER = 16;

export interface CircuitBreakerStatus {
  state: CircuitState;
  failureCount: number;
  lastFailureTime: number | null;
  timeToRecovery: number | null;
}

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;
  /** Trips since the last full recovery; doubles the recovery window each time */
  private consecutiveTrips = 0;
  private readonly config: CircuitBreakerConfig;

  constructor(config: Partial<CircuitBreakerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Recovery window for the current trip: base * 2^(trips - 1), capped.
   */
  getRecoveryTimeMs(): number {
    const exponent = Math.max(0, this.consecutiveTrips - 1);
    const multiplier = Math.min(Math.pow(2, exponent), MAX_RECOVERY_MULTIPLIER);
    return this.config.recoveryTimeMs * multiplier;
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    this.checkRecovery();

    if (this.state === CircuitState.OPEN) {
      const timeToRecovery = this.getTimeToRecovery();
      throw new CircuitBreakerOpenError(
        `Vision model circuit breaker is OPEN. Try again in ${Math.ceil(timeToRecovery / 1000)}s`,
        timeToRecovery
      );
    }

    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      if (isServerError(error)) {
        this.recordFailure();
      } else {
        console.error(
          `[CircuitBreaker] Client-side error (not counted): ${error instanceof Error ? error.message : String(error)}`
        );
      }
      throw error;
    }
  }

  private checkRecovery(): void {
    if (this.state !== CircuitState.OPEN || this.lastFailureTime === null) return;

    const recoveryTime = this.getRecoveryTimeMs();
    if (Date.now() - this.lastFailureTime >= recoveryTime) {
      console.error(
        `[CircuitBreaker] OPEN -> HALF_OPEN (recovery: ${recoveryTime}ms, trip #${this.consecutiveTrips})`
      );
      this.state = CircuitState.HALF_OPEN;
      this.successCount = 0;
    }
  }

  private recordSuccess(): void {
    if (this.state === CircuitState.CLOSED) {
      this.failureCount = 0;
      return;
    }

    if (this.state === CircuitState.HALF_OPEN) {
      this.successCount++;
      if (this.successCount >= this.config.halfOpenSuccessThreshold) {
        console.error('[CircuitBreaker] Recovery confirmed, HALF_OPEN -> CLOSED');
        this.state = CircuitState.CLOSED;
        this.failureCount = 0;
        this.successCount = 0;
        this.lastFailureTime = null;
        this.consecutiveTrips = 0;
      }
    }
  }

  private recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = Date.now();

    const tripping =
      this.state === CircuitState.HALF_OPEN || this.failureCount >= this.config.failureThreshold;
    if (!tripping) {
      console.error(
        `[CircuitBreaker] Failure recorded (${this.failureCount}/${this.config.failureThreshold})`
      );
      return;
    }

    this.consecutiveTrips++;
    this.state = CircuitState.OPEN;
    this.successCount = 0;
    console.error(
      `[CircuitBreaker] -> OPEN after ${this.failureCount} failure(s) (trip #${this.consecutiveTrips}, recovery: ${this.getRecoveryTimeMs()}ms)`
    );
  }

  private getTimeToRecovery(): number {
    if (this.lastFailureTime === null) return 0;
    return Math.max(0, this.getRecoveryTimeMs() - (Date.now() - this.lastFailureTime));
  }

  isOpen(): boolean {
    return this.getState() === CircuitState.OPEN;
  }

  getStatus(): CircuitBreakerStatus {
    this.checkRecovery();
    return {
      state: this.state,
      failureCount: this.failureCount,
      lastFailureTime: this.lastFailureTime,
      timeToRecovery: this.state === CircuitState.OPEN ? this.getTimeToRecovery() : null,
    };
  }

  getState(): CircuitState {
    this.checkRecovery();
    return this.state;
  }

  reset(): void {
    this.state = CircuitState.CLOSED;
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureTime = null;
    this.consecutiveTrips = 0;
    console.error('[CircuitBreaker] Manually reset to CLOSED');
  }
}

/**
 * Thrown instead of calling the model while the breaker is open
 */
export class CircuitBreakerOpenError extends Error {
  readonly timeToRecovery: number;

  constructor(message: string, timeToRecovery: number) {
    super(message);
    this.name = 'CircuitBreakerOpenError';
    this.timeToRecovery = timeToRecovery;
  }
}
