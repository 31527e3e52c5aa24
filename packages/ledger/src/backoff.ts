/**
 * @tokenledger/ledger — Migration backoff.
 *
 * Paces archive migration retries after failures. Retries are driven by
 * write traffic, so instead of sleeping the backoff records the earliest
 * time the next automatic attempt may start.
 *
 * Delay after the k-th consecutive failure:
 *   min(baseDelayMs * 2^(k-1) + jitter, maxDelayMs)
 * where jitter = random(0, jitterMs)
 */

/**
 * Configuration for migration backoff.
 */
export interface BackoffConfig {
  /** Delay after the first failure. Default: 1000 */
  readonly baseDelayMs: number;
  /** Upper bound on any delay. Default: 300000 */
  readonly maxDelayMs: number;
  /** Maximum random jitter in ms added to each delay. Default: 200 */
  readonly jitterMs: number;
  /** Consecutive failures after which the failure is escalated. Default: 5 */
  readonly alertAfterFailures: number;
}

export const DEFAULT_BACKOFF_CONFIG: BackoffConfig = {
  baseDelayMs: 1000,
  maxDelayMs: 300_000,
  jitterMs: 200,
  alertAfterFailures: 5,
};

/**
 * Compute the delay that follows a run of consecutive failures.
 *
 * @param failures - Consecutive failures so far (1 = first failure)
 */
export function computeDelay(
  failures: number,
  config: BackoffConfig,
  random: () => number = Math.random,
): number {
  const exponential = config.baseDelayMs * Math.pow(2, Math.max(failures - 1, 0));
  const jitter = random() * config.jitterMs;
  return Math.min(exponential + jitter, config.maxDelayMs);
}

/**
 * Outcome of recording a failure.
 */
export interface FailureRecord {
  readonly failures: number;
  readonly delayMs: number;
  readonly nextAttemptAt: number;
  /** True exactly when the failure count reaches alertAfterFailures */
  readonly alert: boolean;
}

export class MigrationBackoff {
  private readonly _config: BackoffConfig;
  private readonly _random: () => number;
  private _failures = 0;
  private _nextAttemptAt: number | undefined;

  constructor(config: BackoffConfig = DEFAULT_BACKOFF_CONFIG, random: () => number = Math.random) {
    this._config = config;
    this._random = random;
  }

  /**
   * Whether an automatic attempt may start at `now`.
   */
  canAttempt(now: number): boolean {
    return this._nextAttemptAt === undefined || now >= this._nextAttemptAt;
  }

  recordFailure(now: number): FailureRecord {
    this._failures++;
    const delayMs = computeDelay(this._failures, this._config, this._random);
    this._nextAttemptAt = now + delayMs;
    return {
      failures: this._failures,
      delayMs,
      nextAttemptAt: this._nextAttemptAt,
      alert: this._failures === this._config.alertAfterFailures,
    };
  }

  recordSuccess(): void {
    this._failures = 0;
    this._nextAttemptAt = undefined;
  }

  get consecutiveFailures(): number {
    return this._failures;
  }

  /** Earliest next automatic attempt, if backing off. */
  get nextAttemptAt(): number | undefined {
    return this._nextAttemptAt;
  }
}
