import type { ErrorKind } from '../errors';

export interface RetryPolicyConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterRatio: number;
}

export const DEFAULT_RETRY_POLICY_CONFIG: RetryPolicyConfig = {
  maxAttempts: 5,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
  jitterRatio: 0.2,
};

export type RetryDecision = { action: 'retry'; afterMs: number } | { action: 'give-up' };

/**
 * FNV-1a over the key and attempt, mapped to [0, 1).
 */
function hashToUnit(key: string, attempt: number): number {
  let hash = 0x811c9dc5;
  const input = `${key}:${attempt}`;
  for (let i = 0; i < input.length; i += 1) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return (hash >>> 0) / 0x1_0000_0000;
}

/**
 * Decides whether a failed attempt is retried and after how long.
 *
 * Pure in `(attempt, errorKind, key)`: the jitter comes from a hash of the
 * key instead of a random source, so a replayed orchestration reaches the
 * same decision it made the first time.
 */
export class RetryPolicy {
  readonly config: RetryPolicyConfig;

  constructor(config: Partial<RetryPolicyConfig> = {}) {
    this.config = { ...DEFAULT_RETRY_POLICY_CONFIG, ...config };
    if (!Number.isInteger(this.config.maxAttempts) || this.config.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${this.config.maxAttempts}`);
    }
  }

  /**
   * @param attempt 1-based number of the attempt that just failed.
   * @param key Stable identity of the call, used only to spread jitter.
   */
  decide(attempt: number, errorKind: ErrorKind, key = ''): RetryDecision {
    if (errorKind === 'permanent' || attempt >= this.config.maxAttempts) {
      return { action: 'give-up' };
    }

    return { action: 'retry', afterMs: this.backoffMs(attempt, key) };
  }

  backoffMs(attempt: number, key = ''): number {
    const { baseDelayMs, maxDelayMs, jitterRatio } = this.config;
    const exponential = Math.min(maxDelayMs, baseDelayMs * 2 ** Math.max(0, attempt - 1));
    const jitter = (hashToUnit(key, attempt) * 2 - 1) * jitterRatio;
    return Math.max(0, Math.round(exponential * (1 + jitter)));
  }
}
