/**
 * Rate Governor
 *
 * Sliding-window admission control for outbound model calls. Each provider
 * keeps the timestamps of its admitted calls; entries older than the window
 * are pruned lazily on the next check for that provider.
 *
 * Admission for one provider is serialised behind that provider's own lock,
 * so a caller blocked on a full window never holds up other providers.
 */

import { normalizeProvider } from '../config/index.js';
import { InvalidQuotaError } from '../utils/errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { sleep as defaultSleep, type SleepFn } from '../utils/sleep.js';

export interface Quota {
  /** Maximum admitted calls inside the window */
  calls: number;
  /** Window length in seconds */
  window: number;
}

export interface AdmitOptions {
  /** Wait for a free slot instead of refusing (default true) */
  blocking?: boolean;
  /** Aborts a pending wait; the call is then refused */
  signal?: AbortSignal;
}

export interface Headroom {
  remaining: number;
  /** Seconds until the oldest recorded call leaves the window */
  resetInSeconds: number;
}

export interface RateGovernorOptions {
  /** Per-provider overrides merged over DEFAULT_QUOTAS */
  limits?: Record<string, Quota>;
  /** Clock in milliseconds */
  now?: () => number;
  sleep?: SleepFn;
  logger?: Logger;
}

export const DEFAULT_PROVIDER = 'default';

export const DEFAULT_QUOTAS: Readonly<Record<string, Quota>> = {
  openai: { calls: 50, window: 60 },
  anthropic: { calls: 50, window: 60 },
  google: { calls: 60, window: 60 },
  gemini: { calls: 60, window: 60 },
  [DEFAULT_PROVIDER]: { calls: 100, window: 60 },
};

/** Added to computed waits so the oldest call has certainly left the window */
const WAIT_MARGIN_SECONDS = 0.1;

function validateQuota(provider: string, quota: Quota): Quota {
  if (!Number.isInteger(quota.calls) || quota.calls <= 0) {
    throw new InvalidQuotaError(provider, `calls must be a positive integer, got ${quota.calls}`);
  }
  if (!Number.isFinite(quota.window) || quota.window <= 0) {
    throw new InvalidQuotaError(provider, `window must be a positive number of seconds, got ${quota.window}`);
  }
  return { calls: quota.calls, window: quota.window };
}

export class RateGovernor {
  private readonly limits = new Map<string, Quota>();
  private readonly history = new Map<string, number[]>();
  private readonly locks = new Map<string, Promise<void>>();
  private readonly now: () => number;
  private readonly sleep: SleepFn;
  private readonly log: Logger;

  constructor(options: RateGovernorOptions = {}) {
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.log = options.logger ?? rootLogger.child('[rate]');

    for (const [provider, quota] of Object.entries({ ...DEFAULT_QUOTAS, ...options.limits })) {
      this.setLimit(provider, quota.calls, quota.window);
    }
  }

  /**
   * Set a custom limit for a provider. Non-positive values are rejected.
   */
  setLimit(provider: string, calls: number, window: number): void {
    const id = normalizeProvider(provider);
    this.limits.set(id, validateQuota(id, { calls, window }));
  }

  /**
   * Limit in force for a provider (the default quota when unknown)
   */
  getLimit(provider: string): Quota {
    const id = normalizeProvider(provider);
    const quota = this.limits.get(id) ?? this.limits.get(DEFAULT_PROVIDER);
    return { ...(quota ?? DEFAULT_QUOTAS[DEFAULT_PROVIDER]) };
  }

  /**
   * Ask to make one call. Resolves true once the call is admitted and
   * recorded, false if refused (non-blocking and full, or aborted).
   */
  admit(provider: string, options: AdmitOptions = {}): Promise<boolean> {
    const id = normalizeProvider(provider);
    return this.withLock(id, () => this.admitLocked(id, options));
  }

  /**
   * Quota headroom without recording a call
   */
  remaining(provider: string): Headroom {
    const id = normalizeProvider(provider);
    const { calls, window } = this.getLimit(id);
    const now = this.seconds();
    const recorded = this.prune(id, now, window);

    if (recorded.length === 0) {
      return { remaining: calls, resetInSeconds: 0 };
    }

    const reset = window - (now - Math.min(...recorded));
    return {
      remaining: Math.max(0, calls - recorded.length),
      resetInSeconds: Math.min(window, Math.max(0, reset)),
    };
  }

  /**
   * Forget recorded calls for one provider, or for all of them
   */
  reset(provider?: string): void {
    if (provider === undefined) {
      this.history.clear();
    } else {
      this.history.delete(normalizeProvider(provider));
    }
  }

  private async admitLocked(id: string, options: AdmitOptions): Promise<boolean> {
    const { blocking = true, signal } = options;
    if (signal?.aborted) {
      return false;
    }

    const { calls, window } = this.getLimit(id);
    let now = this.seconds();
    let recorded = this.prune(id, now, window);

    while (recorded.length >= calls) {
      if (!blocking) {
        this.log.debug(`Rate limit reached for ${id}, refusing call`);
        return false;
      }

      const wait = window - (now - Math.min(...recorded)) + WAIT_MARGIN_SECONDS;
      this.log.info(`Rate limit reached for ${id}. Waiting ${wait.toFixed(1)}s...`);

      const completed = await this.sleep(wait * 1000, signal);
      if (!completed || signal?.aborted) {
        this.log.info(`Wait for ${id} rate limit aborted`);
        return false;
      }

      now = this.seconds();
      recorded = this.prune(id, now, window);
    }

    recorded.push(now);
    return true;
  }

  /**
   * Drop timestamps at or before `now - window`. Returns the live list.
   */
  private prune(id: string, now: number, window: number): number[] {
    const cutoff = now - window;
    const recorded = (this.history.get(id) ?? []).filter((t) => t > cutoff);
    this.history.set(id, recorded);
    return recorded;
  }

  private seconds(): number {
    return this.now() / 1000;
  }

  /**
   * Run `fn` after every earlier holder of this provider's lock has finished
   */
  private async withLock<T>(id: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(id) ?? Promise.resolve();
    const current = previous.then(fn);
    const tail = current.then(
      () => undefined,
      () => undefined,
    );
    this.locks.set(id, tail);

    try {
      return await current;
    } finally {
      if (this.locks.get(id) === tail) {
        this.locks.delete(id);
      }
    }
  }
}
