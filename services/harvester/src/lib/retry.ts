import { setTimeout as delay } from 'node:timers/promises';
import type { Logger } from '../logger.js';
import { errorMessage } from '../errors.js';

export interface RetryConfig {
  /** Total attempts including the first one (default: 3) */
  maxAttempts?: number;
  /** Fixed wait between attempts in milliseconds (default: 5000) */
  backoffMs?: number;
  /** Decides whether a failure is worth another attempt (default: every failure) */
  isRetryable?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<unknown>;
  logger?: Logger;
}

/**
 * Retry policy wrapping a single network-bound call. Independent of the
 * pool: each item owns its own retries.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly backoffMs: number;
  private readonly isRetryable: (error: unknown) => boolean;
  private readonly sleep: (ms: number) => Promise<unknown>;
  private readonly logger?: Logger;

  constructor(config: RetryConfig = {}) {
    this.maxAttempts = Math.max(1, config.maxAttempts ?? 3);
    this.backoffMs = config.backoffMs ?? 5000;
    this.isRetryable = config.isRetryable ?? (() => true);
    this.sleep = config.sleep ?? ((ms) => delay(ms));
    this.logger = config.logger;
  }

  /** Runs `operation` until it succeeds; rethrows the last failure once attempts are spent. */
  async run<T>(operation: (attempt: number) => Promise<T>, context?: string): Promise<T> {
    let lastError: unknown;
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        return await operation(attempt);
      } catch (e) {
        lastError = e;
        if (attempt === this.maxAttempts || !this.isRetryable(e)) break;
        this.logger?.debug({
          msg: 'attempt failed, retrying',
          context,
          attempt,
          maxAttempts: this.maxAttempts,
          delayMs: this.backoffMs,
          error: errorMessage(e),
        });
        await this.sleep(this.backoffMs);
      }
    }
    throw lastError;
  }
}
