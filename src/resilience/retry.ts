/**
 * Retry logic with exponential backoff for direct uploads
 * @module dataverse-direct-upload/resilience/retry
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { RetryConfig } from '../config/index.js';
import {
  CancelledError,
  DirectUploadError,
  isRetryableError,
  summarizeError,
  type ErrorSummary,
} from '../errors/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';

/**
 * Sleeps for `ms` milliseconds; rejects if the signal aborts first.
 */
export type SleepFunction = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Information passed to retry listeners before each wait
 */
export interface RetryNotice {
  /** Attempt that just failed, 1-based */
  attempt: number;
  delayMs: number;
  error: ErrorSummary;
}

/**
 * Per-call options for {@link RetryExecutor.execute}
 */
export interface ExecuteOptions {
  /** Accumulates attempts across the call; a fresh one is made if omitted */
  state?: RetryState;
  signal?: AbortSignal;
  /** Label used in retry log lines */
  operationName?: string;
  onRetry?: (notice: RetryNotice) => void;
}

/**
 * Retry executor options
 */
export interface RetryExecutorOptions extends RetryConfig {
  logger?: Logger;
  sleep?: SleepFunction;
  random?: () => number;
}

/**
 * Attempt bookkeeping for one logical operation. Not persisted.
 */
export class RetryState {
  attempts = 0;
  elapsedWaitMs = 0;
  lastError: unknown = undefined;

  /** Retries consumed so far */
  get retries(): number {
    return Math.max(0, this.attempts - 1);
  }
}

const defaultSleep: SleepFunction = async (ms, signal) => {
  await delay(ms, undefined, signal ? { signal } : undefined);
};

/**
 * Retry executor that handles retryable errors with exponential backoff
 */
export class RetryExecutor {
  private readonly config: RetryConfig;
  private readonly logger: Logger;
  private readonly sleep: SleepFunction;
  private readonly random: () => number;

  constructor(options: RetryExecutorOptions) {
    this.config = {
      maxRetries: options.maxRetries,
      minDelayMs: options.minDelayMs,
      maxDelayMs: options.maxDelayMs,
      multiplier: options.multiplier,
      jitterFactor: Math.min(1, Math.max(0, options.jitterFactor)),
    };
    this.logger = options.logger ?? new NoopLogger();
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  /** Total attempts allowed per operation */
  get maxAttempts(): number {
    return Math.max(1, this.config.maxRetries);
  }

  /**
   * Executes an operation with retry logic.
   *
   * The operation receives the 1-based attempt number. Non-retryable errors
   * propagate on first occurrence; once the budget is spent the last error
   * is rethrown.
   */
  async execute<T>(
    operation: (attempt: number) => Promise<T>,
    options: ExecuteOptions = {}
  ): Promise<T> {
    const state = options.state ?? new RetryState();
    const { signal } = options;

    for (;;) {
      if (signal?.aborted) {
        throw CancelledError.aborted(options.operationName);
      }

      state.attempts++;
      try {
        return await operation(state.attempts);
      } catch (error) {
        state.lastError = error;

        if (signal?.aborted) {
          throw error instanceof CancelledError ? error : CancelledError.aborted(options.operationName);
        }
        if (!this.willRetry(error, state.attempts, signal)) {
          throw error;
        }

        const delayMs = this.calculateDelay(state.attempts - 1, error);
        const summary = summarizeError(error);
        this.logRetry(state.attempts, delayMs, summary, options.operationName);
        options.onRetry?.({ attempt: state.attempts, delayMs, error: summary });

        try {
          await this.sleep(delayMs, signal);
        } catch (sleepError) {
          throw signal?.aborted ? CancelledError.aborted(options.operationName) : sleepError;
        }
        state.elapsedWaitMs += delayMs;
      }
    }
  }

  /**
   * Whether {@link execute} retries after `error` ends attempt `attempt` (1-based).
   */
  willRetry(error: unknown, attempt: number, signal?: AbortSignal): boolean {
    return !signal?.aborted && isRetryableError(error) && attempt < this.maxAttempts;
  }

  /**
   * Calculates the wait before the retry following failed attempt `attempt` (0-based).
   *
   * A Retry-After hint on the error takes precedence; every result lies in
   * `[minDelayMs, maxDelayMs]`.
   */
  calculateDelay(attempt: number, error?: unknown): number {
    if (error instanceof DirectUploadError && error.retryAfter !== undefined) {
      return this.clamp(error.retryAfter * 1000);
    }

    const exponentialDelay = this.config.minDelayMs * Math.pow(1 + this.config.multiplier, attempt);
    const base = this.clamp(exponentialDelay);

    if (this.config.jitterFactor === 0) {
      return Math.round(base);
    }

    const jitter = base * this.config.jitterFactor * (this.random() * 2 - 1);
    return Math.round(this.clamp(base + jitter));
  }

  private clamp(ms: number): number {
    return Math.min(this.config.maxDelayMs, Math.max(this.config.minDelayMs, ms));
  }

  private logRetry(attempt: number, delayMs: number, error: ErrorSummary, operationName?: string): void {
    this.logger.warn(
      `Attempt ${attempt}/${this.maxAttempts}${operationName ? ` of ${operationName}` : ''} failed, retrying in ${delayMs}ms`,
      {
        classification: error.classification,
        code: error.code,
        status: error.status,
        message: error.message,
      }
    );
  }
}

/**
 * Creates a retry executor from retry config
 */
export function createRetryExecutor(
  config: RetryConfig,
  options: Omit<RetryExecutorOptions, keyof RetryConfig> = {}
): RetryExecutor {
  return new RetryExecutor({ ...config, ...options });
}
