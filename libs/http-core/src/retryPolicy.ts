import { setTimeout as sleep } from 'timers/promises';
import { z } from 'zod';
import { CanceledError, ClientError, ConfigurationError, RateLimitError, isRetryableError, toClientError } from './errors';
import type { RetryOptions, Scheduler } from './types';

const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_BASE_DELAY_MS = 500;
const DEFAULT_MAX_DELAY_MS = 30_000;
const DEFAULT_JITTER = 0.2;
const DEFAULT_MAX_SUGGESTED_DELAY_MS = 60_000;

export const retryOptionsSchema = z.object({
  maxRetries: z.number().int().min(0).optional(),
  baseDelayMs: z.number().min(0).optional(),
  maxDelayMs: z.number().min(0).optional(),
  jitter: z.number().min(0).max(1).optional(),
  maxSuggestedDelayMs: z.number().min(0).optional(),
});

export const timerScheduler: Scheduler = {
  sleep: (ms, signal) => sleep(ms, undefined, { signal }),
};

export interface RetryInfo {
  /** The attempt that just failed. */
  attempt: number;
  delayMs: number;
  error: ClientError;
}

export interface ExecuteOptions {
  retrySafe: boolean;
  signal?: AbortSignal;
  onRetry?: (info: RetryInfo) => void;
}

export interface RetryPolicyDeps {
  scheduler?: Scheduler;
  random?: () => number;
}

/**
 * Bounded retry with exponential backoff and jitter. Only rate-limit and
 * transient network failures are retried, and only for retry-safe calls.
 * A server-supplied delay hint always wins over the computed backoff.
 */
export class RetryPolicy {
  readonly maxRetries: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly jitter: number;
  private readonly maxSuggestedDelayMs: number;
  private readonly scheduler: Scheduler;
  private readonly random: () => number;

  constructor(options: RetryOptions = {}, deps: RetryPolicyDeps = {}) {
    const parsed = retryOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid retry options: ${parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`);
    }
    this.maxRetries = parsed.data.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.baseDelayMs = parsed.data.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
    this.maxDelayMs = parsed.data.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
    this.jitter = parsed.data.jitter ?? DEFAULT_JITTER;
    this.maxSuggestedDelayMs = parsed.data.maxSuggestedDelayMs ?? DEFAULT_MAX_SUGGESTED_DELAY_MS;
    this.scheduler = deps.scheduler ?? timerScheduler;
    this.random = deps.random ?? Math.random;
  }

  /** Delay before the attempt following `attempt`. */
  delayFor(attempt: number, error: ClientError): number {
    if (error instanceof RateLimitError && error.retryAfterMs !== undefined) {
      return Math.min(error.retryAfterMs, this.maxSuggestedDelayMs);
    }
    const exponential = Math.min(this.maxDelayMs, this.baseDelayMs * 2 ** (attempt - 1));
    const factor = 1 - this.jitter + this.random() * 2 * this.jitter;
    return Math.round(Math.min(this.maxDelayMs, exponential * factor));
  }

  async execute<T>(operation: (attempt: number) => Promise<T>, options: ExecuteOptions): Promise<T> {
    const { signal } = options;
    for (let attempt = 1; ; attempt += 1) {
      if (signal?.aborted) {
        throw withAttempts(new CanceledError('Request was canceled', { cause: signal.reason }), attempt - 1);
      }

      try {
        return await operation(attempt);
      } catch (caught) {
        let error = toClientError(caught);
        if (signal?.aborted && !(error instanceof CanceledError)) {
          error = new CanceledError('Request was canceled', { cause: caught });
        }

        const retryable = options.retrySafe && isRetryableError(error) && attempt <= this.maxRetries;
        if (!retryable) {
          throw withAttempts(error, attempt);
        }

        const delayMs = this.delayFor(attempt, error);
        options.onRetry?.({ attempt, delayMs, error });
        try {
          await this.scheduler.sleep(delayMs, signal);
        } catch (sleepError) {
          throw withAttempts(
            new CanceledError('Request was canceled while waiting to retry', { cause: sleepError }),
            attempt,
          );
        }
      }
    }
  }
}

function withAttempts<E extends ClientError>(error: E, attempts: number): E {
  error.attempts = attempts;
  return error;
}
