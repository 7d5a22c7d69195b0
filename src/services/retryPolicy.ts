import { Sleep, sleep as defaultSleep } from '../utils/delay';

/**
 * Transient failure worth another attempt (timeouts, 5xx, 429)
 */
export class RetryableError extends Error {
  constructor(message: string, readonly retryAfterMs?: number) {
    super(message);
    this.name = 'RetryableError';
  }
}

export interface RetryPolicyOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: Sleep;
}

/**
 * Exponential backoff wrapped around any outbound call
 */
export class RetryPolicy {
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly shouldRetry: (error: unknown) => boolean;
  private readonly onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  private readonly sleep: Sleep;

  constructor(options: RetryPolicyOptions) {
    this.maxAttempts = Math.max(1, options.maxAttempts);
    this.baseDelayMs = Math.max(0, options.baseDelayMs);
    this.maxDelayMs = options.maxDelayMs ?? 30000;
    this.shouldRetry = options.shouldRetry ?? (error => error instanceof RetryableError);
    this.onRetry = options.onRetry;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Delay before the attempt following `attempt` (1-based)
   */
  delayFor(attempt: number, error?: unknown): number {
    if (error instanceof RetryableError && error.retryAfterMs !== undefined) {
      return Math.min(this.maxDelayMs, error.retryAfterMs);
    }
    return Math.min(this.maxDelayMs, this.baseDelayMs * 2 ** (attempt - 1));
  }

  async execute<T>(operation: (attempt: number) => Promise<T>): Promise<T> {
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        return await operation(attempt);
      } catch (error) {
        lastError = error;

        if (!this.shouldRetry(error) || attempt === this.maxAttempts) {
          throw error;
        }

        const waitTime = this.delayFor(attempt, error);
        this.onRetry?.(error, attempt, waitTime);
        if (waitTime > 0) {
          await this.sleep(waitTime);
        }
      }
    }

    throw lastError instanceof Error ? lastError : new Error('All attempts failed');
  }
}
