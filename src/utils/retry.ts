/**
 * Retry helpers for calls to the remote ticket store
 */

import { RemoteApiError } from '../core/errors.js';

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 4000,
  multiplier: 2,
};

export interface RetryLog {
  timestamp: Date;
  attempt: number;
  delay: number;
  success: boolean;
  error?: string;
  nextRetryInMs?: number;
}

export interface RetryOptions {
  /** Decide whether a failure is worth another attempt (default: always) */
  shouldRetry?: (error: unknown) => boolean;
  onLog?: (log: RetryLog) => void;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Sleep utility function
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Executes a function with exponential backoff retry logic.
 * Errors rejected by `shouldRetry` are rethrown as-is.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  options: RetryOptions = {}
): Promise<T> {
  const { shouldRetry = () => true, onLog, sleep: wait = sleep } = options;
  let lastError: unknown = null;
  let delay = config.initialDelayMs;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      const result = await fn();
      onLog?.({ timestamp: new Date(), attempt, delay: 0, success: true });
      return result;
    } catch (error) {
      lastError = error;
      const retryable = shouldRetry(error);
      const willRetry = retryable && attempt < config.maxAttempts;

      onLog?.({
        timestamp: new Date(),
        attempt,
        delay,
        success: false,
        error: error instanceof Error ? error.message : String(error),
        nextRetryInMs: willRetry ? delay : undefined,
      });

      if (!retryable) {
        throw error;
      }
      if (!willRetry) {
        break;
      }

      await wait(delay);
      delay = Math.min(delay * config.multiplier, config.maxDelayMs);
    }
  }

  const lastMessage = lastError instanceof Error ? lastError.message : String(lastError);
  throw new Error(`Failed after ${config.maxAttempts} attempts. Last error: ${lastMessage}`);
}

/**
 * Transient network failures worth retrying. Throttling is not one of them:
 * rate limits are handled by the batch executor's cooldown.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof RemoteApiError) {
    return error.httpStatus !== undefined && error.httpStatus >= 500;
  }

  const errorMessage = error instanceof Error ? error.message.toLowerCase() : '';
  const retryablePatterns = [
    'timeout',
    'econnrefused',
    'econnreset',
    'service unavailable',
    'temporarily unavailable',
    'getaddrinfo enotfound',
    'socket hang up',
  ];

  return retryablePatterns.some((pattern) => errorMessage.includes(pattern));
}

/**
 * Throttling signal from the ticket store. Structured 429s first, then the
 * message text for errors raised outside our client.
 */
export function isRateLimitError(error: unknown): boolean {
  if (error instanceof RemoteApiError) {
    return error.isRateLimited;
  }
  const message = error instanceof Error ? error.message : String(error);
  return message.includes('429') || message.toLowerCase().includes('rate limit');
}
