/**
 * Retry Utility with Exponential Backoff
 *
 * Provides a centralized retry mechanism with exponential backoff for transient failures.
 * Supports configurable retry attempts, delays, retryable error detection and cancellation.
 */

import { logger } from './logger.js';
import { OperationCancelledError, RequestTimeoutError } from '../types/errors.js';
import { sleep, throwIfAborted } from './withTimeout.js';

/**
 * Configuration for retry behavior
 */
export interface RetryConfig {
  /** Number of retries after the first attempt (default: 1) */
  maxRetries?: number;
  /** Initial delay in milliseconds (default: 1000) */
  initialDelay?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelay?: number;
  /** Exponential backoff multiplier (default: 2) */
  multiplier?: number;
  /** Function to determine if an error is retryable (default: retries on transient errors) */
  isRetryable?: (error: unknown) => boolean;
  /** Aborts the current attempt's backoff wait and prevents further attempts */
  signal?: AbortSignal;
  /** Called before each attempt with the zero-based attempt index */
  onAttempt?: (attempt: number) => void;
}

const DEFAULT_RETRY_CONFIG = {
  maxRetries: 1,
  initialDelay: 1000,
  maxDelay: 30000,
  multiplier: 2,
};

function readNumber(error: object, key: string): number | undefined {
  const value: unknown = Reflect.get(error, key);
  return typeof value === 'number' ? value : undefined;
}

function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || (status >= 500 && status < 600);
}

/**
 * Default retryable error detection
 * Retries on timeouts, 408, 429, 5xx and connection-level errors
 */
function defaultIsRetryable(error: unknown): boolean {
  if (error instanceof OperationCancelledError) {
    return false;
  }
  if (error instanceof RequestTimeoutError) {
    return true;
  }

  if (error && typeof error === 'object') {
    // SDK errors expose `status`, our service errors `statusCode`
    const status = readNumber(error, 'status') ?? readNumber(error, 'statusCode');
    if (status !== undefined) {
      return isTransientStatus(status);
    }

    const code: unknown = Reflect.get(error, 'code');
    if (code === 'ECONNRESET' || code === 'ETIMEDOUT' || code === 'ECONNREFUSED' || code === 'EAI_AGAIN') {
      return true;
    }
  }

  if (error instanceof Error) {
    if (error.name === 'ServiceRateLimitError') {
      return true;
    }
    const message = error.message.toLowerCase();
    if (
      message.includes('timeout') ||
      message.includes('timed out') ||
      message.includes('connection') ||
      message.includes('network') ||
      message.includes('socket hang up')
    ) {
      return true;
    }
  }

  return false;
}

/**
 * Calculate exponential backoff delay
 *
 * @param attempt - Current attempt number (0-indexed)
 */
function calculateExponentialBackoff(
  attempt: number,
  initialDelay: number,
  multiplier: number,
  maxDelay: number
): number {
  const delay = initialDelay * Math.pow(multiplier, attempt);
  return Math.min(delay, maxDelay);
}

/**
 * Retry-After hint carried by rate limit errors, in milliseconds
 */
function getRetryAfterDelay(error: unknown): number | null {
  if (error && typeof error === 'object') {
    const seconds = readNumber(error, 'retryAfterSeconds');
    if (seconds !== undefined && seconds > 0) {
      return seconds * 1000;
    }
  }
  return null;
}

/**
 * Retry an operation with exponential backoff
 *
 * @param operation - The operation to retry, given the zero-based attempt index
 * @param config - Retry configuration
 * @param context - Optional context for logging (e.g., operation name)
 * @returns Result of the operation
 * @throws The last error if all retries are exhausted, or OperationCancelledError
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  config: RetryConfig = {},
  context?: string
): Promise<T> {
  const {
    maxRetries = DEFAULT_RETRY_CONFIG.maxRetries,
    initialDelay = DEFAULT_RETRY_CONFIG.initialDelay,
    maxDelay = DEFAULT_RETRY_CONFIG.maxDelay,
    multiplier = DEFAULT_RETRY_CONFIG.multiplier,
    isRetryable = defaultIsRetryable,
    signal,
    onAttempt,
  } = config;

  const contextStr = context ? ` (${context})` : '';
  const totalAttempts = maxRetries + 1;

  for (let attempt = 0; ; attempt++) {
    throwIfAborted(signal, context);
    onAttempt?.(attempt);

    try {
      const result = await operation(attempt);

      if (attempt > 0) {
        logger.info(
          { attempt: attempt + 1, maxAttempts: totalAttempts, context },
          `Operation succeeded after ${attempt} retry attempts${contextStr}`
        );
      }

      return result;
    } catch (error) {
      if (!isRetryable(error)) {
        logger.debug(
          {
            attempt: attempt + 1,
            maxAttempts: totalAttempts,
            error: error instanceof Error ? error.message : String(error),
            context,
          },
          `Non-retryable error encountered${contextStr}`
        );
        throw error;
      }

      if (attempt >= maxRetries) {
        logger.error(
          {
            attempt: attempt + 1,
            maxAttempts: totalAttempts,
            error: error instanceof Error ? error.message : String(error),
            context,
          },
          `Operation failed after ${totalAttempts} attempts${contextStr}`
        );
        throw error;
      }

      const retryAfterDelay = getRetryAfterDelay(error);
      const delay = retryAfterDelay !== null
        ? Math.min(retryAfterDelay, maxDelay)
        : calculateExponentialBackoff(attempt, initialDelay, multiplier, maxDelay);

      logger.warn(
        {
          attempt: attempt + 1,
          maxAttempts: totalAttempts,
          delay,
          error: error instanceof Error ? error.message : String(error),
          context,
        },
        `Retrying operation${contextStr} (attempt ${attempt + 2}/${totalAttempts})`
      );

      await sleep(delay, signal);
    }
  }
}
