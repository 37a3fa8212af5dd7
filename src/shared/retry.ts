/**
 * Retry Handler
 *
 * Exponential backoff with jitter for idempotent backend reads.
 */

import {
  MAX_RETRY_ATTEMPTS,
  RETRY_BASE_DELAY_MS,
  RETRY_JITTER_MAX,
  RETRY_JITTER_MIN,
  RETRY_MAX_DELAY_MS,
} from "./constants.js";
import { createLogger } from "./logger.js";

const logger = createLogger("RetryHandler");

export interface RetryOptions {
  /** Maximum number of retry attempts */
  maxRetries: number;
  /** Base delay in milliseconds for exponential backoff */
  baseDelayMs: number;
  /** Maximum delay cap in milliseconds */
  maxDelayMs: number;
  /** Add randomization to prevent thundering herd */
  jitter: boolean;
  /** Stop retrying once this signal aborts */
  signal?: AbortSignal;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxRetries: MAX_RETRY_ATTEMPTS,
  baseDelayMs: RETRY_BASE_DELAY_MS,
  maxDelayMs: RETRY_MAX_DELAY_MS,
  jitter: true,
};

/**
 * Execute a function with retry logic.
 *
 * Client errors (4xx) and aborted calls are never retried.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);

      if (opts.signal?.aborted || isNonRetryable(error)) {
        logger.debug("Non-retryable error", { error: message });
        throw error;
      }

      if (attempt >= opts.maxRetries) {
        logger.warn("All retry attempts exhausted", {
          attempts: attempt + 1,
          error: message,
        });
        throw error;
      }

      const delay = calculateDelay(attempt, opts);

      logger.debug("Retrying after failure", {
        attempt: attempt + 1,
        maxRetries: opts.maxRetries,
        delayMs: delay,
        error: message,
      });

      await sleep(delay);
    }
  }
}

/**
 * Calculate delay for exponential backoff with optional jitter.
 */
function calculateDelay(attempt: number, options: RetryOptions): number {
  let delay = Math.min(options.baseDelayMs * Math.pow(2, attempt), options.maxDelayMs);

  if (options.jitter) {
    delay = delay * (RETRY_JITTER_MIN + Math.random() * (RETRY_JITTER_MAX - RETRY_JITTER_MIN));
  }

  return Math.round(delay);
}

/**
 * Client errors will fail the same way again.
 */
function isNonRetryable(error: unknown): boolean {
  if (
    error &&
    typeof error === "object" &&
    "statusCode" in error &&
    typeof error.statusCode === "number"
  ) {
    return error.statusCode >= 400 && error.statusCode < 500;
  }
  return false;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
