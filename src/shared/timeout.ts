/**
 * Timeout Utilities
 *
 * Bounds the in-flight duration of tool calls and ties them to the
 * caller's cancellation signal.
 */

import { StackpilotError } from "./errors.js";
import { createLogger } from "./logger.js";

const logger = createLogger("timeout");

/** Timeout error thrown when operations exceed time limit */
export class TimeoutError extends Error {
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`Operation '${operation}' timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

/** Raised when the caller abandoned the call before it finished */
export class CancelledError extends Error {
  readonly operation: string;

  constructor(operation: string) {
    super(`Operation '${operation}' was cancelled`);
    this.name = "CancelledError";
    this.operation = operation;
  }
}

/**
 * Wraps an async operation with a timeout.
 *
 * The function receives a signal that aborts on timeout or when `signal`
 * aborts. Errors the operation already classified (StackpilotError) pass
 * through; anything else thrown after an abort is reported as the abort.
 *
 * @param operation - Name of the operation for error messages
 * @param fn - Async function to execute
 * @param timeoutMs - Timeout in milliseconds
 * @param signal - Optional AbortSignal to cancel the operation
 */
export async function withTimeout<T>(
  operation: string,
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const combinedSignal = signal
    ? createCombinedSignal(signal, controller.signal)
    : controller.signal;

  const timeoutId = setTimeout(() => {
    logger.warn("Operation timed out", { operation, timeoutMs });
    controller.abort(new TimeoutError(operation, timeoutMs));
  }, timeoutMs);

  try {
    return await fn(combinedSignal);
  } catch (error) {
    if (error instanceof StackpilotError || error instanceof TimeoutError) {
      throw error;
    }

    if (controller.signal.aborted && controller.signal.reason instanceof TimeoutError) {
      throw controller.signal.reason;
    }

    if (signal?.aborted) {
      throw new CancelledError(operation);
    }

    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Creates a combined AbortSignal that triggers when either signal is aborted.
 */
function createCombinedSignal(signal1: AbortSignal, signal2: AbortSignal): AbortSignal {
  const controller = new AbortController();

  const abort1 = (): void => {
    controller.abort(signal1.reason);
  };
  const abort2 = (): void => {
    controller.abort(signal2.reason);
  };

  if (signal1.aborted) {
    controller.abort(signal1.reason);
  } else {
    signal1.addEventListener("abort", abort1, { once: true });
  }

  if (signal2.aborted) {
    controller.abort(signal2.reason);
  } else {
    signal2.addEventListener("abort", abort2, { once: true });
  }

  return controller.signal;
}
