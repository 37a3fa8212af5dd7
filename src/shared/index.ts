/**
 * Shared utilities exports
 */

export { createLogger, setMcpServer, Logger, type LogContext } from "./logger.js";
export {
  StackpilotError,
  SchemaError,
  BackendVersionError,
  UnknownToolError,
  InvalidArgumentsError,
  UpstreamUnreachableError,
  ResponseTooLargeError,
  ApiError,
  ValidationError,
  formatErrorResponse,
  type ErrorCode,
  type ErrorResponse,
} from "./errors.js";
export { withRetry, type RetryOptions } from "./retry.js";
export { withTimeout, TimeoutError, CancelledError } from "./timeout.js";
export { withSpan, SpanAttributes, SpanOperations, Sentry } from "./tracing.js";
