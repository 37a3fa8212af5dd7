/**
 * Custom Error Classes
 *
 * Structured errors for consistent handling across the application.
 * Every per-call failure carries a stable code that reaches the agent;
 * SchemaError and BackendVersionError only ever surface at startup.
 */

export type ErrorCode =
  | "SCHEMA_ERROR"
  | "BACKEND_VERSION_ERROR"
  | "UNKNOWN_TOOL"
  | "INVALID_ARGUMENTS"
  | "HANDLER_FAILURE"
  | "UPSTREAM_UNREACHABLE"
  | "RESPONSE_TOO_LARGE"
  | "API_ERROR"
  | "VALIDATION_ERROR";

/** Base error for the MCP server */
export class StackpilotError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = "StackpilotError";
    this.code = code;
    this.details = details;
  }
}

/** Tool catalog is malformed or older than this build supports */
export class SchemaError extends StackpilotError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "SCHEMA_ERROR", details);
    this.name = "SchemaError";
  }
}

/** Portainer server runs a version the handlers were not written for */
export class BackendVersionError extends StackpilotError {
  readonly actual: string;
  readonly supported: string;

  constructor(actual: string, supported: string) {
    super(
      `unsupported Portainer server version: ${actual}, only version ${supported} is supported`,
      "BACKEND_VERSION_ERROR",
      { actual, supported }
    );
    this.name = "BackendVersionError";
    this.actual = actual;
    this.supported = supported;
  }
}

/** Tool name not in the registry (never declared, or hidden by read-only mode) */
export class UnknownToolError extends StackpilotError {
  constructor(toolName: string) {
    super(`Unknown tool: ${toolName}`, "UNKNOWN_TOOL", { tool: toolName });
    this.name = "UnknownToolError";
  }
}

/** Call arguments rejected before any handler or network call ran */
export class InvalidArgumentsError extends StackpilotError {
  readonly field: string;
  readonly reason: string;

  constructor(field: string, reason: string) {
    super(`Invalid argument '${field}': ${reason}`, "INVALID_ARGUMENTS", { field });
    this.name = "InvalidArgumentsError";
    this.field = field;
    this.reason = reason;
  }
}

/** Proxy could not reach the target engine (refused, reset, timed out) */
export class UpstreamUnreachableError extends StackpilotError {
  readonly target: string;

  constructor(target: string, reason: string) {
    super(`Upstream ${target} unreachable: ${reason}`, "UPSTREAM_UNREACHABLE", { target });
    this.name = "UpstreamUnreachableError";
    this.target = target;
  }
}

/** Buffered proxy body exceeded the configured bound */
export class ResponseTooLargeError extends StackpilotError {
  readonly limitBytes: number;

  constructor(limitBytes: number) {
    super(
      `Upstream response exceeded ${limitBytes} bytes; retry with a progress token to stream it`,
      "RESPONSE_TOO_LARGE",
      { limitBytes }
    );
    this.name = "ResponseTooLargeError";
    this.limitBytes = limitBytes;
  }
}

/** Portainer API answered a typed call with a non-2xx status */
export class ApiError extends StackpilotError {
  readonly statusCode: number;
  readonly endpoint: string;

  constructor(
    message: string,
    statusCode: number,
    endpoint: string,
    details?: Record<string, unknown>
  ) {
    super(message, "API_ERROR", { ...details, statusCode, endpoint });
    this.name = "ApiError";
    this.statusCode = statusCode;
    this.endpoint = endpoint;
  }
}

/** Backend payload did not have the expected shape */
export class ValidationError extends StackpilotError {
  readonly field: string;
  readonly value: unknown;

  constructor(message: string, field: string, value: unknown) {
    super(message, "VALIDATION_ERROR", { field, value });
    this.name = "ValidationError";
    this.field = field;
    this.value = value;
  }
}

/** Format error for MCP tool response */
export type ErrorResponse = {
  content: [{ type: "text"; text: string }];
  isError: true;
};

export function formatErrorResponse(code: string, message: string, field?: string): ErrorResponse {
  return {
    content: [
      {
        type: "text" as const,
        text: JSON.stringify({ error: message, code, ...(field ? { field } : {}) }, null, 2),
      },
    ],
    isError: true,
  };
}
