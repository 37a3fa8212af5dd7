/**
 * Tracing Utilities
 *
 * Span helpers on top of Sentry's OpenTelemetry integration.
 * Without a DSN, Sentry is not initialised and spans are no-ops.
 */

import * as Sentry from "@sentry/node";

export const SpanAttributes = {
  HTTP_METHOD: "http.method",
  HTTP_URL: "http.url",

  PORTAINER_ENVIRONMENT: "portainer.environment_id",
  PORTAINER_ENGINE: "portainer.engine",

  MCP_TOOL: "mcp.tool.name",
} as const;

export const SpanOperations = {
  HTTP_CLIENT: "http.client",
  MCP_TOOL_CALL: "mcp.tool",
  PROXY_REQUEST: "proxy.request",
} as const;

/**
 * Wrap an async operation with a span.
 * Sentry marks the span as errored when `fn` rejects.
 *
 * @param name - Human-readable span name
 * @param op - Operation type (e.g., "http.client")
 */
export async function withSpan<T>(
  name: string,
  op: string,
  fn: () => Promise<T>,
  attributes?: Record<string, string | number | boolean>
): Promise<T> {
  return Sentry.startSpan({ name, op, attributes }, () => fn());
}

export { Sentry };
