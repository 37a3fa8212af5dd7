/**
 * Dispatch Router
 *
 * Binds catalog declarations to handlers and routes tool calls to them.
 * Registration happens once at startup; afterwards the registry is only
 * read, so concurrent calls need no locking.
 */

import type { ToolCatalog } from "../catalog/loader.js";
import { validateArguments } from "../catalog/schema.js";
import type { ToolAnnotations, ToolArguments, ToolInputSchema } from "../catalog/types.js";
import type { AccessGuard } from "../access/guard.js";
import { InvalidArgumentsError, StackpilotError, UnknownToolError } from "../shared/errors.js";
import { createLogger } from "../shared/logger.js";
import { withTimeout } from "../shared/timeout.js";
import { SpanAttributes, SpanOperations, withSpan } from "../shared/tracing.js";
import type {
  CallFailure,
  CallRequest,
  CallResult,
  DispatchContext,
  FailureKind,
  ToolEntry,
  ToolHandler,
} from "./types.js";

const logger = createLogger("DispatchRouter");

export interface DispatchRouterOptions {
  catalog: ToolCatalog;
  guard: AccessGuard;
  /** Applied to handlers registered without their own timeout */
  defaultTimeoutMs: number;
}

export interface RegisterOptions {
  timeoutMs?: number;
}

/** Shape published through tools/list */
export type ListedTool = {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  annotations: ToolAnnotations;
};

const PASS_THROUGH_CODES: ReadonlySet<string> = new Set<FailureKind>([
  "UNKNOWN_TOOL",
  "INVALID_ARGUMENTS",
  "HANDLER_FAILURE",
  "UPSTREAM_UNREACHABLE",
  "RESPONSE_TOO_LARGE",
]);

function isFailureKind(code: string): code is FailureKind {
  return PASS_THROUGH_CODES.has(code);
}

/**
 * Turn whatever a handler threw into the failure the agent sees.
 * Stack traces and backend payloads stay in the server log.
 */
function toFailure(error: unknown): CallFailure {
  if (error instanceof InvalidArgumentsError) {
    return { kind: "INVALID_ARGUMENTS", message: error.message, field: error.field };
  }
  if (error instanceof StackpilotError && isFailureKind(error.code)) {
    return { kind: error.code, message: error.message };
  }
  // Timeouts, cancellations, API errors and anything unexpected
  if (error instanceof Error) {
    return { kind: "HANDLER_FAILURE", message: error.message };
  }
  return { kind: "HANDLER_FAILURE", message: String(error) };
}

export class DispatchRouter {
  private readonly catalog: ToolCatalog;
  private readonly guard: AccessGuard;
  private readonly defaultTimeoutMs: number;
  private readonly entries = new Map<string, ToolEntry>();

  constructor(options: DispatchRouterOptions) {
    this.catalog = options.catalog;
    this.guard = options.guard;
    this.defaultTimeoutMs = options.defaultTimeoutMs;
  }

  /**
   * Bind a handler to its catalog declaration.
   *
   * Returns false, without error, when the catalog does not declare the
   * tool or the guard refuses it. Registering the same name twice is a
   * programming error and throws.
   */
  registerIfPresent(name: string, handler: ToolHandler, options: RegisterOptions = {}): boolean {
    if (this.entries.has(name)) {
      throw new Error(`Tool '${name}' is already registered`);
    }

    const entry = this.catalog.get(name);
    if (!entry) {
      logger.warn("Tool not declared in catalog, skipping", { tool: name });
      return false;
    }

    if (!this.guard.isAllowed(entry.definition)) {
      logger.debug("Tool hidden by read-only mode", { tool: name });
      return false;
    }

    this.entries.set(name, {
      definition: entry.definition,
      validator: entry.validator,
      handler,
      timeoutMs: options.timeoutMs ?? this.defaultTimeoutMs,
    });
    return true;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get size(): number {
    return this.entries.size;
  }

  /** Registered tools in registration order */
  listDefinitions(): ListedTool[] {
    return [...this.entries.values()].map(({ definition }) => ({
      name: definition.name,
      description: definition.description,
      inputSchema: definition.inputSchema,
      annotations: this.guard.publishedAnnotations(definition),
    }));
  }

  /**
   * Route one call. Never throws: every failure comes back as a
   * CallResult with a stable kind.
   */
  async dispatch(request: CallRequest, context: DispatchContext = {}): Promise<CallResult> {
    const { toolName } = request;
    const entry = this.entries.get(toolName);
    if (!entry) {
      const error = new UnknownToolError(toolName);
      logger.warn("Unknown tool requested", { tool: toolName });
      return { ok: false, failure: { kind: "UNKNOWN_TOOL", message: error.message } };
    }

    let args: ToolArguments;
    try {
      args = validateArguments(entry.validator, request.arguments);
    } catch (error) {
      logger.info("Tool arguments rejected", { tool: toolName, error: String(error) });
      return { ok: false, failure: toFailure(error) };
    }

    const startTime = Date.now();
    try {
      const content = await withSpan(
        `tool ${toolName}`,
        SpanOperations.MCP_TOOL_CALL,
        () =>
          withTimeout(
            toolName,
            (signal) => entry.handler(args, { signal, emitChunk: context.emitChunk }),
            entry.timeoutMs,
            context.signal
          ),
        { [SpanAttributes.MCP_TOOL]: toolName }
      );
      logger.debug("Tool completed", { tool: toolName, durationMs: Date.now() - startTime });
      return { ok: true, content };
    } catch (error) {
      const failure = toFailure(error);
      logger.error("Tool execution failed", error, {
        tool: toolName,
        kind: failure.kind,
        durationMs: Date.now() - startTime,
      });
      return { ok: false, failure };
    }
  }
}
