/**
 * Tool Types
 *
 * Type definitions for tool handlers and the dispatch boundary.
 */

import type { ArgumentValidator, ToolArguments, ToolDefinition } from "../catalog/types.js";

/**
 * Every tool this build can serve. The catalog may declare more (they are
 * reported and skipped) or fewer (the handler is simply not registered).
 */
export const TOOL_NAMES = [
  "listEnvironmentTags",
  "createEnvironmentTag",
  "listEnvironments",
  "updateEnvironmentTags",
  "updateEnvironmentUserAccesses",
  "updateEnvironmentTeamAccesses",
  "listEnvironmentGroups",
  "createEnvironmentGroup",
  "updateEnvironmentGroupName",
  "updateEnvironmentGroupEnvironments",
  "updateEnvironmentGroupTags",
  "listAccessGroups",
  "createAccessGroup",
  "updateAccessGroupName",
  "updateAccessGroupUserAccesses",
  "updateAccessGroupTeamAccesses",
  "addEnvironmentToAccessGroup",
  "removeEnvironmentFromAccessGroup",
  "listStacks",
  "getStackFile",
  "createStack",
  "updateStack",
  "listTeams",
  "createTeam",
  "updateTeamName",
  "updateTeamMembers",
  "listUsers",
  "updateUserRole",
  "getSettings",
  "dockerProxy",
  "kubernetesProxy",
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export type ProxyToolName = "dockerProxy" | "kubernetesProxy";

export type TextContent = { type: "text"; text: string };

/** Ordered content blocks returned by a handler */
export type ToolContent = TextContent[];

export interface ToolContext {
  /** Aborts on timeout or when the caller goes away */
  signal: AbortSignal;
  /**
   * Relay part of a result as it arrives. Present only when the caller
   * can take incremental delivery; `progress` grows with every call.
   */
  emitChunk?: (chunk: string, progress: number) => Promise<void>;
}

/** Tool handler function signature */
export type ToolHandler = (args: ToolArguments, context: ToolContext) => Promise<ToolContent>;

export type ToolHandlers = Record<ToolName, ToolHandler>;

/** Bound registry entry */
export interface ToolEntry {
  readonly definition: ToolDefinition;
  readonly validator: ArgumentValidator;
  readonly handler: ToolHandler;
  readonly timeoutMs: number;
}

export interface CallRequest {
  toolName: string;
  arguments?: unknown;
}

export type FailureKind =
  | "UNKNOWN_TOOL"
  | "INVALID_ARGUMENTS"
  | "HANDLER_FAILURE"
  | "UPSTREAM_UNREACHABLE"
  | "RESPONSE_TOO_LARGE";

export interface CallFailure {
  kind: FailureKind;
  message: string;
  /** Offending argument, for INVALID_ARGUMENTS */
  field?: string;
}

export type CallResult = { ok: true; content: ToolContent } | { ok: false; failure: CallFailure };

export interface DispatchContext {
  signal?: AbortSignal;
  emitChunk?: ToolContext["emitChunk"];
}
