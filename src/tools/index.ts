/**
 * Tool Registration
 *
 * Builds the handler for every tool this build serves and binds the ones
 * the catalog declares.
 */

import type { AccessGuard } from "../access/guard.js";
import type { ToolCatalog } from "../catalog/loader.js";
import type { BackendClient } from "../clients/types.js";
import { createLogger } from "../shared/logger.js";
import { createAccessGroupHandlers } from "./access-groups.js";
import { createEnvironmentGroupHandlers } from "./environment-groups.js";
import { createEnvironmentHandlers } from "./environments.js";
import { createProxyHandlers } from "./proxy.js";
import type { DispatchRouter } from "./registry.js";
import { createSettingsHandlers } from "./settings.js";
import { createStackHandlers } from "./stacks.js";
import { createTagHandlers } from "./tags.js";
import { createTeamHandlers } from "./teams.js";
import { TOOL_NAMES, type ProxyToolName, type ToolHandlers } from "./types.js";
import { createUserHandlers } from "./users.js";

export { DispatchRouter, type DispatchRouterOptions, type ListedTool } from "./registry.js";
export { validateProxyPath, chooseBodyEncoding } from "./proxy.js";
export * from "./types.js";

const logger = createLogger("Tools");

const PROXY_TOOLS: ReadonlySet<string> = new Set<ProxyToolName>(["dockerProxy", "kubernetesProxy"]);

export interface ToolHandlerOptions {
  guard: AccessGuard;
  maxResponseBytes: number;
}

/** One handler per tool name; the record type keeps the set closed */
export function createToolHandlers(
  client: BackendClient,
  options: ToolHandlerOptions
): ToolHandlers {
  return {
    ...createTagHandlers(client),
    ...createEnvironmentHandlers(client),
    ...createEnvironmentGroupHandlers(client),
    ...createAccessGroupHandlers(client),
    ...createStackHandlers(client),
    ...createTeamHandlers(client),
    ...createUserHandlers(client),
    ...createSettingsHandlers(client),
    ...createProxyHandlers(client, options),
  };
}

export interface RegisterToolsOptions {
  /** In-flight limit for the proxy tools, which may stream for minutes */
  proxyTimeoutMs: number;
}

/**
 * Register every handler the catalog declares.
 *
 * @returns Names of the tools that ended up reachable
 */
export function registerTools(
  router: DispatchRouter,
  catalog: ToolCatalog,
  handlers: ToolHandlers,
  options: RegisterToolsOptions
): string[] {
  const registered: string[] = [];

  for (const name of TOOL_NAMES) {
    const timeoutMs = PROXY_TOOLS.has(name) ? options.proxyTimeoutMs : undefined;
    if (router.registerIfPresent(name, handlers[name], { timeoutMs })) {
      registered.push(name);
    }
  }

  const known: ReadonlySet<string> = new Set(TOOL_NAMES);
  for (const name of catalog.names()) {
    if (!known.has(name)) {
      logger.warn("Catalog declares a tool this server has no handler for", { tool: name });
    }
  }

  logger.info("Tools registered", { count: registered.length, declared: catalog.size });
  return registered;
}
