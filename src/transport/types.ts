/**
 * Transport Types
 *
 * Type definitions for transport configuration and management.
 */

import type { Server } from "@modelcontextprotocol/sdk/server/index.js";

export type { TransportMode } from "../config/index.js";

/**
 * HTTP transport configuration.
 */
export interface HttpTransportConfig {
  /** Host to bind to (127.0.0.1 for localhost, 0.0.0.0 for all interfaces) */
  readonly host: string;
  /** Port for HTTP server; 0 picks a free port */
  readonly port: number;
  /** Path of the MCP endpoint, e.g. /mcp */
  readonly endpoint: string;
}

/**
 * Builds a protocol server for one HTTP session. Every session gets its
 * own instance; they all share the same read-only tool registry.
 */
export type McpServerFactory = () => Server;

/**
 * HTTP server instance interface.
 */
export interface HttpServerInstance {
  /** Start the HTTP server */
  start(): Promise<void>;
  /** Stop the HTTP server */
  stop(): Promise<void>;
  /** Get the server address */
  getAddress(): { host: string; port: number } | null;
}
