/**
 * Transport Module
 *
 * stdio (local) and Streamable HTTP (remote) transports for the MCP server.
 */

export type {
  TransportMode,
  HttpTransportConfig,
  HttpServerInstance,
  McpServerFactory,
} from "./types.js";
export { McpHttpServer } from "./http.js";
