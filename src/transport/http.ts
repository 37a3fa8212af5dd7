/**
 * HTTP Transport
 *
 * Streamable HTTP transport on node:http (no Express dependency).
 * Routes:
 * - GET /health for container orchestration
 * - the configured MCP endpoint, one session per initialize request
 */

import { randomUUID } from "node:crypto";
import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import type { Server as McpServer } from "@modelcontextprotocol/sdk/server/index.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { createLogger } from "../shared/logger.js";
import type { HttpServerInstance, HttpTransportConfig, McpServerFactory } from "./types.js";

const logger = createLogger("HttpTransport");

const LOOPBACK_HOSTS: ReadonlySet<string> = new Set(["127.0.0.1", "localhost", "::1", "[::1]"]);

interface TransportSession {
  transport: StreamableHTTPServerTransport;
  server: McpServer;
}

/** Hostname part of a Host header, brackets kept for IPv6 */
function hostnameOf(host: string): string {
  if (host.startsWith("[")) {
    const end = host.indexOf("]");
    return end === -1 ? host : host.slice(0, end + 1);
  }
  return host.split(":")[0] ?? host;
}

export class McpHttpServer implements HttpServerInstance {
  private server: Server | null = null;
  private readonly sessions = new Map<string, TransportSession>();
  private readonly createMcpServer: McpServerFactory;
  private readonly config: HttpTransportConfig;

  constructor(createMcpServer: McpServerFactory, config: HttpTransportConfig) {
    this.createMcpServer = createMcpServer;
    this.config = config;
  }

  /**
   * Start listening. Resolves once the socket is bound.
   */
  async start(): Promise<void> {
    const { host, port } = this.config;
    const server = createServer((req, res) => {
      void this.handleRequest(req, res);
    });

    await new Promise<void>((resolve, reject) => {
      server.once("error", (error) => {
        logger.error("HTTP server error", error);
        reject(error);
      });

      server.listen(port, host, () => {
        logger.info("HTTP server started", { host, port: this.getAddress()?.port ?? port });
        resolve();
      });
      this.server = server;
    });
  }

  /**
   * Close every session, then the listening socket.
   */
  async stop(): Promise<void> {
    for (const [sessionId, session] of this.sessions) {
      try {
        await session.server.close();
        logger.debug("Session closed on shutdown", { sessionId });
      } catch (error) {
        logger.error("Error closing session", error, { sessionId });
      }
    }
    this.sessions.clear();

    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;

    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
        } else {
          logger.info("HTTP server stopped");
          resolve();
        }
      });
      server.closeAllConnections();
    });
  }

  getAddress(): { host: string; port: number } | null {
    const address = this.server?.address();
    if (!address || typeof address === "string") {
      return null;
    }
    return { host: address.address, port: address.port };
  }

  getActiveSessionCount(): number {
    return this.sessions.size;
  }

  /**
   * Route incoming requests.
   */
  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", "http://localhost");
    const path = url.pathname;

    logger.debug("HTTP request", { method: req.method, path });

    try {
      if (path === "/health" && req.method === "GET") {
        this.sendJson(res, 200, { status: "ok" });
      } else if (path === this.config.endpoint) {
        await this.handleMcpRequest(req, res);
      } else {
        this.sendJson(res, 404, { error: "Not found" });
      }
    } catch (error) {
      logger.error("Request handler error", error);
      if (!res.headersSent) {
        this.sendRpcError(res, 500, -32603, "Internal server error");
      }
    }
  }

  /**
   * DNS rebinding protection: a server bound to loopback only answers
   * requests addressed to a loopback name.
   */
  private isHostAllowed(req: IncomingMessage): boolean {
    if (!LOOPBACK_HOSTS.has(this.config.host)) {
      return true;
    }
    const host = req.headers.host;
    return host !== undefined && LOOPBACK_HOSTS.has(hostnameOf(host));
  }

  /**
   * Handle MCP protocol requests.
   * Manages session lifecycle and routes to the session's transport.
   */
  private async handleMcpRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    if (!this.isHostAllowed(req)) {
      logger.warn("DNS rebinding protection: rejected request", { host: req.headers.host });
      this.sendJson(res, 403, { error: "Forbidden: Invalid host header" });
      return;
    }

    let body: unknown = undefined;
    if (req.method === "POST") {
      const parsed = await this.parseJsonBody(req);
      if (!parsed.ok) {
        this.sendRpcError(res, 400, -32700, "Parse error: invalid JSON body");
        return;
      }
      body = parsed.value;
    }

    const header = req.headers["mcp-session-id"];
    const sessionId = typeof header === "string" ? header : undefined;

    if (sessionId) {
      const session = this.sessions.get(sessionId);
      if (session) {
        await session.transport.handleRequest(req, res, body);
        return;
      }
      this.sendRpcError(res, 404, -32001, "Session not found");
      return;
    }

    if (req.method !== "POST" || !isInitializeRequest(body)) {
      logger.warn("Bad request: missing session ID or not initialize request", {
        method: req.method,
      });
      this.sendRpcError(res, 400, -32000, "Bad Request: No valid session ID provided");
      return;
    }

    const server = this.createMcpServer();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (sid: string) => {
        logger.info("Session initialized", { sessionId: sid });
        this.sessions.set(sid, { transport, server });
      },
    });

    transport.onclose = () => {
      const sid = transport.sessionId;
      if (sid && this.sessions.delete(sid)) {
        logger.info("Session closed", { sessionId: sid });
      }
    };

    await server.connect(transport);
    await transport.handleRequest(req, res, body);
  }

  private async parseJsonBody(
    req: IncomingMessage
  ): Promise<{ ok: true; value: unknown } | { ok: false }> {
    const chunks: Buffer[] = [];
    for await (const chunk of req) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }

    const text = Buffer.concat(chunks).toString("utf-8");
    if (text === "") {
      return { ok: true, value: undefined };
    }
    try {
      const value: unknown = JSON.parse(text);
      return { ok: true, value };
    } catch (error) {
      logger.debug("Rejected request body", { error: String(error) });
      return { ok: false };
    }
  }

  private sendJson(res: ServerResponse, status: number, payload: unknown): void {
    res.writeHead(status, { "Content-Type": "application/json" });
    res.end(JSON.stringify(payload));
  }

  private sendRpcError(res: ServerResponse, status: number, code: number, message: string): void {
    this.sendJson(res, status, { jsonrpc: "2.0", error: { code, message }, id: null });
  }
}
