/**
 * Integration tests for HTTP Transport
 *
 * Tests the HTTP server layer: lifecycle, health check, routing,
 * host validation and session creation.
 */

import { request } from "node:http";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { McpHttpServer } from "./http.js";
import type { HttpTransportConfig } from "./types.js";

const INITIALIZE = {
  jsonrpc: "2.0",
  id: 1,
  method: "initialize",
  params: {
    protocolVersion: "2025-03-26",
    capabilities: {},
    clientInfo: { name: "test-client", version: "1.0.0" },
  },
};

const mcpHeaders = {
  "Content-Type": "application/json",
  Accept: "application/json, text/event-stream",
};

/** fetch cannot override Host, so go through node:http for that */
function getWithHost(url: string, host: string): Promise<number> {
  return new Promise((resolve, reject) => {
    const req = request(url, { method: "POST", headers: { ...mcpHeaders, Host: host } }, (res) => {
      res.resume();
      resolve(res.statusCode ?? 0);
    });
    req.on("error", reject);
    req.end(JSON.stringify(INITIALIZE));
  });
}

describe("McpHttpServer", () => {
  let httpServer: McpHttpServer;
  let serverAddress: string;
  let created: number;

  const config: HttpTransportConfig = {
    host: "127.0.0.1",
    port: 0,
    endpoint: "/mcp",
  };

  beforeEach(async () => {
    created = 0;
    httpServer = new McpHttpServer(() => {
      created += 1;
      return new Server({ name: "test-server", version: "1.0.0" }, { capabilities: { tools: {} } });
    }, config);
    await httpServer.start();

    const address = httpServer.getAddress();
    if (!address) {
      throw new Error("Server failed to start");
    }
    serverAddress = `http://${address.host}:${address.port}`;
  });

  afterEach(async () => {
    await httpServer.stop();
  });

  describe("Server Lifecycle", () => {
    it("should listen on an assigned port", () => {
      expect(httpServer.getAddress()).toEqual({ host: "127.0.0.1", port: expect.any(Number) });
    });

    it("should return null address after stopping", async () => {
      await httpServer.stop();

      expect(httpServer.getAddress()).toBeNull();
    });

    it("should reject connections after stopping", async () => {
      await httpServer.stop();

      await expect(fetch(`${serverAddress}/health`)).rejects.toThrow();
    });
  });

  describe("Routing", () => {
    it("should answer the health check", async () => {
      const response = await fetch(`${serverAddress}/health`);

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ status: "ok" });
    });

    it("should return 404 for unknown paths", async () => {
      const response = await fetch(`${serverAddress}/metrics`);

      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({ error: "Not found" });
    });
  });

  describe("MCP endpoint", () => {
    it("should reject a first request that is not initialize", async () => {
      const response = await fetch(`${serverAddress}/mcp`, {
        method: "POST",
        headers: mcpHeaders,
        body: JSON.stringify({ jsonrpc: "2.0", id: 1, method: "tools/list" }),
      });

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        jsonrpc: "2.0",
        error: { code: -32000, message: "Bad Request: No valid session ID provided" },
        id: null,
      });
      expect(created).toBe(0);
    });

    it("should reject malformed JSON", async () => {
      const response = await fetch(`${serverAddress}/mcp`, {
        method: "POST",
        headers: mcpHeaders,
        body: "{not json",
      });

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({ error: { code: -32700 } });
    });

    it("should return 404 for an unknown session", async () => {
      const response = await fetch(`${serverAddress}/mcp`, {
        method: "POST",
        headers: { ...mcpHeaders, "mcp-session-id": "no-such-session" },
        body: JSON.stringify({ jsonrpc: "2.0", id: 2, method: "tools/list" }),
      });

      expect(response.status).toBe(404);
    });

    it("should reject foreign Host headers when bound to loopback", async () => {
      const status = await getWithHost(`${serverAddress}/mcp`, "evil.test");

      expect(status).toBe(403);
      expect(created).toBe(0);
    });

    it("should open one session per initialize request", async () => {
      const first = await fetch(`${serverAddress}/mcp`, {
        method: "POST",
        headers: mcpHeaders,
        body: JSON.stringify(INITIALIZE),
      });
      await first.text();
      const second = await fetch(`${serverAddress}/mcp`, {
        method: "POST",
        headers: mcpHeaders,
        body: JSON.stringify(INITIALIZE),
      });
      await second.text();

      expect(first.status).toBe(200);
      expect(first.headers.get("mcp-session-id")).toBeTruthy();
      expect(second.headers.get("mcp-session-id")).not.toBe(first.headers.get("mcp-session-id"));
      expect(created).toBe(2);
      expect(httpServer.getActiveSessionCount()).toBe(2);
    });

    it("should close sessions on stop", async () => {
      const response = await fetch(`${serverAddress}/mcp`, {
        method: "POST",
        headers: mcpHeaders,
        body: JSON.stringify(INITIALIZE),
      });
      await response.text();

      await httpServer.stop();

      expect(httpServer.getActiveSessionCount()).toBe(0);
    });
  });
});
