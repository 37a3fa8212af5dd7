/**
 * Proxy Bridge Tests
 *
 * Runs the docker and kubernetes proxy handlers through a real
 * PortainerClient against an in-process stub server.
 */

import { ReadableStream } from "node:stream/web";
import { gzipSync } from "node:zlib";
import { afterEach, describe, expect, it, vi } from "vitest";
import { AccessGuard } from "../access/guard.js";
import { PortainerClient } from "../clients/portainer.js";
import {
  ResponseTooLargeError,
  UnknownToolError,
  UpstreamUnreachableError,
} from "../shared/errors.js";
import { TimeoutError } from "../shared/timeout.js";
import { createFakeClient } from "../testing/fake-client.js";
import {
  sendJson,
  startStubServer,
  unusedServerUrl,
  type StubHandler,
  type StubServer,
} from "../testing/stub-server.js";
import { chooseBodyEncoding, createProxyHandlers, validateProxyPath } from "./proxy.js";
import type { ToolContent, ToolContext } from "./types.js";

function parseResult(content: ToolContent): unknown {
  expect(content).toHaveLength(1);
  return JSON.parse(content[0]?.text ?? "");
}

function context(emitChunk?: ToolContext["emitChunk"]): ToolContext {
  return { signal: new AbortController().signal, emitChunk };
}

describe("validateProxyPath", () => {
  it("should add a missing leading slash", () => {
    expect(validateProxyPath("containers/json")).toBe("/containers/json");
    expect(validateProxyPath("/version")).toBe("/version");
  });

  it("should keep percent-encoded names", () => {
    expect(validateProxyPath("/images/my%20image/json")).toBe("/images/my%20image/json");
  });

  it.each([
    ["http://evil.test/x", "absolute URL"],
    ["//evil.test/x", "protocol-relative"],
    ["/containers\\json", "backslash"],
    ["/containers/json?all=1", "query string"],
    ["/containers/json#top", "fragment"],
    ["/containers/%zz", "malformed encoding"],
    ["/../settings", "dot-dot segment"],
    ["/containers/./json", "dot segment"],
    ["/containers/%2e%2e/%2e%2e/settings", "encoded dot-dot"],
    ["/containers/..%2F..%2Fsettings", "encoded slash traversal"],
    ["/containers/%5Cjson", "encoded backslash"],
  ])("should reject %s (%s)", (path) => {
    expect(() => validateProxyPath(path)).toThrow(
      expect.objectContaining({ code: "INVALID_ARGUMENTS", field: "path" })
    );
  });
});

describe("chooseBodyEncoding", () => {
  it("should use utf8 for textual and untyped bodies", () => {
    expect(chooseBodyEncoding([])).toBe("utf8");
    expect(chooseBodyEncoding([["Content-Type", "application/json; charset=utf-8"]])).toBe("utf8");
    expect(chooseBodyEncoding([["content-type", "text/plain"]])).toBe("utf8");
    expect(chooseBodyEncoding([["content-type", "application/merge-patch+json"]])).toBe("utf8");
    expect(chooseBodyEncoding([["content-type", "application/yaml"]])).toBe("utf8");
  });

  it("should use base64 for everything else", () => {
    expect(chooseBodyEncoding([["content-type", "application/octet-stream"]])).toBe("base64");
    expect(chooseBodyEncoding([["content-type", "application/x-tar"]])).toBe("base64");
    expect(
      chooseBodyEncoding([["content-type", "application/vnd.docker.multiplexed-stream"]])
    ).toBe("base64");
  });
});

describe("proxy handlers", () => {
  let stub: StubServer | undefined;

  afterEach(async () => {
    await stub?.close();
    stub = undefined;
  });

  async function setup(handler: StubHandler, options: { readOnly?: boolean; maxBytes?: number } = {}) {
    stub = await startStubServer(handler);
    const client = new PortainerClient({ serverUrl: stub.url, apiToken: "test-secret" });
    const handlers = createProxyHandlers(client, {
      guard: new AccessGuard({ readOnly: options.readOnly ?? false }),
      maxResponseBytes: options.maxBytes ?? 1024,
    });
    return { stub, handlers };
  }

  it("should round-trip a Docker request", async () => {
    const { stub, handlers } = await setup((_req, res) => {
      sendJson(res, 201, { ok: true });
    });

    const content = await handlers.dockerProxy(
      {
        environmentId: 3,
        method: "GET",
        path: "containers/json",
        query: [
          { key: "all", value: "1" },
          { key: "filters", value: "a" },
          { key: "filters", value: "b" },
        ],
        headers: [
          { key: "X-Trace", value: "abc" },
          { key: "X-API-Key", value: "caller-supplied" },
        ],
      },
      context()
    );

    expect(parseResult(content)).toMatchObject({
      status: 201,
      statusText: "Created",
      headers: expect.arrayContaining([["content-type", "application/json"]]),
      bodyEncoding: "utf8",
      body: '{"ok":true}',
    });

    expect(stub.requests).toHaveLength(1);
    expect(stub.requests[0]).toMatchObject({
      method: "GET",
      url: "/api/endpoints/3/docker/containers/json?all=1&filters=a&filters=b",
      headers: expect.objectContaining({ "x-api-key": "test-secret", "x-trace": "abc" }),
    });
  });

  it("should forward Kubernetes requests under the kubernetes root", async () => {
    const { stub, handlers } = await setup((_req, res) => {
      sendJson(res, 200, { kind: "NamespaceList", items: [] });
    });

    const content = await handlers.kubernetesProxy(
      { environmentId: 2, method: "GET", path: "/api/v1/namespaces" },
      context()
    );

    expect(parseResult(content)).toMatchObject({ status: 200 });
    expect(stub.requests[0]?.url).toBe("/api/endpoints/2/kubernetes/api/v1/namespaces");
  });

  it("should send a request body with its method", async () => {
    const { stub, handlers } = await setup((_req, res) => {
      sendJson(res, 201, { Id: "abc123" });
    });

    await handlers.dockerProxy(
      {
        environmentId: 1,
        method: "POST",
        path: "/containers/create",
        headers: [{ key: "Content-Type", value: "application/json" }],
        body: '{"Image":"alpine"}',
      },
      context()
    );

    expect(stub.requests[0]).toMatchObject({
      method: "POST",
      body: '{"Image":"alpine"}',
      headers: expect.objectContaining({ "content-type": "application/json" }),
    });
  });

  it("should return upstream error statuses as results", async () => {
    const { handlers } = await setup((_req, res) => {
      sendJson(res, 404, { message: "No such container: web" });
    });

    const content = await handlers.dockerProxy(
      { environmentId: 1, method: "GET", path: "/containers/web/json" },
      context()
    );

    expect(parseResult(content)).toMatchObject({
      status: 404,
      body: '{"message":"No such container: web"}',
    });
  });

  it("should base64-encode binary bodies", async () => {
    const { handlers } = await setup((_req, res) => {
      res.writeHead(200, { "Content-Type": "application/octet-stream" });
      res.end(Buffer.from([0, 1, 2, 255]));
    });

    const content = await handlers.dockerProxy(
      { environmentId: 1, method: "GET", path: "/images/alpine/get" },
      context()
    );

    expect(parseResult(content)).toMatchObject({ bodyEncoding: "base64", body: "AAEC/w==" });
  });

  it("should fall back to base64 when a textual body is not UTF-8", async () => {
    const { handlers } = await setup((_req, res) => {
      res.writeHead(200, { "Content-Type": "text/plain" });
      res.end(Buffer.from([0xff, 0xfe]));
    });

    const content = await handlers.dockerProxy(
      { environmentId: 1, method: "GET", path: "/containers/web/logs" },
      context()
    );

    expect(parseResult(content)).toMatchObject({ bodyEncoding: "base64", body: "//4=" });
  });

  it("should fail bodies over the buffer limit", async () => {
    const { handlers } = await setup(
      (_req, res) => {
        res.writeHead(200, { "Content-Type": "text/plain" });
        res.end("x".repeat(64));
      },
      { maxBytes: 16 }
    );

    await expect(
      handlers.dockerProxy({ environmentId: 1, method: "GET", path: "/containers/json" }, context())
    ).rejects.toBeInstanceOf(ResponseTooLargeError);
  });

  it("should stream the body through the chunk sink", async () => {
    const { handlers } = await setup((_req, res) => {
      res.writeHead(200, { "Content-Type": "text/plain" });
      res.write("line1\n");
      setTimeout(() => {
        res.end("line2\n");
      }, 10);
    });
    const chunks: string[] = [];
    const progress: number[] = [];

    const content = await handlers.dockerProxy(
      { environmentId: 1, method: "GET", path: "/containers/web/logs" },
      context(async (chunk, bytes) => {
        chunks.push(chunk);
        progress.push(bytes);
      })
    );

    expect(chunks.join("")).toBe("line1\nline2\n");
    expect(progress.at(-1)).toBe(12);
    expect(parseResult(content)).toMatchObject({
      status: 200,
      bodyEncoding: "utf8",
      streamed: true,
      bytes: 12,
    });
  });

  it("should stream past the buffer limit", async () => {
    const { handlers } = await setup(
      (_req, res) => {
        res.writeHead(200, { "Content-Type": "text/plain" });
        res.end("y".repeat(64));
      },
      { maxBytes: 16 }
    );
    const chunks: string[] = [];

    const content = await handlers.dockerProxy(
      { environmentId: 1, method: "GET", path: "/containers/web/logs" },
      context(async (chunk) => {
        chunks.push(chunk);
      })
    );

    expect(chunks.join("")).toBe("y".repeat(64));
    expect(parseResult(content)).toMatchObject({ streamed: true, bytes: 64 });
  });

  it("should stream binary bodies as concatenable base64", async () => {
    const { handlers } = await setup((_req, res) => {
      res.writeHead(200, { "Content-Type": "application/x-tar" });
      res.write(Buffer.from([0, 1]));
      setTimeout(() => {
        res.end(Buffer.from([2, 255]));
      }, 10);
    });
    const chunks: string[] = [];

    await handlers.dockerProxy(
      { environmentId: 1, method: "GET", path: "/containers/web/export" },
      context(async (chunk) => {
        chunks.push(chunk);
      })
    );

    expect(chunks.join("")).toBe("AAEC/w==");
  });

  describe("rejections before any network call", () => {
    it("should reject unsafe paths", async () => {
      const { stub, handlers } = await setup((_req, res) => {
        res.end();
      });

      await expect(
        handlers.dockerProxy(
          { environmentId: 1, method: "GET", path: "/containers/%2e%2e/%2e%2e/users" },
          context()
        )
      ).rejects.toMatchObject({ field: "path" });
      expect(stub.requests).toHaveLength(0);
    });

    it("should treat non-GET methods in read-only mode as an unknown tool", async () => {
      const { stub, handlers } = await setup(
        (_req, res) => {
          res.end();
        },
        { readOnly: true }
      );

      const attempt = handlers.dockerProxy(
        { environmentId: 1, method: "POST", path: "/containers/web/stop" },
        context()
      );

      await expect(attempt).rejects.toBeInstanceOf(UnknownToolError);
      await expect(attempt).rejects.toThrow("Unknown tool: dockerProxy");
      expect(stub.requests).toHaveLength(0);
    });

    it("should allow GET in read-only mode", async () => {
      const { stub, handlers } = await setup(
        (_req, res) => {
          sendJson(res, 200, []);
        },
        { readOnly: true }
      );

      await handlers.kubernetesProxy(
        { environmentId: 1, method: "GET", path: "/api/v1/pods" },
        context()
      );

      expect(stub.requests).toHaveLength(1);
    });

    it("should reject a body on GET", async () => {
      const { stub, handlers } = await setup((_req, res) => {
        res.end();
      });

      await expect(
        handlers.dockerProxy(
          { environmentId: 1, method: "GET", path: "/info", body: "{}" },
          context()
        )
      ).rejects.toMatchObject({ field: "body" });
      expect(stub.requests).toHaveLength(0);
    });
  });

  it("should relay compressed bodies without decoding them", async () => {
    const compressed = gzipSync(JSON.stringify({ kind: "PodList", items: [] }));
    const { stub, handlers } = await setup((_req, res) => {
      res.writeHead(200, {
        "Content-Type": "application/json",
        "Content-Encoding": "gzip",
        "Content-Length": String(compressed.length),
      });
      res.end(compressed);
    });

    const content = await handlers.kubernetesProxy(
      { environmentId: 2, method: "GET", path: "/api/v1/pods" },
      context()
    );

    expect(stub.requests[0]?.headers["accept-encoding"]).toBe("identity");
    expect(parseResult(content)).toMatchObject({
      status: 200,
      headers: expect.arrayContaining([
        ["content-encoding", "gzip"],
        ["content-length", String(compressed.length)],
      ]),
      bodyEncoding: "base64",
      body: compressed.toString("base64"),
    });
  });

  it("should pass a caller's Accept-Encoding through", async () => {
    const { stub, handlers } = await setup((_req, res) => {
      sendJson(res, 200, {});
    });

    await handlers.dockerProxy(
      {
        environmentId: 1,
        method: "GET",
        path: "/info",
        headers: [{ key: "Accept-Encoding", value: "gzip" }],
      },
      context()
    );

    expect(stub.requests[0]?.headers["accept-encoding"]).toBe("gzip");
  });

  it("should keep repeated headers in both directions", async () => {
    const { stub, handlers } = await setup((_req, res) => {
      res.setHeader("X-Tag", ["first", "second"]);
      sendJson(res, 200, {});
    });

    const content = await handlers.dockerProxy(
      {
        environmentId: 1,
        method: "GET",
        path: "/info",
        headers: [
          { key: "X-Dup", value: "1" },
          { key: "x-dup", value: "2" },
        ],
      },
      context()
    );

    expect(stub.requests[0]?.headers["x-dup"]).toBe("1, 2");
    expect(parseResult(content)).toMatchObject({
      headers: expect.arrayContaining([
        ["x-tag", "first"],
        ["x-tag", "second"],
      ]),
    });
    const text = content[0]?.text ?? "";
    expect(text.indexOf('"first"')).toBeLessThan(text.indexOf('"second"'));
  });

  describe("upstream failures mid-body", () => {
    it("should report a timeout while buffering as unreachable", async () => {
      const { handlers } = await setup((_req, res) => {
        res.writeHead(200, { "Content-Type": "text/plain" });
        res.write("partial");
      });
      const controller = new AbortController();
      setTimeout(() => {
        controller.abort(new TimeoutError("dockerProxy", 50));
      }, 50);

      const attempt = handlers.dockerProxy(
        { environmentId: 1, method: "GET", path: "/containers/web/logs" },
        { signal: controller.signal }
      );

      await expect(attempt).rejects.toBeInstanceOf(UpstreamUnreachableError);
      await expect(attempt).rejects.toThrow(
        "Upstream docker engine (environment 1) unreachable: Operation 'dockerProxy' timed out after 50ms"
      );
    });

    it("should report a dropped connection as unreachable", async () => {
      const { handlers } = await setup((_req, res) => {
        res.writeHead(200, { "Content-Type": "text/plain", "Content-Length": "100" });
        res.write("partial");
        setTimeout(() => {
          res.socket?.destroy();
        }, 10);
      });

      const attempt = handlers.dockerProxy(
        { environmentId: 1, method: "GET", path: "/containers/web/logs" },
        context()
      );

      await expect(attempt).rejects.toBeInstanceOf(UpstreamUnreachableError);
      await expect(attempt).rejects.toThrow(/^Upstream docker engine \(environment 1\) unreachable: /);
    });

    it("should close the upstream when the caller aborts a stream", async () => {
      let upstreamClosed = false;
      const { handlers } = await setup((_req, res) => {
        res.on("close", () => {
          upstreamClosed = true;
        });
        res.writeHead(200, { "Content-Type": "text/plain" });
        res.write("line1\n");
      });
      const controller = new AbortController();

      const attempt = handlers.dockerProxy(
        {
          environmentId: 1,
          method: "GET",
          path: "/containers/web/logs",
          query: [{ key: "follow", value: "1" }],
        },
        {
          signal: controller.signal,
          emitChunk: async () => {
            controller.abort(new Error("caller went away"));
          },
        }
      );

      await expect(attempt).rejects.toThrow("caller went away");
      await vi.waitFor(() => {
        expect(upstreamClosed).toBe(true);
      });
    });
  });

  it("should report a refused connection as unreachable", async () => {
    const client = new PortainerClient({ serverUrl: await unusedServerUrl(), apiToken: "test-secret" });
    const handlers = createProxyHandlers(client, {
      guard: new AccessGuard({ readOnly: false }),
      maxResponseBytes: 1024,
    });

    const attempt = handlers.dockerProxy(
      { environmentId: 1, method: "GET", path: "/info" },
      context()
    );

    await expect(attempt).rejects.toBeInstanceOf(UpstreamUnreachableError);
    await expect(attempt).rejects.toThrow(/^Upstream docker engine \(environment 1\) unreachable: /);
  });
});

describe("streamed text that is not UTF-8", () => {
  function streamOf(chunks: number[][]): ReadableStream<Uint8Array> {
    return new ReadableStream<Uint8Array>({
      start(controller) {
        for (const chunk of chunks) {
          controller.enqueue(Uint8Array.from(chunk));
        }
        controller.close();
      },
    });
  }

  async function streamThrough(chunks: number[][]) {
    const client = createFakeClient({
      proxyDockerRequest: async () => ({
        status: 200,
        statusText: "OK",
        headers: [["content-type", "application/json"]],
        body: streamOf(chunks),
      }),
    });
    const handlers = createProxyHandlers(client, {
      guard: new AccessGuard({ readOnly: false }),
      maxResponseBytes: 1024,
    });
    const emitted: string[] = [];
    const content = await handlers.dockerProxy(
      { environmentId: 1, method: "GET", path: "/containers/web/logs" },
      context(async (chunk) => {
        emitted.push(chunk);
      })
    );
    return { emitted, result: parseResult(content) };
  }

  it("should send the whole body as base64 when the first bytes fail", async () => {
    const { emitted, result } = await streamThrough([[0x7b, 0xff, 0xfe, 0x7d]]);

    expect(emitted).toEqual(["e//+", "fQ=="]);
    expect(Buffer.from(emitted.join(""), "base64")).toEqual(Buffer.from([0x7b, 0xff, 0xfe, 0x7d]));
    expect(result).toEqual({
      status: 200,
      statusText: "OK",
      headers: [["content-type", "application/json"]],
      bodyEncoding: "base64",
      streamed: true,
      bytes: 4,
    });
  });

  it("should switch to base64 at the first undecodable byte", async () => {
    const { emitted, result } = await streamThrough([
      [0x6f, 0x6b, 0x20],
      [0xff, 0x41],
    ]);

    expect(emitted).toEqual(["ok ", "/0E="]);
    expect(result).toMatchObject({ bodyEncoding: "utf8", base64FromByte: 3, bytes: 5 });
  });

  it("should join a character split across chunks", async () => {
    const { emitted, result } = await streamThrough([
      [0x61, 0xc3],
      [0xa9, 0x62],
    ]);

    expect(emitted).toEqual(["a", "\u00e9b"]);
    expect(result).toEqual(expect.not.objectContaining({ base64FromByte: expect.anything() }));
  });
});
