/**
 * Proxy Bridge
 *
 * dockerProxy and kubernetesProxy forward an agent-described request into
 * the engine API Portainer exposes for an environment, and hand back the
 * upstream status, headers and body as they are.
 *
 * Bodies either stream back as progress notifications, when the caller
 * supplied a progress token, or are buffered up to a fixed bound.
 */

import type {
  ReadableStream,
  ReadableStreamDefaultReader,
  ReadableStreamReadResult,
} from "node:stream/web";
import type { AccessGuard } from "../access/guard.js";
import { HTTP_METHODS } from "../clients/types.js";
import type {
  BackendClient,
  CallOptions,
  ProxyEngine,
  ProxyRequest,
  ProxyResponse,
} from "../clients/types.js";
import {
  InvalidArgumentsError,
  ResponseTooLargeError,
  UnknownToolError,
  UpstreamUnreachableError,
} from "../shared/errors.js";
import { createLogger } from "../shared/logger.js";
import { TimeoutError } from "../shared/timeout.js";
import { ArgumentReader } from "./args.js";
import { jsonContent } from "./results.js";
import type { ProxyToolName, ToolContext, ToolHandler, ToolHandlers } from "./types.js";

const logger = createLogger("ProxyBridge");

export type BodyEncoding = "utf8" | "base64";

export interface ProxyHandlerOptions {
  guard: AccessGuard;
  /** Largest body returned in one result when the caller cannot stream */
  maxResponseBytes: number;
}

/** Buffered result */
export interface ProxyResult {
  status: number;
  statusText: string;
  headers: Array<[string, string]>;
  bodyEncoding: BodyEncoding;
  body: string;
}

/**
 * Result of a call whose body went out as progress notifications.
 * A utf8 stream that turns out not to be UTF-8 continues in base64 from
 * `base64FromByte` on; chunks before that offset are text.
 */
export interface StreamedProxyResult {
  status: number;
  statusText: string;
  headers: Array<[string, string]>;
  bodyEncoding: BodyEncoding;
  base64FromByte?: number;
  streamed: true;
  bytes: number;
}

type ProxySender = (request: ProxyRequest, options: CallOptions) => Promise<ProxyResponse>;

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:/i;

const TEXTUAL_TYPES = [
  /^text\//,
  /^application\/(?:[\w.+-]+\+)?json$/,
  /^application\/(?:x-)?ndjson$/,
  /^application\/jsonl$/,
  /^application\/(?:x-)?yaml$/,
  /^application\/(?:[\w.+-]+\+)?xml$/,
];

/**
 * Check a caller-supplied engine path and return it with a leading "/".
 *
 * @throws InvalidArgumentsError on anything that could leave the engine root
 */
export function validateProxyPath(path: string): string {
  if (SCHEME_PATTERN.test(path)) {
    throw new InvalidArgumentsError("path", "must be a path, not an absolute URL");
  }
  if (path.startsWith("//")) {
    throw new InvalidArgumentsError("path", "must not be protocol-relative");
  }
  if (path.includes("\\")) {
    throw new InvalidArgumentsError("path", "must not contain backslashes");
  }
  if (path.includes("?") || path.includes("#")) {
    throw new InvalidArgumentsError(
      "path",
      "must not contain a query string or fragment; pass query parameters in 'query'"
    );
  }

  let decoded: string;
  try {
    decoded = decodeURIComponent(path);
  } catch (error) {
    throw new InvalidArgumentsError(
      "path",
      `has malformed percent-encoding (${error instanceof Error ? error.message : String(error)})`
    );
  }

  const segments = [...path.split("/"), ...decoded.split("/")];
  if (segments.some((segment) => segment === "." || segment === "..")) {
    throw new InvalidArgumentsError("path", "must not contain '.' or '..' segments");
  }
  if (decoded.includes("\\")) {
    throw new InvalidArgumentsError("path", "must not contain backslashes");
  }

  return path.startsWith("/") ? path : `/${path}`;
}

/** utf8 for textual or untyped bodies, base64 for everything else */
export function chooseBodyEncoding(headers: Array<[string, string]>): BodyEncoding {
  const contentType = headers.find(([name]) => name.toLowerCase() === "content-type")?.[1];
  if (contentType === undefined) {
    return "utf8";
  }
  const mediaType = contentType.split(";")[0]?.trim().toLowerCase() ?? "";
  if (mediaType === "") {
    return "utf8";
  }
  return TEXTUAL_TYPES.some((pattern) => pattern.test(mediaType)) ? "utf8" : "base64";
}

/**
 * @throws UnknownToolError for a method the guard refuses, so a hidden
 * capability looks the same as one that was never declared
 */
function parseRequest(
  toolName: ProxyToolName,
  args: ArgumentReader,
  guard: AccessGuard
): ProxyRequest {
  const method = args.oneOf("method", HTTP_METHODS);
  if (!guard.isMethodAllowed(method)) {
    throw new UnknownToolError(toolName);
  }

  const body = args.optionalString("body");
  if (body !== undefined && (method === "GET" || method === "HEAD")) {
    throw new InvalidArgumentsError("body", `must be omitted for ${method} requests`);
  }

  return {
    environmentId: args.id("environmentId"),
    method,
    path: validateProxyPath(args.string("path")),
    query: args.pairs("query"),
    headers: args.pairs("headers"),
    body,
  };
}

/**
 * Read one chunk, classifying failures: a deadline or a broken connection
 * is the upstream's fault, a caller cancellation is passed on as is.
 */
async function readChunk(
  reader: ReadableStreamDefaultReader<Uint8Array>,
  target: string,
  signal: AbortSignal
): Promise<ReadableStreamReadResult<Uint8Array>> {
  try {
    return await reader.read();
  } catch (error) {
    if (signal.aborted && !(signal.reason instanceof TimeoutError)) {
      throw error;
    }
    const reason =
      signal.reason instanceof TimeoutError
        ? signal.reason.message
        : error instanceof Error
          ? error.message
          : String(error);
    throw new UpstreamUnreachableError(target, reason);
  }
}

/**
 * Walk a body stream chunk by chunk. The stream is always cancelled and
 * released afterwards, so an early exit stops the upstream transfer.
 */
async function consumeBody(
  body: ReadableStream<Uint8Array>,
  target: string,
  signal: AbortSignal,
  onChunk: (chunk: Uint8Array) => Promise<void>
): Promise<void> {
  const reader = body.getReader();
  try {
    for (;;) {
      const result = await readChunk(reader, target, signal);
      if (result.done) {
        return;
      }
      await onChunk(result.value);
    }
  } finally {
    reader.cancel().catch((error: unknown) => {
      logger.debug("Cancelling upstream body failed", { target, error: String(error) });
    });
    reader.releaseLock();
  }
}

async function bufferBody(
  body: ReadableStream<Uint8Array> | null,
  target: string,
  signal: AbortSignal,
  maxBytes: number
): Promise<Buffer> {
  if (!body) {
    return Buffer.alloc(0);
  }

  const chunks: Uint8Array[] = [];
  let total = 0;
  await consumeBody(body, target, signal, async (chunk) => {
    total += chunk.byteLength;
    if (total > maxBytes) {
      throw new ResponseTooLargeError(maxBytes);
    }
    chunks.push(chunk);
  });
  return Buffer.concat(chunks, total);
}

function encodeBody(bytes: Buffer, encoding: BodyEncoding): { encoding: BodyEncoding; body: string } {
  if (encoding === "base64") {
    return { encoding, body: bytes.toString("base64") };
  }
  try {
    return { encoding, body: new TextDecoder("utf-8", { fatal: true }).decode(bytes) };
  } catch (error) {
    logger.debug("Body is not valid UTF-8, sending base64", { error: String(error) });
    return { encoding: "base64", body: bytes.toString("base64") };
  }
}

interface StreamOutcome {
  bytes: number;
  /** Offset at which a utf8 stream switched to base64 */
  base64FromByte?: number;
}

/**
 * Relay the body through `emit` as it arrives. Base64 chunks are cut on
 * 3-byte boundaries so the concatenation of all base64 messages decodes
 * as one. Text that fails to decode switches the rest of the stream to
 * base64, starting at the first byte the decoder has not yet emitted.
 */
async function streamBody(
  body: ReadableStream<Uint8Array> | null,
  encoding: BodyEncoding,
  target: string,
  signal: AbortSignal,
  emit: NonNullable<ToolContext["emitChunk"]>
): Promise<StreamOutcome> {
  if (!body) {
    return { bytes: 0 };
  }

  const decoder = new TextDecoder("utf-8", { fatal: true });
  let textMode = encoding === "utf8";
  let emittedText = 0;
  let base64FromByte: number | undefined;
  let carry = Buffer.alloc(0);
  let bytes = 0;

  const toBase64 = (chunk: Uint8Array): string => {
    const pending = Buffer.concat([carry, chunk]);
    const usable = pending.length - (pending.length % 3);
    carry = pending.subarray(usable);
    return pending.subarray(0, usable).toString("base64");
  };

  const encode = (chunk: Uint8Array, final: boolean): string => {
    if (textMode) {
      // carry: bytes the decoder is still holding as an unfinished sequence
      const pending = Buffer.concat([carry, chunk]);
      try {
        const text = decoder.decode(chunk, { stream: !final });
        const held = final ? 0 : heldBackBytes(pending);
        emittedText += pending.length - held;
        carry = pending.subarray(pending.length - held);
        return text;
      } catch (error) {
        logger.debug("Streamed body is not valid UTF-8, continuing in base64", {
          target,
          offset: emittedText,
          error: String(error),
        });
        textMode = false;
        base64FromByte = emittedText;
        carry = Buffer.alloc(0);
        return final ? pending.toString("base64") : toBase64(pending);
      }
    }
    if (final) {
      const rest = Buffer.concat([carry, chunk]).toString("base64");
      carry = Buffer.alloc(0);
      return rest;
    }
    return toBase64(chunk);
  };

  await consumeBody(body, target, signal, async (chunk) => {
    bytes += chunk.byteLength;
    const text = encode(chunk, false);
    if (text.length > 0) {
      await emit(text, bytes);
    }
  });

  const tail = encode(new Uint8Array(0), true);
  if (tail.length > 0) {
    await emit(tail, bytes);
  }
  return { bytes, base64FromByte };
}

/**
 * Trailing bytes of an unfinished UTF-8 sequence at the end of `bytes`,
 * which a streaming decoder keeps until the next chunk.
 */
function heldBackBytes(bytes: Uint8Array): number {
  for (let back = 1; back <= Math.min(3, bytes.length); back++) {
    const byte = bytes[bytes.length - back] ?? 0;
    if ((byte & 0xc0) !== 0x80) {
      const length = byte >= 0xf0 ? 4 : byte >= 0xe0 ? 3 : byte >= 0xc0 ? 2 : 1;
      return length > back ? back : 0;
    }
  }
  return 0;
}

function createProxyHandler(
  toolName: ProxyToolName,
  engine: ProxyEngine,
  send: ProxySender,
  options: ProxyHandlerOptions
): ToolHandler {
  return async (args, { signal, emitChunk }) => {
    const request = parseRequest(toolName, new ArgumentReader(args), options.guard);
    const target = `${engine} engine (environment ${request.environmentId})`;

    logger.debug("Forwarding proxy request", {
      engine,
      environmentId: request.environmentId,
      method: request.method,
      path: request.path,
      streaming: emitChunk !== undefined,
    });

    const response = await send(request, { signal });
    const encoding = chooseBodyEncoding(response.headers);
    const head = {
      status: response.status,
      statusText: response.statusText,
      headers: response.headers,
    };

    if (emitChunk) {
      const outcome = await streamBody(response.body, encoding, target, signal, emitChunk);
      const switched = outcome.base64FromByte;
      const result: StreamedProxyResult = {
        ...head,
        bodyEncoding: switched === 0 ? "base64" : encoding,
        ...(switched !== undefined && switched > 0 ? { base64FromByte: switched } : {}),
        streamed: true,
        bytes: outcome.bytes,
      };
      return jsonContent(result);
    }

    const buffered = await bufferBody(response.body, target, signal, options.maxResponseBytes);
    const encoded = encodeBody(buffered, encoding);
    const result: ProxyResult = { ...head, bodyEncoding: encoded.encoding, body: encoded.body };
    return jsonContent(result);
  };
}

export function createProxyHandlers(
  client: BackendClient,
  options: ProxyHandlerOptions
): Pick<ToolHandlers, "dockerProxy" | "kubernetesProxy"> {
  return {
    dockerProxy: createProxyHandler(
      "dockerProxy",
      "docker",
      (request, callOptions) => client.proxyDockerRequest(request, callOptions),
      options
    ),
    kubernetesProxy: createProxyHandler(
      "kubernetesProxy",
      "kubernetes",
      (request, callOptions) => client.proxyKubernetesRequest(request, callOptions),
      options
    ),
  };
}
