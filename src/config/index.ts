/**
 * Configuration
 *
 * Environment-based configuration with validation.
 * All environment variables are prefixed with STACKPILOT_.
 */

import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import {
  DEFAULT_HTTP_ENDPOINT,
  DEFAULT_HTTP_HOST,
  DEFAULT_HTTP_PORT,
  DEFAULT_TOOL_TIMEOUT_MS,
  PROXY_MAX_RESPONSE_BYTES,
  PROXY_TIMEOUT_MS,
} from "../shared/constants.js";
import { validateApiToken, validateServerUrl } from "./validation.js";

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

export type TransportMode = "stdio" | "http";

export interface Config {
  readonly nodeEnv: "development" | "production" | "test";
  readonly logLevel: LogLevel;
  /** Mirror log lines into .logs/ */
  readonly logToFile: boolean;
  /** Base URL of the Portainer server, e.g. https://portainer.example.com */
  readonly serverUrl: string | undefined;
  /** Portainer API access token */
  readonly apiToken: string | undefined;
  /** Path to the tool catalog YAML */
  readonly toolsPath: string;
  /** Hide every mutating tool and restrict proxy calls to GET */
  readonly readOnly: boolean;
  /** Connect to Portainer versions other than the supported one */
  readonly disableVersionCheck: boolean;
  readonly transport: TransportMode;
  readonly httpHost: string;
  readonly httpPort: number;
  readonly httpEndpoint: string;
  /** In-flight limit for typed tool calls */
  readonly toolTimeoutMs: number;
  /** In-flight limit for proxy calls, including a streamed body */
  readonly proxyTimeoutMs: number;
  /** Largest proxy body held in memory when it cannot be streamed */
  readonly proxyMaxResponseBytes: number;
}

export interface BackendConfig {
  readonly serverUrl: string;
  readonly apiToken: string;
}

let cachedConfig: Config | null = null;

/** Project root, from either src/config or dist/config */
export function getProjectRoot(): string {
  return join(dirname(fileURLToPath(import.meta.url)), "..", "..");
}

/**
 * Get application configuration.
 * Configuration is cached after first load.
 */
export function getConfig(): Config {
  if (cachedConfig) {
    return cachedConfig;
  }

  const nodeEnv = parseNodeEnv(process.env.NODE_ENV);

  cachedConfig = {
    nodeEnv,
    logLevel: parseLogLevel(process.env.STACKPILOT_LOG_LEVEL, nodeEnv),
    logToFile: process.env.STACKPILOT_LOG_FILE === "true",
    serverUrl: process.env.STACKPILOT_SERVER_URL,
    apiToken: process.env.STACKPILOT_API_TOKEN,
    toolsPath: process.env.STACKPILOT_TOOLS_PATH ?? join(getProjectRoot(), "tools.yaml"),
    readOnly: process.env.STACKPILOT_READ_ONLY === "true",
    disableVersionCheck: process.env.STACKPILOT_DISABLE_VERSION_CHECK === "true",
    transport: parseTransport(process.env.STACKPILOT_TRANSPORT),
    httpHost: process.env.STACKPILOT_HTTP_HOST ?? DEFAULT_HTTP_HOST,
    httpPort: parseInteger(process.env.STACKPILOT_HTTP_PORT, DEFAULT_HTTP_PORT),
    httpEndpoint: process.env.STACKPILOT_HTTP_ENDPOINT ?? DEFAULT_HTTP_ENDPOINT,
    toolTimeoutMs: parsePositiveInteger(process.env.STACKPILOT_TIMEOUT, DEFAULT_TOOL_TIMEOUT_MS),
    proxyTimeoutMs: parsePositiveInteger(process.env.STACKPILOT_PROXY_TIMEOUT, PROXY_TIMEOUT_MS),
    proxyMaxResponseBytes: parsePositiveInteger(
      process.env.STACKPILOT_PROXY_MAX_RESPONSE_BYTES,
      PROXY_MAX_RESPONSE_BYTES
    ),
  };

  return cachedConfig;
}

/**
 * Resolve the Portainer connection settings.
 * Only the server needs these, so getConfig() stays usable without them.
 */
export function getBackendConfig(config: Config = getConfig()): BackendConfig {
  try {
    const serverUrl = validateServerUrl(config.serverUrl);
    const apiToken = validateApiToken(config.apiToken);
    return { serverUrl, apiToken };
  } catch (error) {
    throw new Error(
      `Invalid Portainer connection settings: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function parseNodeEnv(value: string | undefined): Config["nodeEnv"] {
  if (value === "production" || value === "test") {
    return value;
  }
  return "development";
}

/**
 * Parse log level from environment, with sensible defaults.
 */
function parseLogLevel(value: string | undefined, nodeEnv: string): LogLevel {
  if (value) {
    const upper = value.toUpperCase();
    if (isLogLevel(upper)) {
      return upper;
    }
  }

  // Default: DEBUG in development, INFO in production
  return nodeEnv === "production" ? "INFO" : "DEBUG";
}

function isLogLevel(value: string): value is LogLevel {
  return ["DEBUG", "INFO", "WARN", "ERROR"].includes(value);
}

function parseTransport(value: string | undefined): TransportMode {
  return value?.toLowerCase() === "http" ? "http" : "stdio";
}

function parseInteger(value: string | undefined, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) || parsed < 0 ? fallback : parsed;
}

/** Limits where 0 would fail every call */
function parsePositiveInteger(value: string | undefined, fallback: number): number {
  const parsed = parseInteger(value, fallback);
  return parsed === 0 ? fallback : parsed;
}

/**
 * Reset config cache (useful for testing).
 */
export function resetConfig(): void {
  cachedConfig = null;
}
