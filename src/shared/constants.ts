/**
 * Application Constants
 *
 * Centralized configuration for magic numbers used throughout the codebase.
 */

// --- Versions ---

/** Oldest tool catalog version this build understands */
export const MINIMUM_TOOLS_VERSION = "v1.0";

/** Portainer release the typed handlers are written against */
export const SUPPORTED_PORTAINER_VERSION = "2.31.2";

export const SERVER_NAME = "stackpilot-mcp";

export const SERVER_VERSION = "0.5.1";

// --- Time Constants (Milliseconds) ---

/** Default in-flight limit for typed tool calls (30 seconds) */
export const DEFAULT_TOOL_TIMEOUT_MS = 30_000;

/** In-flight limit for proxy calls; streamed bodies may run long (5 minutes) */
export const PROXY_TIMEOUT_MS = 300_000;

/** Sentry flush timeout on shutdown (2 seconds) */
export const SENTRY_FLUSH_TIMEOUT_MS = 2000;

// --- Proxy ---

/** Largest proxy body buffered when the caller cannot take a stream (10 MiB) */
export const PROXY_MAX_RESPONSE_BYTES = 10 * 1024 * 1024;

// --- Retry Configuration ---

/** Maximum number of retry attempts for idempotent API calls */
export const MAX_RETRY_ATTEMPTS = 3;

/** Base delay for exponential backoff (500 ms) */
export const RETRY_BASE_DELAY_MS = 500;

/** Maximum delay cap for exponential backoff (10 seconds) */
export const RETRY_MAX_DELAY_MS = 10_000;

/** Minimum jitter multiplier for exponential backoff (50%) */
export const RETRY_JITTER_MIN = 0.5;

/** Maximum jitter multiplier for exponential backoff (100%) */
export const RETRY_JITTER_MAX = 1.0;

// --- HTTP Transport ---

export const DEFAULT_HTTP_HOST = "127.0.0.1";

export const DEFAULT_HTTP_PORT = 3000;

export const DEFAULT_HTTP_ENDPOINT = "/mcp";
