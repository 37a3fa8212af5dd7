#!/usr/bin/env node
/**
 * Stackpilot MCP Server
 *
 * Entry point for the MCP server.
 *
 * Usage:
 *   npx stackpilot-mcp
 *   node --import ./dist/instrumentation.js dist/index.js
 */

// Load environment variables from .env file FIRST
import "dotenv/config";

// Import instrumentation (Sentry) - must be imported early
// Note: For best results, use --import flag instead of this import
import "./instrumentation.js";

import { StackpilotMcpServer } from "./server.js";
import { SENTRY_FLUSH_TIMEOUT_MS } from "./shared/constants.js";
import { createLogger } from "./shared/index.js";
import { Sentry } from "./shared/tracing.js";

const logger = createLogger("Main");

async function main(): Promise<void> {
  try {
    const server = new StackpilotMcpServer();
    await server.run();
  } catch (error) {
    logger.error("Fatal error starting server", error);

    Sentry.captureException(error);
    await Sentry.close(SENTRY_FLUSH_TIMEOUT_MS);

    process.exit(1);
  }
}

void main();
