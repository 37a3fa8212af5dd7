/**
 * Structured Logger
 *
 * Plain text to stderr (stdout belongs to the stdio transport), MCP
 * notifications/message when a protocol server is attached, and an
 * optional daily log file under .logs/.
 *
 * Entries carry OpenTelemetry trace/span IDs when a span is active.
 */

import { appendFileSync, mkdirSync, existsSync, chmodSync } from "node:fs";
import { join } from "node:path";
import { trace } from "@opentelemetry/api";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { getConfig, getProjectRoot, type LogLevel } from "../config/index.js";

const LOG_LEVELS: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

/**
 * Map our log levels to MCP logging levels.
 * MCP supports: debug, info, notice, warning, error, critical, alert, emergency
 */
const MCP_LOG_LEVEL_MAP: Record<LogLevel, "debug" | "info" | "warning" | "error"> = {
  DEBUG: "debug",
  INFO: "info",
  WARN: "warning",
  ERROR: "error",
};

export type LogContext = Record<string, unknown>;

/**
 * Protocol server receiving log notifications.
 * Set via setMcpServer() once the stdio transport is connected.
 */
let mcpServer: Server | null = null;

export function setMcpServer(server: Server | null): void {
  mcpServer = server;
}

function getTraceContext(): { traceId?: string; spanId?: string } {
  const activeSpan = trace.getActiveSpan();
  if (activeSpan) {
    const spanContext = activeSpan.spanContext();
    return {
      traceId: spanContext.traceId,
      spanId: spanContext.spanId,
    };
  }
  return {};
}

function setSecurePermissions(path: string, mode: number): void {
  if (process.platform === "win32") {
    return;
  }
  chmodSync(path, mode);
}

function getLogFilePath(): string {
  const logsDir = join(getProjectRoot(), ".logs");

  if (!existsSync(logsDir)) {
    mkdirSync(logsDir, { recursive: true });
    setSecurePermissions(logsDir, 0o700);
  }

  const today = new Date().toISOString().split("T")[0]; // YYYY-MM-DD
  return join(logsDir, `stackpilot-mcp-${today}.log`);
}

function writeToFile(entry: string): void {
  try {
    const logPath = getLogFilePath();
    const isNewFile = !existsSync(logPath);
    appendFileSync(logPath, entry + "\n");

    if (isNewFile) {
      setSecurePermissions(logPath, 0o600);
    }
  } catch (error) {
    // The file is a mirror of stderr; report once there and carry on
    process.stderr.write(`[logger] log file write failed: ${String(error)}\n`);
  }
}

function formatLogEntry(
  timestamp: string,
  level: LogLevel,
  context: string,
  message: string,
  data?: LogContext
): string {
  const dataStr = data && Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : "";
  return `[${timestamp}] ${level.padEnd(5)} [${context}] ${message}${dataStr}`;
}

export class Logger {
  private readonly context: string;
  private readonly minLevel: number;
  private readonly logToFile: boolean;

  constructor(context: string) {
    const config = getConfig();
    this.context = context;
    this.minLevel = LOG_LEVELS[config.logLevel];
    this.logToFile = config.logToFile;
  }

  debug(message: string, data?: LogContext): void {
    this.log("DEBUG", message, data);
  }

  info(message: string, data?: LogContext): void {
    this.log("INFO", message, data);
  }

  warn(message: string, data?: LogContext): void {
    this.log("WARN", message, data);
  }

  error(message: string, error?: unknown, data?: LogContext): void {
    const errorData: LogContext = { ...data };

    if (error instanceof Error) {
      errorData.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    } else if (error !== undefined && error !== null) {
      errorData.error = typeof error === "object" ? JSON.stringify(error) : String(error);
    }

    this.log("ERROR", message, errorData);
  }

  private log(level: LogLevel, message: string, data?: LogContext): void {
    if (LOG_LEVELS[level] < this.minLevel) {
      return;
    }

    const timestamp = new Date().toISOString();
    const traceContext = getTraceContext();

    if (mcpServer) {
      const structuredData: LogContext = {
        message,
        ...(traceContext.traceId ? { traceId: traceContext.traceId } : {}),
        ...(traceContext.spanId ? { spanId: traceContext.spanId } : {}),
        ...(data && Object.keys(data).length > 0 ? data : {}),
      };
      mcpServer
        .sendLoggingMessage({
          level: MCP_LOG_LEVEL_MAP[level],
          data: structuredData,
          logger: this.context,
        })
        .catch((error: unknown) => {
          process.stderr.write(`[logger] MCP log notification failed: ${String(error)}\n`);
        });
    }

    const tracePrefix = traceContext.traceId ? ` [${traceContext.traceId.slice(0, 8)}]` : "";
    const plainText = formatLogEntry(timestamp, level, this.context + tracePrefix, message, data);
    process.stderr.write(plainText + "\n");

    if (this.logToFile) {
      writeToFile(plainText);
    }
  }
}

/**
 * Create a logger for a specific context.
 */
export function createLogger(context: string): Logger {
  return new Logger(context);
}
