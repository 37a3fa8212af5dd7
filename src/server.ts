/**
 * Stackpilot MCP Server
 *
 * Publishes the catalog's tools over MCP and routes calls through the
 * dispatch router to Portainer.
 */

// Using low-level Server API for fine-grained control over request handling
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { AccessGuard } from "./access/index.js";
import { loadToolCatalog, type ToolCatalog } from "./catalog/index.js";
import { PortainerClient, type BackendClient } from "./clients/index.js";
import { getBackendConfig, getConfig, type Config } from "./config/index.js";
import { SERVER_NAME, SERVER_VERSION, SUPPORTED_PORTAINER_VERSION } from "./shared/constants.js";
import { BackendVersionError, formatErrorResponse } from "./shared/errors.js";
import { createLogger, setMcpServer } from "./shared/logger.js";
import {
  createToolHandlers,
  DispatchRouter,
  registerTools,
  type DispatchContext,
} from "./tools/index.js";
import { McpHttpServer } from "./transport/index.js";

const logger = createLogger("Server");

export type RouterSettings = Pick<
  Config,
  "readOnly" | "toolTimeoutMs" | "proxyTimeoutMs" | "proxyMaxResponseBytes"
>;

/**
 * Fail startup unless Portainer runs the release the handlers target.
 *
 * @throws BackendVersionError on any other version
 */
export async function verifyBackendVersion(client: BackendClient): Promise<void> {
  const version = await client.getVersion();
  if (version !== SUPPORTED_PORTAINER_VERSION) {
    throw new BackendVersionError(version, SUPPORTED_PORTAINER_VERSION);
  }
  logger.debug("Portainer version verified", { version });
}

/**
 * Bind the catalog to handlers. The router is read-only afterwards and
 * can be shared by any number of protocol sessions.
 */
export function createRouter(
  catalog: ToolCatalog,
  client: BackendClient,
  settings: RouterSettings
): DispatchRouter {
  const guard = new AccessGuard({ readOnly: settings.readOnly });
  const router = new DispatchRouter({ catalog, guard, defaultTimeoutMs: settings.toolTimeoutMs });
  const handlers = createToolHandlers(client, {
    guard,
    maxResponseBytes: settings.proxyMaxResponseBytes,
  });
  registerTools(router, catalog, handlers, { proxyTimeoutMs: settings.proxyTimeoutMs });
  return router;
}

/**
 * Build a protocol server whose tools/list and tools/call go to `router`.
 */
export function createMcpServer(router: DispatchRouter): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
        logging: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    logger.debug("ListTools request");
    return { tools: router.listDefinitions() };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args, _meta } = request.params;
    const progressToken = _meta?.progressToken;

    logger.info("Tool invocation", { tool: name, streaming: progressToken !== undefined });

    const context: DispatchContext = { signal: extra.signal };
    if (progressToken !== undefined) {
      context.emitChunk = async (chunk, progress) => {
        await extra.sendNotification({
          method: "notifications/progress",
          params: { progressToken, progress, message: chunk },
        });
      };
    }

    const result = await router.dispatch({ toolName: name, arguments: args }, context);
    if (result.ok) {
      return { content: result.content };
    }
    return formatErrorResponse(result.failure.kind, result.failure.message, result.failure.field);
  });

  server.onerror = (error) => {
    logger.error("Server error", error);
  };

  return server;
}

/**
 * Stackpilot MCP Server
 *
 * Owns startup, the chosen transport and graceful shutdown.
 */
export class StackpilotMcpServer {
  private stdioServer?: Server;
  private httpServer?: McpHttpServer;

  /**
   * Set up graceful shutdown and last-resort error logging.
   */
  private setupProcessHandlers(): void {
    const shutdown = async (signal: string): Promise<void> => {
      logger.info("Shutdown signal received", { signal });
      await this.shutdown();
      process.exit(0);
    };

    process.on("SIGINT", () => {
      void shutdown("SIGINT");
    });
    process.on("SIGTERM", () => {
      void shutdown("SIGTERM");
    });

    process.on("uncaughtException", (error) => {
      logger.error("Uncaught exception", error);
      void this.shutdown().finally(() => {
        process.exit(1);
      });
    });

    process.on("unhandledRejection", (reason) => {
      logger.error("Unhandled rejection", reason);
    });
  }

  /**
   * Load the catalog, check the backend and start serving.
   *
   * @throws SchemaError if the catalog is unusable
   * @throws BackendVersionError if Portainer runs an unsupported release
   */
  async run(): Promise<void> {
    const config = getConfig();

    logger.info("Starting Stackpilot MCP server", {
      name: SERVER_NAME,
      version: SERVER_VERSION,
      nodeEnv: config.nodeEnv,
      transport: config.transport,
      readOnly: config.readOnly,
    });

    const catalog = await loadToolCatalog(config.toolsPath);
    logger.info("Tool catalog loaded", {
      path: config.toolsPath,
      version: catalog.version,
      tools: catalog.size,
    });

    const client = new PortainerClient(getBackendConfig(config));
    if (config.disableVersionCheck) {
      logger.warn("Portainer version check disabled", {
        supported: SUPPORTED_PORTAINER_VERSION,
      });
    } else {
      await verifyBackendVersion(client);
    }

    const router = createRouter(catalog, client, config);
    this.setupProcessHandlers();

    if (config.transport === "http") {
      this.httpServer = new McpHttpServer(() => createMcpServer(router), {
        host: config.httpHost,
        port: config.httpPort,
        endpoint: config.httpEndpoint,
      });
      await this.httpServer.start();
      logger.info("Stackpilot MCP server running on HTTP", {
        host: config.httpHost,
        port: config.httpPort,
        endpoint: config.httpEndpoint,
      });
    } else {
      const server = createMcpServer(router);
      await server.connect(new StdioServerTransport());
      setMcpServer(server);
      this.stdioServer = server;
      logger.info("Stackpilot MCP server running on stdio");
    }
  }

  /**
   * Graceful shutdown.
   */
  async shutdown(): Promise<void> {
    logger.info("Shutting down Stackpilot MCP server");

    try {
      if (this.httpServer) {
        await this.httpServer.stop();
        logger.debug("HTTP server closed");
      }

      if (this.stdioServer) {
        setMcpServer(null);
        await this.stdioServer.close();
      }

      logger.info("Shutdown complete");
    } catch (error) {
      logger.error("Error during shutdown", error);
    }
  }
}
