#!/usr/bin/env node
/**
 * Entry point — server lifecycle, transport setup, and shutdown.
 *
 * This file is the only place with side effects (signal handlers, I/O).
 * All business logic lives in the other modules.
 *
 * Transports:
 *   - stdio  — for IDE / CLI integrations (via MCP SDK StdioServerTransport)
 *   - http   — Streamable HTTP via Hono on @hono/node-server
 */

import { serve, type ServerType } from "@hono/node-server";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { WebStandardStreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/webStandardStreamableHttp.js";
import { Hono } from "hono";
import { cors } from "hono/cors";

import { buildConfig, type ServerConfig, shouldShowHelp, VERSION } from "./config.js";
import { create_logger as create_console_logger } from "./loggers/mcp_console_logger.js";
import { create_logger as create_server_logger } from "./loggers/mcp_server_logger.js";
import { createToolHandlerFactory } from "./tool_handler.js";
import { registerTools, TOOL_DEFINITIONS } from "./tool_registrations.js";
import { createHandlers } from "./tools.js";
import { readRelativeFile } from "./utils.js";

const SERVER_NAME = "udm-lattice-mcp-server";

/**
 * Display help message and exit.
 */
function showHelp(): never {
  console.log(`
UDM Lattice MCP Server (${VERSION})

Usage: ${SERVER_NAME} [options]

Options:
  --http-port <number>     HTTP server port for MCP clients (default: 8080)
  --transport <type>       Transport type: stdio, http, or stdio,http (default: stdio)
  --padding <number>       Default grid padding for copyline-locations (default: 2)
  --node-type <type>       Default node type: weighted or unweighted (default: weighted)
  --help, -h               Show this help message

Environment variables:
  HTTP_PORT                Same as --http-port (CLI takes precedence)
  TRANSPORT                Same as --transport (CLI takes precedence)
  UDM_PADDING              Same as --padding (CLI takes precedence)
  UDM_NODE_TYPE            Same as --node-type (CLI takes precedence)
  LOGGER_TYPE              Logger type: console or mcp_server (default: console)

Examples:
  ${SERVER_NAME}                           # Use stdio transport
  ${SERVER_NAME} --transport http          # Use HTTP transport on port 8080
  ${SERVER_NAME} --http-port 4000          # Use HTTP on port 4000
  ${SERVER_NAME} --transport stdio,http    # Use both transports
  `);
  process.exit(0);
}

// Console logger is the primary log sink. With LOGGER_TYPE=mcp_server each
// server instance also gets a client-facing logger for tool-call logs.
const log = create_console_logger();

// Sent to MCP clients during initialization so the calling model knows the
// lattice conventions without extra round trips.
const SERVER_INSTRUCTIONS = readRelativeFile(import.meta.url, "..", "resources", "instructions.md");

/**
 * Create a fully configured McpServer instance.
 * Each transport needs its own instance because the MCP SDK
 * only allows one transport per server.
 */
function createMcpServer(config: ServerConfig): McpServer {
  const srv = new McpServer(
    {
      name: SERVER_NAME,
      version: VERSION,
    },
    {
      capabilities: config.loggerType === "mcp_server" ? { tools: {}, logging: {} } : { tools: {} },
      instructions: SERVER_INSTRUCTIONS,
    },
  );

  const toolLog = config.loggerType === "mcp_server" ? create_server_logger(srv) : log;
  const handlers = createHandlers(config, toolLog);
  const createToolHandler = createToolHandlerFactory(handlers, toolLog);
  registerTools(srv, createToolHandler);

  return srv;
}

/** Track all server instances for shutdown */
const servers: McpServer[] = [];

// ─── Shutdown Infrastructure ───────────────────────────────────

/** HTTP server reference, captured for graceful shutdown */
let httpServer: ServerType | undefined;

/** Guard against double-shutdown (signal re-delivery, etc.) */
let isShuttingDown = false;

function closeHttpServer(server: ServerType): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

/**
 * Gracefully shut down all resources.
 * Idempotent.
 */
async function shutdown(reason: string): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;

  log.debug(`Shutting down (reason: ${reason})`);

  // 1. Stop accepting new HTTP connections
  if (httpServer) {
    try {
      await closeHttpServer(httpServer);
      log.debug("HTTP server closed");
    } catch (error) {
      log.warn("HTTP server did not close cleanly", error);
    }
    httpServer = undefined;
  }

  // 2. Close all MCP server instances (flushes pending messages, disconnects transports)
  for (const srv of servers) {
    try {
      await srv.close();
    } catch (error) {
      log.warn("MCP server did not close cleanly", error);
    }
  }
  log.debug("Shutdown complete");
}

// ─── Signal & Error Handlers ──────────────────────────────────

for (const signal of ["SIGINT", "SIGTERM", "SIGHUP"] as const) {
  process.on(signal, () => {
    void shutdown(signal).finally(() => process.exit(0));
  });
}

process.on("uncaughtException", (error) => {
  log.error("Uncaught exception:", error);
  void shutdown("uncaughtException").finally(() => process.exit(1));
});

process.on("unhandledRejection", (reason) => {
  log.error("Unhandled rejection:", reason);
  void shutdown("unhandledRejection").finally(() => process.exit(1));
});

// ─── Transport Startup ────────────────────────────────────────

async function start_stdio_transport(config: ServerConfig) {
  const srv = createMcpServer(config);
  servers.push(srv);
  const transport = new StdioServerTransport();
  await srv.connect(transport);
  log.debug(`UDM Lattice MCP Server STDIO transport active`);
}

function start_streamable_http_transport(config: ServerConfig) {
  const app = new Hono();

  app.use(
    "*",
    cors({
      origin: "*",
      allowMethods: ["GET", "POST", "DELETE", "OPTIONS"],
      allowHeaders: [
        "Content-Type",
        "mcp-session-id",
        "Last-Event-ID",
        "mcp-protocol-version",
      ],
      exposeHeaders: ["mcp-session-id", "mcp-protocol-version"],
    }),
  );

  // ─── Request body size limit (10 MB) ────────────────────────
  const MAX_BODY_SIZE = 10 * 1024 * 1024;
  app.use("*", async (c, next) => {
    const contentLength = c.req.header("content-length");
    if (contentLength && parseInt(contentLength, 10) > MAX_BODY_SIZE) {
      return c.json({ error: "Request body too large" }, 413);
    }
    await next();
    return;
  });

  app.get("/health", (c) => c.json({ status: "ok" }));

  // Stateless transports are single-use — create a fresh transport
  // and server per request so the SDK doesn't reject reuse.
  app.all("/mcp", async (c) => {
    const transport = new WebStandardStreamableHTTPServerTransport();
    const srv = createMcpServer(config);
    await srv.connect(transport);
    return transport.handleRequest(c.req.raw);
  });

  httpServer = serve({ fetch: app.fetch, port: config.httpPort });
  log.debug(`UDM Lattice MCP Server Streamable HTTP transport active`);
  log.debug(`Health check: http://localhost:${config.httpPort}/health`);
  log.debug(`MCP endpoint: http://localhost:${config.httpPort}/mcp`);
}

async function main() {
  if (shouldShowHelp(process.argv.slice(2))) {
    showHelp();
  }

  const configResult = buildConfig();
  if (configResult instanceof Error) {
    console.error(`Error: ${configResult.message}`);
    process.exit(1);
  }

  const config: ServerConfig = configResult;

  log.debug(`UDM Lattice MCP Server v${VERSION} starting`);
  log.debug(`Transports: ${config.transports.join(", ")}`);
  log.debug(`Tools: ${TOOL_DEFINITIONS.length}`);
  log.debug(`Defaults: padding=${config.padding}, node_type=${config.nodeType}`);

  if (config.transports.includes("stdio")) {
    await start_stdio_transport(config);
  }
  if (config.transports.includes("http")) {
    start_streamable_http_transport(config);
  }

  log.debug(`UDM Lattice MCP Server v${VERSION} is ready`);
}

main().catch((error) => {
  log.error("Fatal error in main():", error);
  process.exit(1);
});
