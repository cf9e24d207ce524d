/**
 * Logger that forwards to the connected MCP client as
 * `notifications/message`, filtered by the level the client sets through
 * `logging/setLevel`.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { type LoggingLevel, SetLevelRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import type { Logger } from "./mcp_console_logger.js";

// Log levels (lower is more severe)
const LogLevelMap: Record<LoggingLevel, number> = {
  emergency: 0,
  alert: 1,
  critical: 2,
  error: 3,
  warning: 4,
  notice: 5,
  info: 6,
  debug: 7,
};

export const DEFAULT_LOG_LEVEL: LoggingLevel = "info";

/** The slice of `McpServer` the logger needs. */
export type LoggingServer = {
  server: Pick<McpServer["server"], "sendLoggingMessage" | "setRequestHandler">;
};

export function create_logger(server: LoggingServer, loggerName: string = "udm-lattice"): Logger {
  let threshold = LogLevelMap[DEFAULT_LOG_LEVEL];

  const send = (level: LoggingLevel, message: string, data: unknown[]): void => {
    if (LogLevelMap[level] > threshold) return;
    server.server
      .sendLoggingMessage({
        level,
        logger: loggerName,
        data: data.length > 0 ? { message, data } : { message },
      })
      .catch((error: unknown) => {
        // The client may have gone away; fall back to stderr.
        console.error(`Failed to send log message: ${error instanceof Error ? error.message : String(error)}`);
      });
  };

  server.server.setRequestHandler(SetLevelRequestSchema, (request) => {
    threshold = LogLevelMap[request.params.level];
    send("debug", `Log level set to '${request.params.level}'`, []);
    return {};
  });

  return {
    error: (message, ...data) => send("error", message, data),
    warn: (message, ...data) => send("warning", message, data),
    info: (message, ...data) => send("info", message, data),
    debug: (message, ...data) => send("debug", message, data),
  };
}
