/**
 * Factory for creating MCP tool handlers with logging.
 * Extracted for testability and reuse.
 */

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { ToolArgs } from "./tools.js";

/**
 * Minimal logger interface for tool handler logging.
 */
export interface ToolLogger {
  debug: (message: string, ...data: unknown[]) => void;
}

/**
 * Map of tool names to their handler functions.
 * Handlers may be synchronous or asynchronous; the factory awaits either.
 */
export type ToolHandlerMap = Record<string, (args: ToolArgs) => CallToolResult | Promise<CallToolResult>>;

/** Request metadata the SDK passes as the handler's `extra` argument. */
export interface RequestMeta {
  requestId?: string | number;
  sessionId?: string;
}

export function formatBytes(bytes: number): string {
  return `${(bytes / 1024).toFixed(2)} KB`;
}

export function timestamp(): string {
  return new Date().toISOString();
}

/** Parse a handler's text payload; `undefined` when it is not a JSON object. */
function parsePayload(text: string): object | undefined {
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch {
    return undefined;
  }
  return typeof payload === "object" && payload !== null ? payload : undefined;
}

/** Read `data.node_count` from a serialized success payload, if present. */
function nodeCountOf(text: string): number | undefined {
  const payload = parsePayload(text);
  if (payload && "data" in payload) {
    const data = payload.data;
    if (typeof data === "object" && data !== null && "node_count" in data && typeof data.node_count === "number") {
      return data.node_count;
    }
  }
  return undefined;
}

/** Read `error.message` (or a bare string `error`) from a serialized error payload. */
function errorMessageOf(text: string): string | undefined {
  const payload = parsePayload(text);
  if (payload && "error" in payload) {
    const error = payload.error;
    if (typeof error === "string") return error;
    if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
      return error.message;
    }
  }
  return undefined;
}

/**
 * Creates a factory function that produces MCP tool handlers with logging.
 *
 * Each returned handler:
 * 1. Extracts request metadata from the `extra` parameter
 * 2. Logs the tool invocation
 * 3. Dispatches to the matching handler in `handlerMap`
 * 4. Logs success/error and duration
 * 5. Returns a structured error if the tool name is not found
 */
export function createToolHandlerFactory(handlerMap: ToolHandlerMap, log: ToolLogger) {
  async function dispatch(toolName: string, args: ToolArgs, extra: RequestMeta | undefined): Promise<CallToolResult> {
    const reqTag = `[req:${String(extra?.requestId ?? 0).padStart(5, "0")}]`;
    const sesTag = extra?.sessionId ? ` [ses:${extra.sessionId.slice(-6)}]` : "";
    const prefix = `[tool:${toolName}]`.padEnd(30);
    log.debug(`${timestamp()}: ${reqTag}${sesTag} ${prefix} called`);

    const handler = handlerMap[toolName];
    if (!handler) {
      log.debug(`${timestamp()}: ${reqTag}${sesTag} ${prefix} not found`);
      return {
        content: [{ type: "text", text: JSON.stringify({ error: `Tool ${toolName} not available` }) }],
        isError: true,
      };
    }

    const start = Date.now();
    let result: CallToolResult;
    try {
      result = await handler(args);
    } catch (err) {
      const durationStr = `${Date.now() - start} ms`.padStart(7);
      const errorMessage = err instanceof Error ? err.message : String(err);
      log.debug(
        `${timestamp()}: ${reqTag}${sesTag} ${prefix} uncaught error in ${durationStr}: ${errorMessage}`,
      );
      return {
        content: [{
          type: "text",
          text: JSON.stringify({
            success: false,
            error: {
              code: "INTERNAL_ERROR",
              message: errorMessage,
              suggestion: "This is an unexpected server error. Retrying with the same parameters gives the same error.",
            },
          }),
        }],
        isError: true,
      };
    }

    const durationStr = `${Date.now() - start} ms`.padStart(7);
    const textContent = result.content[0];
    const text = textContent && textContent.type === "text" ? textContent.text : "";
    const sizeStr = formatBytes(text.length).padStart(10);

    if (result.isError) {
      const errorMsg = errorMessageOf(text);
      log.debug(
        `${timestamp()}: ${reqTag}${sesTag} ${prefix} error in ${durationStr}, ${sizeStr}${errorMsg ? `: ${errorMsg}` : ""}`,
      );
      return result;
    }

    const nodeCount = nodeCountOf(text);
    if (nodeCount !== undefined) {
      log.debug(
        `${timestamp()}: ${reqTag}${sesTag} ${prefix} emitted ${nodeCount} ${nodeCount === 1 ? "node" : "nodes"}`,
      );
    }
    log.debug(`${timestamp()}: ${reqTag}${sesTag} ${prefix} ok in ${durationStr}, ${sizeStr}`);
    return result;
  }

  function createToolHandler(toolName: string, hasArgs: true): (args: ToolArgs, extra?: RequestMeta) => Promise<CallToolResult>;
  function createToolHandler(toolName: string, hasArgs?: false): (extra?: RequestMeta) => Promise<CallToolResult>;
  function createToolHandler(toolName: string, hasArgs = false) {
    if (hasArgs) {
      return (args: ToolArgs, extra?: RequestMeta) => dispatch(toolName, args, extra);
    }
    return (extra?: RequestMeta) => dispatch(toolName, {}, extra);
  }

  return createToolHandler;
}
