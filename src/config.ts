/**
 * Application configuration — CLI flags, environment variables, defaults.
 *
 * All parsing functions are pure (no side effects, deterministic output).
 * Only `buildConfig()` touches the process, reading `process.argv` and
 * `process.env` when called without arguments.
 *
 * CLI arguments are parsed with `minimist`.
 */

import minimist from "minimist";
import { z } from "zod";
import { NODE_TYPES, type NodeType } from "./udm/geometry.js";
import { readRelativeFile } from "./utils.js";

const PackageJsonSchema = z.object({ version: z.string() });

/**
 * Application version — read from package.json.
 * The file sits one level above both `src/` and `dist/`.
 */
export const VERSION: string = PackageJsonSchema.parse(
  JSON.parse(readRelativeFile(import.meta.url, "..", "package.json")),
).version;

/**
 * Application configuration interface
 */
export interface ServerConfig {
  readonly httpPort: number;
  readonly transports: TransportType[];
  readonly loggerType: LoggerType;
  /** Grid cells added around the mapping by `copyline-locations` when the caller gives none. */
  readonly padding: number;
  readonly nodeType: NodeType;
}

export type TransportType = "stdio" | "http";
export type LoggerType = "console" | "mcp_server";

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: ServerConfig = {
  httpPort: 8080,
  transports: ["stdio"],
  loggerType: "console",
  padding: 2,
  nodeType: "WeightedNode",
};

const PORT_RANGE = {
  min: 1,
  max: 65535,
} as const;

const MAX_PADDING = 1024;

const VALID_LOGGER_TYPES: readonly LoggerType[] = ["console", "mcp_server"] as const;

/** Accepted spellings for the node type, lower-cased. */
const NODE_TYPE_ALIASES: Record<string, NodeType> = {
  weighted: "WeightedNode",
  weightednode: "WeightedNode",
  unweighted: "UnWeightedNode",
  unweightednode: "UnWeightedNode",
};

/**
 * Parse http port value from string - pure function
 */
export const parseHttpPortValue = (
  value: string | undefined,
): number | Error => {
  if (!value) {
    return new Error("--http-port flag requires a port number");
  }

  const port = parseInt(value, 10);

  if (isNaN(port)) {
    return new Error(`Invalid port number "${value}". Port must be a number`);
  }

  if (port < PORT_RANGE.min || port > PORT_RANGE.max) {
    return new Error(
      `Invalid port number "${value}". Port must be between ${PORT_RANGE.min} and ${PORT_RANGE.max}`,
    );
  }

  return port;
};

/**
 * Parse grid padding - pure function
 */
export const parsePadding = (
  value: string | undefined,
): number | Error => {
  if (value === undefined || value.trim().length === 0) {
    return DEFAULT_CONFIG.padding;
  }
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    return new Error(`Invalid padding "${value}". Padding must be a non-negative integer`);
  }
  const padding = parseInt(trimmed, 10);
  if (padding > MAX_PADDING) {
    return new Error(`Invalid padding "${value}". Padding must be at most ${MAX_PADDING}`);
  }
  return padding;
};

/**
 * Parse node type - pure function. Accepts `weighted` / `unweighted` as well
 * as the full type names, case-insensitively.
 */
export const parseNodeType = (
  value: string | undefined,
): NodeType | Error => {
  if (!value || value.trim().length === 0) {
    return DEFAULT_CONFIG.nodeType;
  }
  const nodeType = NODE_TYPE_ALIASES[value.trim().toLowerCase()];
  if (nodeType) {
    return nodeType;
  }
  return new Error(
    `Invalid node type "${value}". Supported types: weighted, unweighted (or ${NODE_TYPES.join(", ")})`,
  );
};

/**
 * Parse logger type value - pure function
 */
export const parseLoggerType = (
  value: string | undefined,
): LoggerType | Error => {
  if (!value || value.trim().length === 0) {
    return DEFAULT_CONFIG.loggerType;
  }
  const normalized = value.trim().toLowerCase();
  const loggerType = VALID_LOGGER_TYPES.find((type) => type === normalized);
  if (loggerType) {
    return loggerType;
  }
  return new Error(
    `Invalid logger type "${value}". Supported types: ${VALID_LOGGER_TYPES.join(", ")}`,
  );
};

export const parseTransports = (
  values: string[] | undefined,
): TransportType[] | Error => {
  if (!values || values.length === 0) {
    return DEFAULT_CONFIG.transports;
  }

  const normalized = values
    .flatMap((value) => value.split(","))
    .map((value) => value.trim().toLowerCase())
    .filter((value) => value.length > 0);

  if (normalized.length === 0) {
    return new Error("At least one transport must be specified");
  }

  const validTransports: TransportType[] = [];

  for (const value of normalized) {
    if (value === "stdio" || value === "http") {
      validTransports.push(value);
    } else {
      return new Error(
        `Invalid transport "${value}". Supported transports: stdio, http`,
      );
    }
  }

  // Remove duplicates while preserving order
  return Array.from(new Set(validTransports));
};

/**
 * Check if help was requested - pure function
 */
export const shouldShowHelp = (args: readonly string[]): boolean => {
  return args.includes("--help") || args.includes("-h");
};

/**
 * minimist yields a string for one occurrence of a declared string flag and
 * an array for repeated ones; normalise both to an array.
 */
const collect = (value: unknown): string[] | undefined => {
  if (value === undefined) return undefined;
  return Array.isArray(value) ? value.map(String) : [String(value)];
};

/** Last occurrence of a repeated flag, falling back to an environment value. */
const pick = (values: string[] | undefined, envValue: string | undefined): string | undefined => {
  return values?.length ? values[values.length - 1] : envValue;
};

/**
 * Parse command line arguments into configuration object.
 * Pure function — no side effects, deterministic output.
 */
export const parseConfig = (
  args: readonly string[],
  env: Record<string, string | undefined> = {},
): ServerConfig | Error => {
  const parsed = minimist([...args], {
    string: ["http-port", "transport", "padding", "node-type"],
    boolean: ["help"],
    alias: { h: "help" },
  });

  const httpPortArr = collect(parsed["http-port"]);
  const transportArr = collect(parsed["transport"]);
  const paddingArr = collect(parsed["padding"]);
  const nodeTypeArr = collect(parsed["node-type"]);

  // A bare `--flag` (no value) comes back as ""
  if (httpPortArr?.some((v) => v === "")) {
    return new Error("--http-port flag requires a port number");
  }
  if (transportArr?.some((v) => v === "")) {
    return new Error("--transport flag requires a transport name");
  }
  if (paddingArr?.some((v) => v === "")) {
    return new Error("--padding flag requires a number of grid cells");
  }
  if (nodeTypeArr?.some((v) => v === "")) {
    return new Error("--node-type flag requires a node type");
  }

  // ── HTTP port: CLI > env > default ──
  const httpPortValue = pick(httpPortArr, env.HTTP_PORT || undefined);
  let httpPort: number = DEFAULT_CONFIG.httpPort;
  if (httpPortValue !== undefined) {
    const port = parseHttpPortValue(httpPortValue);
    if (port instanceof Error) {
      return port;
    }
    httpPort = port;
  }

  // ── Transport: CLI > env > default ──
  const transportValue = pick(transportArr, env.TRANSPORT || undefined);
  const transports = parseTransports(transportValue === undefined ? undefined : [transportValue]);
  if (transports instanceof Error) {
    return transports;
  }

  // ── Logger type: env only (no CLI flag) ──
  const loggerType = parseLoggerType(env.LOGGER_TYPE);
  if (loggerType instanceof Error) {
    return loggerType;
  }

  // ── Mapping defaults: CLI > env > default ──
  const padding = parsePadding(pick(paddingArr, env.UDM_PADDING));
  if (padding instanceof Error) {
    return padding;
  }
  const nodeType = parseNodeType(pick(nodeTypeArr, env.UDM_NODE_TYPE));
  if (nodeType instanceof Error) {
    return nodeType;
  }

  return {
    ...DEFAULT_CONFIG,
    httpPort,
    transports,
    loggerType,
    padding,
    nodeType,
  };
};

/**
 * Build configuration from the running process.
 *
 * Production code calls `buildConfig()` with no arguments.
 *
 * @param args — CLI arguments (defaults to `process.argv.slice(2)`)
 * @param env  — environment variables (defaults to `process.env`)
 */
export const buildConfig = (
  args: readonly string[] = process.argv.slice(2),
  env: Record<string, string | undefined> = process.env,
): ServerConfig | Error => {
  return parseConfig(args, env);
};
