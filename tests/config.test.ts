import { describe, expect, it } from "vitest";
import {
  buildConfig,
  DEFAULT_CONFIG,
  parseConfig,
  parseHttpPortValue,
  parseLoggerType,
  parseNodeType,
  parsePadding,
  parseTransports,
  type ServerConfig,
  shouldShowHelp,
  VERSION,
} from "../src/config.js";

describe("VERSION", () => {
  it("is read from package.json", () => {
    expect(VERSION).toBe("0.3.0");
  });
});

describe("parseHttpPortValue", () => {
  it("valid port returns number", () => {
    expect(parseHttpPortValue("8080")).toBe(8080);
  });
  it("undefined input returns Error", () => {
    expect(parseHttpPortValue(undefined)).toBeInstanceOf(Error);
  });
  it("non-numeric string returns Error", () => {
    expect(parseHttpPortValue("abc")).toBeInstanceOf(Error);
  });
  it("out of range returns Error", () => {
    expect(parseHttpPortValue("70000")).toBeInstanceOf(Error);
  });
});

describe("parseTransports", () => {
  it("returns default when undefined", () => {
    expect(parseTransports(undefined)).toEqual(["stdio"]);
  });
  it("parses single transport", () => {
    expect(parseTransports(["stdio"])).toEqual(["stdio"]);
  });
  it("parses comma separated list", () => {
    expect(parseTransports(["stdio,http"])).toEqual(["stdio", "http"]);
  });
  it("deduplicates transports", () => {
    expect(parseTransports(["stdio", "stdio"])).toEqual(["stdio"]);
  });
  it("rejects empty string", () => {
    expect(parseTransports([""])).toBeInstanceOf(Error);
  });
  it("rejects unknown transport", () => {
    expect(parseTransports(["foo"])).toBeInstanceOf(Error);
  });
});

describe("parseLoggerType", () => {
  it("returns default for undefined", () => {
    expect(parseLoggerType(undefined)).toBe("console");
  });
  it("returns default for whitespace-only string", () => {
    expect(parseLoggerType("   ")).toBe("console");
  });
  it("accepts mcp_server", () => {
    expect(parseLoggerType("mcp_server")).toBe("mcp_server");
  });
  it("is case-insensitive and trims", () => {
    expect(parseLoggerType("  MCP_SERVER ")).toBe("mcp_server");
  });
  it("rejects invalid value", () => {
    const result = parseLoggerType("invalid");
    expect(result).toBeInstanceOf(Error);
    expect(String(result)).toContain("Invalid logger type");
  });
});

describe("parsePadding", () => {
  it("returns default for undefined or blank", () => {
    expect(parsePadding(undefined)).toBe(2);
    expect(parsePadding("  ")).toBe(2);
  });
  it("accepts zero", () => {
    expect(parsePadding("0")).toBe(0);
  });
  it("trims whitespace", () => {
    expect(parsePadding(" 7 ")).toBe(7);
  });
  it("rejects negative, fractional and non-numeric values", () => {
    expect(parsePadding("-1")).toBeInstanceOf(Error);
    expect(parsePadding("1.5")).toBeInstanceOf(Error);
    expect(parsePadding("two")).toBeInstanceOf(Error);
  });
  it("rejects values above 1024", () => {
    expect(parsePadding("1024")).toBe(1024);
    expect(String(parsePadding("1025"))).toContain("at most 1024");
  });
});

describe("parseNodeType", () => {
  it("returns default for undefined", () => {
    expect(parseNodeType(undefined)).toBe("WeightedNode");
  });
  it("accepts short and full names in any case", () => {
    expect(parseNodeType("unweighted")).toBe("UnWeightedNode");
    expect(parseNodeType("UnWeightedNode")).toBe("UnWeightedNode");
    expect(parseNodeType("WEIGHTED")).toBe("WeightedNode");
  });
  it("rejects unknown node types", () => {
    const result = parseNodeType("heavy");
    expect(result).toBeInstanceOf(Error);
    expect(String(result)).toContain('Invalid node type "heavy"');
  });
});

describe("shouldShowHelp", () => {
  it("returns true for --help", () => {
    expect(shouldShowHelp(["--help"])).toBe(true);
  });
  it("returns true for -h", () => {
    expect(shouldShowHelp(["-h"])).toBe(true);
  });
  it("returns false for no help flag", () => {
    expect(shouldShowHelp(["--http-port", "8080"])).toBe(false);
  });
  it("returns false for empty args", () => {
    expect(shouldShowHelp([])).toBe(false);
  });
});

describe("parseConfig", () => {
  const DEFAULT_RESULT: ServerConfig = {
    httpPort: 8080,
    transports: ["stdio"],
    loggerType: "console",
    padding: 2,
    nodeType: "WeightedNode",
  };

  it("no args returns default config", () => {
    expect(parseConfig([])).toEqual(DEFAULT_RESULT);
    expect(DEFAULT_CONFIG).toEqual(DEFAULT_RESULT);
  });
  it("--http-port flag sets custom port", () => {
    expect(parseConfig(["--http-port", "4242"])).toEqual({ ...DEFAULT_RESULT, httpPort: 4242 });
  });
  it("accepts the --flag=value form", () => {
    expect(parseConfig(["--http-port=4242"])).toEqual({ ...DEFAULT_RESULT, httpPort: 4242 });
  });
  it("help flag is ignored in config parsing", () => {
    expect(parseConfig(["--help"])).toEqual(DEFAULT_RESULT);
  });
  it("invalid port returns Error", () => {
    const result = parseConfig(["--http-port", "abc"]);
    expect(result).toBeInstanceOf(Error);
    expect(String(result)).toContain("Invalid port number");
  });
  it("missing http port value returns Error", () => {
    const result = parseConfig(["--http-port"]);
    expect(result).toBeInstanceOf(Error);
    expect(String(result)).toContain("--http-port flag requires a port number");
  });
  it("last http-port flag wins", () => {
    expect(parseConfig(["--http-port", "4000", "--http-port", "5000"])).toEqual({
      ...DEFAULT_RESULT,
      httpPort: 5000,
    });
  });
  it("sets multiple transports", () => {
    expect(parseConfig(["--transport", "stdio,http"])).toEqual({
      ...DEFAULT_RESULT,
      transports: ["stdio", "http"],
    });
  });
  it("missing transport value returns Error", () => {
    expect(parseConfig(["--transport"])).toBeInstanceOf(Error);
  });
  it("sets padding and node type from flags", () => {
    expect(parseConfig(["--padding", "0", "--node-type", "unweighted"])).toEqual({
      ...DEFAULT_RESULT,
      padding: 0,
      nodeType: "UnWeightedNode",
    });
  });
  it("missing padding value returns Error", () => {
    const result = parseConfig(["--padding"]);
    expect(String(result)).toContain("--padding flag requires a number of grid cells");
  });
  it("missing node type value returns Error", () => {
    const result = parseConfig(["--node-type"]);
    expect(String(result)).toContain("--node-type flag requires a node type");
  });
  it("invalid padding flag returns Error", () => {
    expect(parseConfig(["--padding", "-3"])).toBeInstanceOf(Error);
  });

  // env variable tests
  it("reads HTTP_PORT from env when no CLI flag", () => {
    expect(parseConfig([], { HTTP_PORT: "3000" })).toEqual({ ...DEFAULT_RESULT, httpPort: 3000 });
  });
  it("CLI --http-port takes precedence over env HTTP_PORT", () => {
    expect(parseConfig(["--http-port", "5000"], { HTTP_PORT: "3000" })).toEqual({
      ...DEFAULT_RESULT,
      httpPort: 5000,
    });
  });
  it("reads TRANSPORT from env when no CLI flag", () => {
    expect(parseConfig([], { TRANSPORT: "http" })).toEqual({ ...DEFAULT_RESULT, transports: ["http"] });
  });
  it("CLI --transport takes precedence over env TRANSPORT", () => {
    expect(parseConfig(["--transport", "stdio"], { TRANSPORT: "http" })).toEqual(DEFAULT_RESULT);
  });
  it("reads LOGGER_TYPE from env", () => {
    expect(parseConfig([], { LOGGER_TYPE: "mcp_server" })).toEqual({ ...DEFAULT_RESULT, loggerType: "mcp_server" });
  });
  it("reads UDM_PADDING and UDM_NODE_TYPE from env", () => {
    expect(parseConfig([], { UDM_PADDING: "5", UDM_NODE_TYPE: "UnWeightedNode" })).toEqual({
      ...DEFAULT_RESULT,
      padding: 5,
      nodeType: "UnWeightedNode",
    });
  });
  it("CLI --padding takes precedence over env UDM_PADDING", () => {
    expect(parseConfig(["--padding", "1"], { UDM_PADDING: "9" })).toEqual({ ...DEFAULT_RESULT, padding: 1 });
  });
  it("invalid UDM_NODE_TYPE in env returns Error", () => {
    expect(parseConfig([], { UDM_NODE_TYPE: "heavy" })).toBeInstanceOf(Error);
  });
  it("combines CLI and env settings", () => {
    expect(parseConfig(
      ["--http-port", "9000", "--node-type", "unweighted"],
      { TRANSPORT: "http", LOGGER_TYPE: "mcp_server", UDM_PADDING: "0" },
    )).toEqual({
      httpPort: 9000,
      transports: ["http"],
      loggerType: "mcp_server",
      padding: 0,
      nodeType: "UnWeightedNode",
    });
  });
  it("invalid HTTP_PORT in env returns Error", () => {
    expect(parseConfig([], { HTTP_PORT: "abc" })).toBeInstanceOf(Error);
  });
  it("invalid TRANSPORT in env returns Error", () => {
    expect(parseConfig([], { TRANSPORT: "websocket" })).toBeInstanceOf(Error);
  });
});

describe("buildConfig", () => {
  it("uses default config with empty args and env", () => {
    expect(buildConfig([], {})).toEqual(DEFAULT_CONFIG);
  });
  it("parses custom http port from args", () => {
    const result = buildConfig(["--http-port", "4242"], {});
    expect(result).not.toBeInstanceOf(Error);
    if (!(result instanceof Error)) expect(result.httpPort).toBe(4242);
  });
  it("returns Error for invalid config", () => {
    expect(buildConfig(["--http-port", "abc"], {})).toBeInstanceOf(Error);
  });
  it("reads LOGGER_TYPE from env param", () => {
    const result = buildConfig([], { LOGGER_TYPE: "mcp_server" });
    expect(result).toMatchObject({ loggerType: "mcp_server" });
  });
});
