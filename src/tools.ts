/**
 * Tool handlers that expose the crossing-lattice builder.
 *
 * Handlers are stateless across invocations: every call carries the graph and
 * the vertex order, and the copy lines and lattice are rebuilt from them.
 * Responses are JSON text, `{ success: true, data }` on success and
 * `{ success: false, error }` (with `isError`) otherwise.
 */

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { DEFAULT_CONFIG, type ServerConfig } from "./config.js";
import { blockRows, connectionSymbol, EMPTY_SYMBOL } from "./udm/block.js";
import { type CopyLine, createCopyLines, formatCopyLine, validateVertexOrder } from "./udm/copyline.js";
import { CrossingLattice } from "./udm/crossing_lattice.js";
import { centerLocation, copylineLocations, NODE_TYPES, SPACING } from "./udm/geometry.js";
import { type GraphSpec, SimpleGraph, type StructuredError } from "./udm/graph.js";
import { COPYLINE_LOCATIONS_INPUT, MAPPING_INPUT, QUERY_BLOCKS_INPUT } from "./tool_definitions.js";
import type { ToolLogger } from "./tool_handler.js";

export type ToolArgs = Record<string, unknown>;

export type HandlerSettings = Pick<ServerConfig, "padding" | "nodeType">;

const MappingArgs = z.object(MAPPING_INPUT);
const QueryBlocksArgs = z.object(QUERY_BLOCKS_INPUT);
const CopylineLocationsArgs = z.object(COPYLINE_LOCATIONS_INPUT);

function successResult(data: unknown): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify({ success: true, data }) }],
  };
}

function errorResult(error: StructuredError): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify({ success: false, error }) }],
    isError: true,
  };
}

function parseArgs<T>(schema: z.ZodType<T>, args: ToolArgs | undefined): { args: T } | { error: StructuredError } {
  const parsed = schema.safeParse(args ?? {});
  if (parsed.success) {
    return { args: parsed.data };
  }
  const details = parsed.error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
  return {
    error: {
      code: "INVALID_INPUT",
      message: `Invalid arguments: ${details}`,
    },
  };
}

interface Mapping {
  graph: SimpleGraph;
  lines: CopyLine[];
  lattice: CrossingLattice;
}

function serializeLine(line: CopyLine) {
  return {
    vertex: line.vertex,
    vslot: line.vslot,
    hslot: line.hslot,
    vstart: line.vstart,
    vstop: line.vstop,
    hstop: line.hstop,
    text: formatCopyLine(line),
  };
}

export function createHandlers(settings: HandlerSettings = DEFAULT_CONFIG, logger?: ToolLogger) {
  const log = logger || { debug: () => {} };

  function buildMapping(spec: GraphSpec, order: readonly number[]): Mapping | { error: StructuredError } {
    const graph = SimpleGraph.fromSpec(spec);
    if ("error" in graph) {
      return graph;
    }
    const problem = validateVertexOrder(graph, order);
    if (problem) {
      return { error: { suggestion: "Pass a permutation of the graph's vertices as `vertex_order`", ...problem } };
    }
    const lines = createCopyLines(graph, order);
    const lattice = new CrossingLattice(order.length, order.length, lines, graph);
    log.debug(`built ${lattice.height}x${lattice.width} lattice for ${graph.numEdges} edge(s)`);
    return { graph, lines, lattice };
  }

  /** Parse the mapping arguments, build the mapping, then run `operation`. */
  function withMapping<T extends { graph: GraphSpec; vertex_order: number[] }>(
    schema: z.ZodType<T>,
    rawArgs: ToolArgs | undefined,
    operation: (mapping: Mapping, args: T) => CallToolResult,
  ): CallToolResult {
    const parsed = parseArgs(schema, rawArgs);
    if ("error" in parsed) {
      return errorResult(parsed.error);
    }
    const mapping = buildMapping(parsed.args.graph, parsed.args.vertex_order);
    if ("error" in mapping) {
      return errorResult(mapping.error);
    }
    return operation(mapping, parsed.args);
  }

  return {
    "create-copylines": (args: ToolArgs): CallToolResult => {
      return withMapping(MappingArgs, args, ({ lines, lattice }) =>
        successResult({
          copylines: lines.map(serializeLine),
          shape: { height: lattice.height, width: lattice.width },
        })
      );
    },

    "query-blocks": (args: ToolArgs): CallToolResult => {
      return withMapping(QueryBlocksArgs, args, ({ lattice }, { positions }) => {
        const results = positions.map(({ row, col }) => {
          try {
            const block = lattice.query(row, col);
            return { row, col, block, rows: blockRows(block) };
          } catch (err) {
            if (!(err instanceof RangeError)) throw err;
            return {
              row,
              col,
              error: {
                code: "OUT_OF_BOUNDS",
                message: err.message,
                suggestion: `Rows and columns run from 1 to ${lattice.height} and 1 to ${lattice.width}`,
              },
            };
          }
        });
        return successResult({
          results,
          shape: { height: lattice.height, width: lattice.width },
        });
      });
    },

    "render-lattice": (args: ToolArgs): CallToolResult => {
      return withMapping(MappingArgs, args, ({ lattice }) =>
        successResult({
          shape: { height: lattice.height, width: lattice.width },
          text: lattice.toString(),
        })
      );
    },

    "list-crossings": (args: ToolArgs): CallToolResult => {
      return withMapping(MappingArgs, args, ({ graph, lattice }) => {
        const crossings = lattice.crossings();
        return successResult({
          crossings,
          total: crossings.length,
          connected_count: crossings.filter((c) => c.connected === "connected").length,
          edge_count: graph.numEdges,
        });
      });
    },

    "copyline-locations": (args: ToolArgs): CallToolResult => {
      return withMapping(CopylineLocationsArgs, args, ({ lines }, parsed) => {
        const padding = parsed.padding ?? settings.padding;
        const nodeType = parsed.node_type ?? settings.nodeType;

        let selected: CopyLine[] = lines;
        if (parsed.vertices) {
          selected = [];
          for (const vertex of parsed.vertices) {
            const line = lines.find((l) => l.vertex === vertex);
            if (!line) {
              return errorResult({
                code: "VERTEX_NOT_FOUND",
                message: `Vertex '${vertex}' has no copy line`,
                vertex,
                suggestion: "Use vertices from `vertex_order`",
              });
            }
            selected.push(line);
          }
        }

        const traced = selected.map((line) => {
          const [row, col] = centerLocation(line, padding);
          const nodes = copylineLocations(nodeType, line, padding);
          return { vertex: line.vertex, center: { row, col }, nodes, node_count: nodes.length };
        });
        return successResult({
          padding,
          node_type: nodeType,
          lines: traced,
          node_count: traced.reduce((sum, t) => sum + t.node_count, 0),
        });
      });
    },

    "get-conventions": (_args: ToolArgs): CallToolResult => {
      return successResult({
        spacing: SPACING,
        default_padding: settings.padding,
        default_node_type: settings.nodeType,
        node_types: NODE_TYPES,
        symbols: {
          empty: EMPTY_SYMBOL,
          connected: connectionSymbol("connected"),
          disconnected: connectionSymbol("disconnected"),
        },
      });
    },
  };
}

/** Default handlers instance, configured with the default settings. */
export const handlers = createHandlers();
