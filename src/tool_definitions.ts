/**
 * Centralized tool definitions — name, description, hasArgs, and input schema
 * for every MCP tool, in a single iterable list.
 *
 * tool_registrations.ts loops over TOOL_DEFINITIONS to call server.registerTool();
 * tools.ts parses arguments with the same shapes.
 */

import { z } from "zod";

// ─── Tool Definition Types ───────────────────────────────────

interface ToolDefinitionBase {
  /** UPPER_SNAKE_CASE key for the TOOL_NAMES lookup object */
  key: string;
  /** kebab-case name exposed to MCP clients */
  name: string;
  /** Human-readable description shown to MCP clients */
  description: string;
}

export interface ToolDefinitionWithArgs extends ToolDefinitionBase {
  hasArgs: true;
  inputSchema: z.ZodRawShape;
}

export interface ToolDefinitionWithoutArgs extends ToolDefinitionBase {
  hasArgs: false;
}

export type ToolDefinition = ToolDefinitionWithArgs | ToolDefinitionWithoutArgs;

// ─── Shared Schemas ──────────────────────────────────────────

const vertexIdSchema = z.number().int().nonnegative();

const graphSchema = z
  .object({
    vertices: z
      .array(vertexIdSchema)
      .optional()
      .describe("All vertex ids (non-negative integers). Omit to use the endpoints of `edges`; list isolated vertices explicitly."),
    edges: z
      .array(z.tuple([vertexIdSchema, vertexIdSchema]))
      .describe("Undirected edges as [u, v] pairs. No self-loops; duplicates are ignored."),
  })
  .describe("The simple undirected graph to map.");

/** Lattice queries scan every line, so listing or rendering grows with n³. */
export const MAX_VERTICES = 256;

const vertexOrderSchema = z
  .array(vertexIdSchema)
  .max(MAX_VERTICES)
  .describe("A permutation of the graph's vertices. The i-th vertex gets slot i+1 on both axes.");

const positionSchema = z.object({
  row: z.number().int().describe("Lattice row, 1-based"),
  col: z.number().int().describe("Lattice column, 1-based"),
});

const nodeTypeSchema = z
  .enum(["WeightedNode", "UnWeightedNode"])
  .optional()
  .describe("WeightedNode carries segment weights (1 at arm ends, 2 elsewhere, arm count at the center); UnWeightedNode gives every node weight 1. Defaults to the server's configured node type.");

// ─── Input Shapes ────────────────────────────────────────────

export const MAPPING_INPUT = {
  graph: graphSchema,
  vertex_order: vertexOrderSchema,
};

export const QUERY_BLOCKS_INPUT = {
  ...MAPPING_INPUT,
  positions: z
    .array(positionSchema)
    .min(1)
    .describe("Coordinates to query. Always pass ALL positions in a single call."),
};

export const COPYLINE_LOCATIONS_INPUT = {
  ...MAPPING_INPUT,
  padding: z
    .number()
    .int()
    .nonnegative()
    .optional()
    .describe("Grid cells added before the first slot on both axes. Defaults to the server's configured padding."),
  node_type: nodeTypeSchema,
  vertices: z
    .array(vertexIdSchema)
    .optional()
    .describe("Only emit nodes for these vertices' copy lines. Omit for all lines, in vertex order."),
};

// ─── Tool Definitions ────────────────────────────────────────

export const TOOL_DEFINITIONS: readonly ToolDefinition[] = [
  {
    key: "CREATE_COPYLINES",
    name: "create-copylines",
    description: "Build one T-shaped copy line per vertex from a graph and a vertex order. Returns each line's slots (vslot, hslot, vstart, vstop, hstop) and the lattice shape.",
    hasArgs: true,
    inputSchema: MAPPING_INPUT,
  },
  {
    key: "QUERY_BLOCKS",
    name: "query-blocks",
    description: "Query the crossing lattice at one or more (row, col) coordinates. Each block reports the vertex whose line touches each side (null for none) and whether the crossing is connected, disconnected or none.",
    hasArgs: true,
    inputSchema: QUERY_BLOCKS_INPUT,
  },
  {
    key: "RENDER_LATTICE",
    name: "render-lattice",
    description: "Render the whole crossing lattice as text: three rows per lattice row, ● for connected crossings, ○ for disconnected ones, ⋅ for empty.",
    hasArgs: true,
    inputSchema: MAPPING_INPUT,
  },
  {
    key: "LIST_CROSSINGS",
    name: "list-crossings",
    description: "List every lattice coordinate where a horizontal and a vertical copy line meet, with the two vertices and whether they are adjacent.",
    hasArgs: true,
    inputSchema: MAPPING_INPUT,
  },
  {
    key: "COPYLINE_LOCATIONS",
    name: "copyline-locations",
    description: "Trace copy lines onto the pixel grid. Returns each line's weighted nodes in path order: upward run, turn and downward run, rightward run, then the center node.",
    hasArgs: true,
    inputSchema: COPYLINE_LOCATIONS_INPUT,
  },
  {
    key: "GET_CONVENTIONS",
    name: "get-conventions",
    description: "Describe the mapping conventions: grid spacing per slot, default padding and node type, and the lattice text symbols.",
    hasArgs: false,
  },
];

// ─── Derived Constants ───────────────────────────────────────

/** Tool name constants derived from TOOL_DEFINITIONS (UPPER_SNAKE_CASE key → kebab-case value) */
export const TOOL_NAMES: { readonly [key: string]: string } = Object.freeze(
  Object.fromEntries(TOOL_DEFINITIONS.map((t) => [t.key, t.name])),
);
