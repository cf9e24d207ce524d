/**
 * Simple undirected graph used as the source of a crossing lattice.
 *
 * Vertices are non-negative integers. Edges are unordered pairs without
 * self-loops or parallel edges; adjacency is answered in O(1) from a
 * per-vertex neighbour set.
 *
 * Mutators follow the model convention of returning `{ error }` values instead
 * of throwing, so callers at the tool boundary can forward them unchanged.
 */

export interface StructuredError {
  code: string;
  message: string;
  vertex?: number;
  index?: number;
  suggestion?: string;
}

export type Edge = readonly [number, number];

/** Plain description of a graph, as accepted from callers. */
export interface GraphSpec {
  vertices?: readonly number[];
  edges: readonly Edge[];
}

export function isVertexId(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

export class SimpleGraph {
  private adjacency: Map<number, Set<number>> = new Map();
  private edgeCount: number = 0;

  /**
   * Build a graph from an explicit vertex list and edge list.
   * When `vertices` is omitted the vertex set is the set of edge endpoints.
   */
  static fromSpec(spec: GraphSpec): SimpleGraph | { error: StructuredError } {
    const graph = new SimpleGraph();
    const vertices = spec.vertices ?? spec.edges.flat();

    for (const v of vertices) {
      const added = graph.addVertex(v);
      if (typeof added !== "number") return added;
    }

    for (const [index, [u, v]] of spec.edges.entries()) {
      const added = graph.addEdge(u, v);
      if ("error" in added) {
        return { error: { ...added.error, index } };
      }
    }
    return graph;
  }

  addVertex(v: number): number | { error: StructuredError } {
    if (!isVertexId(v)) {
      return {
        error: {
          code: "INVALID_VERTEX",
          message: `Vertex '${v}' is not a non-negative integer`,
          vertex: v,
        },
      };
    }
    if (!this.adjacency.has(v)) {
      this.adjacency.set(v, new Set());
    }
    return v;
  }

  addEdge(u: number, v: number): Edge | { error: StructuredError } {
    for (const endpoint of [u, v]) {
      if (!this.adjacency.has(endpoint)) {
        return {
          error: {
            code: "VERTEX_NOT_FOUND",
            message: `Edge endpoint '${endpoint}' is not a vertex of the graph`,
            vertex: endpoint,
            suggestion: "List every edge endpoint in `vertices`, or omit `vertices` to derive them from the edges",
          },
        };
      }
    }
    if (u === v) {
      return {
        error: {
          code: "SELF_LOOP",
          message: `Self-loop on vertex '${u}' is not allowed in a simple graph`,
          vertex: u,
        },
      };
    }

    const neighbours = this.adjacency.get(u);
    if (neighbours && !neighbours.has(v)) {
      neighbours.add(v);
      this.adjacency.get(v)?.add(u);
      this.edgeCount++;
    }
    return u < v ? [u, v] : [v, u];
  }

  hasVertex(v: number): boolean {
    return this.adjacency.has(v);
  }

  hasEdge(u: number, v: number): boolean {
    return this.adjacency.get(u)?.has(v) ?? false;
  }

  /** Number of vertices. */
  get size(): number {
    return this.adjacency.size;
  }

  get numEdges(): number {
    return this.edgeCount;
  }

  /** Each edge once, as `[smaller, larger]`, sorted. */
  edges(): Edge[] {
    const result: Edge[] = [];
    for (const [u, neighbours] of this.adjacency) {
      for (const v of neighbours) {
        if (u < v) result.push([u, v]);
      }
    }
    return result.sort((a, b) => a[0] - b[0] || a[1] - b[1]);
  }
}
