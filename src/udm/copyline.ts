/**
 * Copy lines: the T-shaped path that stands in for one graph vertex.
 *
 * A copy line is described in slot coordinates of an n×n slot grid. The
 * vertical segment runs through column `vslot` from row `vstart` to `vstop`;
 * the horizontal segment runs through row `hslot` from column `vslot` to
 * `hstop`. There is no `hstart`: the horizontal arm always begins at the
 * vertical one.
 */

import type { SimpleGraph, StructuredError } from "./graph.js";

export interface CopyLine {
  readonly vertex: number;
  readonly vslot: number;
  readonly hslot: number;
  readonly vstart: number;
  readonly vstop: number;
  readonly hstop: number;
}

/** Thrown by {@link createCopyLines} when the vertex order is not a permutation of the graph. */
export class VertexOrderError extends Error {
  readonly detail: StructuredError;

  constructor(detail: StructuredError) {
    super(detail.message);
    this.name = "VertexOrderError";
    this.detail = detail;
  }
}

/** Thrown when a copy line handed to a lattice breaks the slot invariants. */
export class CopyLineError extends Error {
  readonly detail: StructuredError;

  constructor(detail: StructuredError) {
    super(detail.message);
    this.name = "CopyLineError";
    this.detail = detail;
  }
}

export function formatCopyLine(line: CopyLine): string {
  return `CopyLine ${line.vertex}: vslot → [${line.vstart}:${line.vstop},${line.vslot}], hslot → [${line.hslot},${line.vslot}:${line.hstop}]`;
}

/**
 * Check that `order` is a permutation of the graph's vertices.
 * Returns `null` when it is, otherwise the first problem found.
 */
export function validateVertexOrder(
  graph: SimpleGraph,
  order: readonly number[],
): StructuredError | null {
  if (order.length !== graph.size) {
    return {
      code: "ORDER_LENGTH_MISMATCH",
      message: `Vertex order has ${order.length} entries but the graph has ${graph.size} vertices`,
      suggestion: "Pass every vertex of the graph exactly once",
    };
  }

  const seen = new Set<number>();
  for (const [index, v] of order.entries()) {
    if (!graph.hasVertex(v)) {
      return {
        code: "UNKNOWN_VERTEX",
        message: `Vertex '${v}' at position ${index} is not in the graph`,
        vertex: v,
        index,
      };
    }
    if (seen.has(v)) {
      return {
        code: "DUPLICATE_VERTEX",
        message: `Vertex '${v}' appears more than once (again at position ${index})`,
        vertex: v,
        index,
      };
    }
    seen.add(v);
  }
  return null;
}

/**
 * Line factory: one copy line per vertex, in order.
 *
 * Every line sits on the diagonal of the slot grid and spans it completely
 * (`vstart = 1`, `vstop = hstop = n`), so any two lines cross exactly once,
 * at a point fixed by their slots alone.
 *
 * @throws {VertexOrderError} when `order` is not a permutation of the graph's vertices
 */
export function createCopyLines(graph: SimpleGraph, order: readonly number[]): CopyLine[] {
  const problem = validateVertexOrder(graph, order);
  if (problem) {
    throw new VertexOrderError(problem);
  }

  const n = order.length;
  return order.map((vertex, i) =>
    Object.freeze({
      vertex,
      vslot: i + 1,
      hslot: i + 1,
      vstart: 1,
      vstop: n,
      hstop: n,
    })
  );
}

/**
 * Slot invariants a line must satisfy to be queried on a lattice of the given
 * shape. Returns `null` for a valid line.
 */
export function checkCopyLine(
  line: CopyLine,
  shape: { height: number; width: number },
  graph?: SimpleGraph,
): StructuredError | null {
  const fields = [line.vslot, line.hslot, line.vstart, line.vstop, line.hstop];
  if (!fields.every(Number.isInteger)) {
    return {
      code: "INVALID_COPYLINE",
      message: `${formatCopyLine(line)} has non-integer slot bounds`,
      vertex: line.vertex,
    };
  }
  if (line.vslot < 1 || line.vslot > shape.width || line.hslot < 1 || line.hslot > shape.height) {
    return {
      code: "INVALID_COPYLINE",
      message: `${formatCopyLine(line)} has a slot outside the ${shape.height}×${shape.width} lattice`,
      vertex: line.vertex,
    };
  }
  if (line.vstart < 1 || line.vstop > shape.height || line.hstop > shape.width) {
    return {
      code: "INVALID_COPYLINE",
      message: `${formatCopyLine(line)} reaches outside the ${shape.height}×${shape.width} lattice`,
      vertex: line.vertex,
    };
  }
  if (line.vstart > line.hslot || line.hslot > line.vstop) {
    return {
      code: "INVALID_COPYLINE",
      message: `${formatCopyLine(line)} does not satisfy vstart ≤ hslot ≤ vstop`,
      vertex: line.vertex,
    };
  }
  if (line.hstop < line.vslot) {
    return {
      code: "INVALID_COPYLINE",
      message: `${formatCopyLine(line)} ends its horizontal segment before vslot`,
      vertex: line.vertex,
    };
  }
  if (graph && !graph.hasVertex(line.vertex)) {
    return {
      code: "UNKNOWN_VERTEX",
      message: `${formatCopyLine(line)} refers to a vertex that is not in the graph`,
      vertex: line.vertex,
    };
  }
  return null;
}
