/**
 * Crossing lattice — a read-only view over a set of copy lines.
 *
 * Querying coordinate (i, j) scans every line, records which ones touch the
 * coordinate from each side, and consults the source graph to decide whether
 * the crossing there is an edge. Nothing is cached: each query is O(lines).
 *
 * Lines are checked once at construction; queries trust them afterwards.
 */

import { type Block, blockRows, type Connection } from "./block.js";
import { checkCopyLine, type CopyLine, CopyLineError, createCopyLines } from "./copyline.js";
import type { SimpleGraph } from "./graph.js";

/** A coordinate where a horizontal and a vertical line meet. */
export interface Crossing {
  row: number;
  col: number;
  /** Vertex of the line running horizontally through the coordinate. */
  horizontal: number;
  /** Vertex of the line running vertically through the coordinate. */
  vertical: number;
  connected: Exclude<Connection, "none">;
}

export class CrossingLattice {
  readonly width: number;
  readonly height: number;
  readonly lines: readonly CopyLine[];
  private readonly graph: SimpleGraph;

  /**
   * @throws {CopyLineError} when a line breaks the slot invariants or names a vertex missing from `graph`
   */
  constructor(width: number, height: number, lines: readonly CopyLine[], graph: SimpleGraph) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
      throw new RangeError(`Lattice shape (${height}, ${width}) must be non-negative integers`);
    }
    for (const line of lines) {
      const problem = checkCopyLine(line, { height, width }, graph);
      if (problem) throw new CopyLineError(problem);
    }
    this.width = width;
    this.height = height;
    this.lines = Object.freeze(lines.map((line) => Object.freeze({ ...line })));
    this.graph = graph;
  }

  /** `[height, width]` */
  shape(): [number, number] {
    return [this.height, this.width];
  }

  /**
   * Block at row `i`, column `j` (both 1-based).
   *
   * @throws {RangeError} outside `[1, height] × [1, width]`
   */
  query(i: number, j: number): Block {
    if (!Number.isInteger(i) || !Number.isInteger(j) || i < 1 || i > this.height || j < 1 || j > this.width) {
      throw new RangeError(`Index (${i}, ${j}) out of bounds.`);
    }

    let top: number | null = null;
    let bottom: number | null = null;
    let left: number | null = null;
    let right: number | null = null;

    for (const line of this.lines) {
      if (line.vslot === j) {
        if (line.vstart === i && line.vstop === i) {
          // single row: no vertical extent
        } else if (line.vstart === i) {
          bottom = line.vertex;
        } else if (line.vstop === i) {
          top = line.vertex;
        } else if (line.vstart < i && i < line.vstop) {
          top = bottom = line.vertex;
        }
      }

      if (line.hslot === i) {
        if (line.vslot === j && line.hstop === j) {
          // single column: no horizontal extent
        } else if (line.vslot === j) {
          right = line.vertex;
        } else if (line.hstop === j) {
          left = line.vertex;
        } else if (line.vslot < j && j < line.hstop) {
          left = right = line.vertex;
        }
      }
    }

    const h = left ?? right;
    const v = top ?? bottom;
    let connected: Connection = "none";
    if (h !== null && v !== null) {
      connected = this.graph.hasEdge(h, v) ? "connected" : "disconnected";
    }

    return { top, bottom, left, right, connected };
  }

  /** Every coordinate where a horizontal and a vertical line meet, row-major. */
  crossings(): Crossing[] {
    const result: Crossing[] = [];
    for (let i = 1; i <= this.height; i++) {
      for (let j = 1; j <= this.width; j++) {
        const block = this.query(i, j);
        const horizontal = block.left ?? block.right;
        const vertical = block.top ?? block.bottom;
        if (block.connected !== "none" && horizontal !== null && vertical !== null) {
          result.push({ row: i, col: j, horizontal, vertical, connected: block.connected });
        }
      }
    }
    return result;
  }

  /** Text rendering: three rows per lattice row, blocks separated by a space. */
  toString(): string {
    const rows: string[] = [];
    for (let i = 1; i <= this.height; i++) {
      const blocks: Array<[string, string, string]> = [];
      for (let j = 1; j <= this.width; j++) {
        blocks.push(blockRows(this.query(i, j)));
      }
      for (let k = 0; k < 3; k++) {
        rows.push(blocks.map((b) => b[k]).join(" "));
      }
    }
    return rows.join("\n");
  }
}

/**
 * Copy lines for `order` and the n×n lattice over them.
 *
 * @throws {VertexOrderError} when `order` is not a permutation of the graph's vertices
 */
export function createCrossingLattice(graph: SimpleGraph, order: readonly number[]): CrossingLattice {
  const lines = createCopyLines(graph, order);
  return new CrossingLattice(order.length, order.length, lines, graph);
}
