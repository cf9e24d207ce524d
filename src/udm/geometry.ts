/**
 * Geometry emitter: traces a copy line onto the pixel grid as a list of
 * weighted nodes.
 *
 * Each slot expands to `SPACING` grid cells. Nodes are emitted in a fixed
 * order (up, turn + down, right, center) so consumers can follow the path.
 * Arm ends carry weight 1 and every other arm node weight 2; the center node
 * carries the number of arms that were grown.
 */

import type { CopyLine } from "./copyline.js";

/** Grid cells per slot. */
export const SPACING = 4;

/** Weight carried by every node of an unweighted mapping. */
export const ONE = 1;

export type NodeType = "WeightedNode" | "UnWeightedNode";

export const NODE_TYPES: readonly NodeType[] = ["WeightedNode", "UnWeightedNode"] as const;

export interface GridNode {
  readonly row: number;
  readonly col: number;
  readonly weight: number;
}

export function nodeFromType(nodeType: NodeType, row: number, col: number, weight: number): GridNode {
  return { row, col, weight: nodeType === "UnWeightedNode" ? ONE : weight };
}

/** Pixel coordinates `[I, J]` of the corner where the line's arms meet. */
export function centerLocation(line: CopyLine, padding: number): [number, number] {
  const I = SPACING * (line.hslot - 1) + padding + 2;
  const J = SPACING * (line.vslot - 1) + padding + 1;
  return [I, J];
}

/**
 * Nodes tracing `line`, offset by `padding` cells from the grid origin.
 *
 * Expects `vstart ≤ hslot ≤ vstop` and `hstop ≥ vslot`; other lines produce
 * truncated runs rather than an error.
 */
export function copylineLocations(nodeType: NodeType, line: CopyLine, padding: number): GridNode[] {
  const [I, J] = centerLocation(line, padding);
  const locations: GridNode[] = [];
  let nline = 0;

  // up
  const start = I + SPACING * (line.vstart - line.hslot) + 1;
  if (line.vstart < line.hslot) nline++;
  for (let i = I; i >= start; i--) {
    locations.push(nodeFromType(nodeType, i, J, i === start ? 1 : 2));
  }

  // down, starting with the turn into the horizontal arm
  const stop = I + SPACING * (line.vstop - line.hslot) - 1;
  if (line.vstop > line.hslot) nline++;
  for (let i = I; i <= stop; i++) {
    if (i === I) {
      locations.push(nodeFromType(nodeType, i + 1, J + 1, 2));
    } else {
      locations.push(nodeFromType(nodeType, i, J, i === stop ? 1 : 2));
    }
  }

  // right
  const hstop = J + SPACING * (line.hstop - line.vslot) - 1;
  if (line.hstop > line.vslot) nline++;
  for (let j = J + 2; j <= hstop; j++) {
    locations.push(nodeFromType(nodeType, I, j, j === hstop ? 1 : 2));
  }

  locations.push(nodeFromType(nodeType, I, J + 1, nline));
  return locations;
}

/** Nodes of every line, concatenated in line order. */
export function gridNodes(nodeType: NodeType, lines: readonly CopyLine[], padding: number): GridNode[] {
  return lines.flatMap((line) => copylineLocations(nodeType, line, padding));
}
