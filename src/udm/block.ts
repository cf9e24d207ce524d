/**
 * A block is the symbolic 3x3 view of one lattice coordinate: which copy
 * lines reach it from each side, and whether the crossing there encodes an
 * edge. Blocks are computed on demand and never stored.
 */

/**
 * - `none`: no horizontal and vertical line meet here
 * - `disconnected`: two lines cross, their vertices are not adjacent
 * - `connected`: two lines cross and their vertices share an edge
 */
export type Connection = "none" | "disconnected" | "connected";

export interface Block {
  /** Vertex whose line leaves upward, or `null` for no line. */
  readonly top: number | null;
  readonly bottom: number | null;
  readonly left: number | null;
  readonly right: number | null;
  readonly connected: Connection;
}

export const EMPTY_SYMBOL = "⋅";

const CONNECTION_SYMBOL: Record<Connection, string> = {
  none: EMPTY_SYMBOL,
  disconnected: "○",
  connected: "●",
};

/** Label shared by every vertex past `z`. */
export const OVERFLOW_SYMBOL = "#";

/** Single-character label of a side: digits below 10, then `a` to `z`, then `#`. */
export function sideSymbol(vertex: number | null): string {
  if (vertex === null) return EMPTY_SYMBOL;
  if (vertex < 10) return String(vertex);
  if (vertex < 36) return String.fromCharCode("a".charCodeAt(0) + (vertex - 10));
  return OVERFLOW_SYMBOL;
}

export function connectionSymbol(connected: Connection): string {
  return CONNECTION_SYMBOL[connected];
}

/** The three text rows of a block, top to bottom. */
export function blockRows(block: Block): [string, string, string] {
  return [
    ` ${EMPTY_SYMBOL} ${sideSymbol(block.top)} ${EMPTY_SYMBOL}`,
    ` ${sideSymbol(block.left)} ${connectionSymbol(block.connected)} ${sideSymbol(block.right)}`,
    ` ${EMPTY_SYMBOL} ${sideSymbol(block.bottom)} ${EMPTY_SYMBOL}`,
  ];
}

export function formatBlock(block: Block): string {
  return blockRows(block).join("\n");
}
