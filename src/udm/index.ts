export { type Block, blockRows, type Connection, connectionSymbol, EMPTY_SYMBOL, formatBlock, OVERFLOW_SYMBOL, sideSymbol } from "./block.js";
export {
  checkCopyLine,
  type CopyLine,
  CopyLineError,
  createCopyLines,
  formatCopyLine,
  validateVertexOrder,
  VertexOrderError,
} from "./copyline.js";
export { type Crossing, CrossingLattice, createCrossingLattice } from "./crossing_lattice.js";
export {
  centerLocation,
  copylineLocations,
  type GridNode,
  gridNodes,
  NODE_TYPES,
  nodeFromType,
  type NodeType,
  ONE,
  SPACING,
} from "./geometry.js";
export { type Edge, type GraphSpec, isVertexId, SimpleGraph, type StructuredError } from "./graph.js";
