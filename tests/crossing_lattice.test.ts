import { describe, expect, it } from "vitest";
import { type CopyLine, CopyLineError, createCopyLines, VertexOrderError } from "../src/udm/copyline.js";
import { CrossingLattice, createCrossingLattice } from "../src/udm/crossing_lattice.js";
import { SimpleGraph } from "../src/udm/graph.js";

function graphOf(vertices: number[], edges: Array<[number, number]>): SimpleGraph {
  const graph = SimpleGraph.fromSpec({ vertices, edges });
  if ("error" in graph) throw new Error(graph.error.message);
  return graph;
}

// Path 0 - 1 - 2, ordered [0, 1, 2]
const path3 = graphOf([0, 1, 2], [[0, 1], [1, 2]]);
const lattice = createCrossingLattice(path3, [0, 1, 2]);

describe("CrossingLattice", () => {
  it("should be n×n", () => {
    expect(lattice.width).toBe(3);
    expect(lattice.height).toBe(3);
    expect(lattice.shape()).toEqual([3, 3]);
  });

  describe("query", () => {
    it("should report a connected crossing for edge (0, 1) at (1, 2)", () => {
      expect(lattice.query(1, 2)).toEqual({ top: null, bottom: 1, left: 0, right: 0, connected: "connected" });
    });

    it("should report a connected crossing for edge (1, 2) at (2, 3)", () => {
      expect(lattice.query(2, 3)).toEqual({ top: 2, bottom: 2, left: 1, right: null, connected: "connected" });
    });

    it("should report a disconnected crossing for the non-edge (0, 2) at (1, 3)", () => {
      expect(lattice.query(1, 3)).toEqual({ top: null, bottom: 2, left: 0, right: null, connected: "disconnected" });
    });

    it("should look up a line crossing itself as a non-edge", () => {
      expect(lattice.query(2, 2)).toEqual({ top: 1, bottom: 1, left: null, right: 1, connected: "disconnected" });
      expect(lattice.query(1, 1)).toEqual({ top: null, bottom: 0, left: null, right: 0, connected: "disconnected" });
    });

    it("should report none where only a vertical line passes", () => {
      expect(lattice.query(2, 1)).toEqual({ top: 0, bottom: 0, left: null, right: null, connected: "none" });
      expect(lattice.query(3, 1)).toEqual({ top: 0, bottom: null, left: null, right: null, connected: "none" });
      expect(lattice.query(3, 2)).toEqual({ top: 1, bottom: null, left: null, right: null, connected: "none" });
    });

    it("should ignore the horizontal arm of a line that is a single column", () => {
      expect(lattice.query(3, 3)).toEqual({ top: 2, bottom: null, left: null, right: null, connected: "none" });
    });

    it("should be deterministic", () => {
      expect(lattice.query(2, 3)).toEqual(lattice.query(2, 3));
    });

    it("should throw RangeError out of bounds", () => {
      expect(() => lattice.query(0, 1)).toThrow(RangeError);
      expect(() => lattice.query(1, 4)).toThrow(RangeError);
      expect(() => lattice.query(4, 4)).toThrow("Index (4, 4) out of bounds.");
      expect(() => lattice.query(1.5, 1)).toThrow(RangeError);
    });
  });

  describe("crossings", () => {
    it("should find one connected crossing per edge, at (slot(u), slot(v))", () => {
      const connected = lattice.crossings().filter((c) => c.connected === "connected");
      expect(connected).toEqual([
        { row: 1, col: 2, horizontal: 0, vertical: 1, connected: "connected" },
        { row: 2, col: 3, horizontal: 1, vertical: 2, connected: "connected" },
      ]);
    });

    it("should list every crossing in row-major order", () => {
      expect(lattice.crossings().map((c) => [c.row, c.col, c.connected])).toEqual([
        [1, 1, "disconnected"],
        [1, 2, "connected"],
        [1, 3, "disconnected"],
        [2, 2, "disconnected"],
        [2, 3, "connected"],
      ]);
    });

    it("should move crossings with the order, keeping the earlier slot on the horizontal", () => {
      const reversed = createCrossingLattice(path3, [2, 1, 0]);
      // 2 at slot 1, 1 at slot 2, 0 at slot 3
      const connected = reversed.crossings().filter((c) => c.connected === "connected");
      expect(connected.map((c) => [c.row, c.col, c.horizontal, c.vertical])).toEqual([
        [1, 2, 2, 1],
        [2, 3, 1, 0],
      ]);
    });

    it("should encode every edge of a larger graph exactly once", () => {
      const edges: Array<[number, number]> = [[0, 1], [0, 4], [1, 2], [2, 3], [3, 4], [1, 3]];
      const graph = graphOf([0, 1, 2, 3, 4], edges);
      const order = [3, 0, 4, 1, 2];
      const connected = createCrossingLattice(graph, order).crossings().filter((c) => c.connected === "connected");

      expect(connected).toHaveLength(edges.length);
      const pairs = connected.map((c) => [Math.min(c.horizontal, c.vertical), Math.max(c.horizontal, c.vertical)]);
      expect(pairs.sort((a, b) => a[0] - b[0] || a[1] - b[1])).toEqual(graph.edges());
      for (const c of connected) {
        expect(order.indexOf(c.horizontal) + 1).toBe(c.row);
        expect(order.indexOf(c.vertical) + 1).toBe(c.col);
      }
    });
  });

  describe("toString", () => {
    it("should render three text rows per lattice row", () => {
      const rows = lattice.toString().split("\n");
      expect(rows).toHaveLength(9);
      expect(rows.slice(0, 3)).toEqual([
        " ⋅ ⋅ ⋅  ⋅ ⋅ ⋅  ⋅ ⋅ ⋅",
        " ⋅ ○ 0  0 ● 0  0 ○ ⋅",
        " ⋅ 0 ⋅  ⋅ 1 ⋅  ⋅ 2 ⋅",
      ]);
    });

    it("should render the last lattice row without crossings", () => {
      const rows = lattice.toString().split("\n");
      expect(rows.slice(6)).toEqual([
        " ⋅ 0 ⋅  ⋅ 1 ⋅  ⋅ 2 ⋅",
        " ⋅ ⋅ ⋅  ⋅ ⋅ ⋅  ⋅ ⋅ ⋅",
        " ⋅ ⋅ ⋅  ⋅ ⋅ ⋅  ⋅ ⋅ ⋅",
      ]);
    });
  });

  describe("construction", () => {
    it("should reject a line breaking vstart ≤ hslot ≤ vstop", () => {
      const lines: CopyLine[] = [{ vertex: 0, vslot: 1, hslot: 2, vstart: 1, vstop: 1, hstop: 2 }];
      expect(() => new CrossingLattice(2, 2, lines, graphOf([0], []))).toThrow(CopyLineError);
    });

    it("should reject a line for a vertex the graph lacks", () => {
      const lines = createCopyLines(path3, [0, 1, 2]);
      expect(() => new CrossingLattice(3, 3, lines, graphOf([0, 1], [[0, 1]]))).toThrow(CopyLineError);
    });

    it("should reject a negative shape", () => {
      expect(() => new CrossingLattice(-1, 2, [], path3)).toThrow(RangeError);
    });

    it("should not share the caller's line array", () => {
      const lines = createCopyLines(path3, [0, 1, 2]);
      const view = new CrossingLattice(3, 3, lines, path3);
      lines.pop();
      expect(view.lines).toHaveLength(3);
    });

    it("should keep its own frozen copies of the caller's lines", () => {
      const graph = graphOf([0, 1], [[0, 1]]);
      const line = { vertex: 0, vslot: 1, hslot: 1, vstart: 1, vstop: 2, hstop: 2 };
      const view = new CrossingLattice(2, 2, [line, { vertex: 1, vslot: 2, hslot: 2, vstart: 1, vstop: 2, hstop: 2 }], graph);

      line.vstart = 2;
      line.hslot = 1;

      expect(view.lines[0]).toEqual({ vertex: 0, vslot: 1, hslot: 1, vstart: 1, vstop: 2, hstop: 2 });
      expect(Object.isFrozen(view.lines[0])).toBe(true);
      expect(() => new CrossingLattice(2, 2, [line], graph)).toThrow(CopyLineError);
    });

    it("should propagate an invalid order from createCrossingLattice", () => {
      expect(() => createCrossingLattice(path3, [0, 2])).toThrow(VertexOrderError);
    });
  });

  describe("degenerate lines", () => {
    it("should report none at a single-vertex lattice", () => {
      const single = createCrossingLattice(graphOf([5], []), [5]);
      expect(single.query(1, 1)).toEqual({ top: null, bottom: null, left: null, right: null, connected: "none" });
      expect(single.toString()).toBe(" ⋅ ⋅ ⋅\n ⋅ ⋅ ⋅\n ⋅ ⋅ ⋅");
    });

    it("should report none at the point of a line that is a single row and column", () => {
      const graph = graphOf([0, 1], [[0, 1]]);
      const lines: CopyLine[] = [
        { vertex: 0, vslot: 1, hslot: 1, vstart: 1, vstop: 2, hstop: 2 },
        { vertex: 1, vslot: 2, hslot: 2, vstart: 2, vstop: 2, hstop: 2 },
      ];
      const view = new CrossingLattice(2, 2, lines, graph);
      expect(view.query(2, 2).connected).toBe("none");
      expect(view.query(1, 2)).toEqual({ top: null, bottom: null, left: 0, right: null, connected: "none" });
    });
  });
});
