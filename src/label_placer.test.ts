import { describe, expect, it } from "vitest";
import { moveBy, parseCompass } from "./direction.js";
import { SparseGrid } from "./grid.js";
import { occupiedCells, placeLabels, scoreLabelPosition } from "./label_placer.js";
import { LinkRouter } from "./link_router.js";
import { parseTopology } from "./topology_parse.js";

describe("occupiedCells", () => {
  it("marks nodes, footprints, labels and routes", () => {
    const topo = parseTopology(`
nodes:
  a: { pos: [0, 0], label_at: e }
  big: { pos: [5, 5], extents: { width: 2, height: 1 } }
links:
  a-big: { from: a, to: big, route: [[0, 0], [0, 1], [0, 2]] }
`);
    const fill = occupiedCells(topo);
    expect(fill.contains({ x: 0, y: 0 })).toBe(true);
    expect(fill.contains({ x: 1, y: 0 })).toBe(true);
    expect(fill.contains({ x: 0, y: 2 })).toBe(true);
    // x from 4 to 5, y 5 only.
    expect(fill.contains({ x: 4, y: 5 })).toBe(true);
    expect(fill.contains({ x: 6, y: 5 })).toBe(false);
    expect(fill.size).toBe(6);
  });
});

describe("scoreLabelPosition", () => {
  it("adds repulsion from other nodes", () => {
    const topo = parseTopology("nodes: { a: { pos: [0, 0] }, b: { pos: [0, -2] } }");
    const fill = occupiedCells(topo);
    // 50 / (1 * 1 + 2 * 2)
    expect(scoreLabelPosition({ x: 1, y: 0 }, "e", "a", topo, fill)).toBe(10);
    // 50 / 1 for b right above, 5 for b's cell next to the candidate.
    expect(scoreLabelPosition({ x: 0, y: -1 }, "n", "a", topo, fill)).toBe(55);
  });

  it("penalises taken cells beside the label more than the others", () => {
    const topo = parseTopology("nodes: { a: { pos: [0, 0] } }");
    const fill = new SparseGrid<boolean>();
    fill.set({ x: 0, y: 0 }, true);
    fill.set({ x: -1, y: -1 }, true);
    fill.set({ x: 1, y: -2 }, true);
    expect(scoreLabelPosition({ x: 0, y: -1 }, "n", "a", topo, fill)).toBe(55);
  });
});

describe("placeLabels", () => {
  it("picks north for a lone node", () => {
    const topo = parseTopology("nodes: { a: { pos: [0, 0] } }");
    placeLabels(topo);
    expect(topo.nodes.get("a")?.labelAt).toBe("n");
  });

  it("turns labels away from neighbours", () => {
    const topo = parseTopology("nodes: { a: { pos: [0, 0] }, b: { pos: [0, -2] } }");
    placeLabels(topo);
    expect(topo.nodes.get("a")?.labelAt).toBe("s");
    expect(topo.nodes.get("b")?.labelAt).toBe("n");
  });

  it("centres labels of multi-cell nodes and keeps given ones", () => {
    const topo = parseTopology(`
nodes:
  a: { pos: [0, 0], label_at: w }
  big: { pos: [5, 5], extents: { width: 3, height: 3 } }
  nowhere: {}
`);
    placeLabels(topo);
    expect(topo.nodes.get("a")?.labelAt).toBe("w");
    expect(topo.nodes.get("big")?.labelAt).toBe("c");
    expect(topo.nodes.get("nowhere")?.labelAt).toBeUndefined();
  });

  it("leaves a boxed-in node without a label", () => {
    const topo = parseTopology(`
nodes: { a: { pos: [0, 0] } }
links:
  ring: { from: a, to: a, route: [[-1, -1], [0, -1], [1, -1], [1, 0], [1, 1], [0, 1], [-1, 1], [-1, 0]] }
`);
    placeLabels(topo);
    expect(topo.nodes.get("a")?.labelAt).toBeUndefined();
  });

  it("never puts a label on a taken cell", () => {
    const topo = parseTopology(`
nodes:
  A: { pos: [0, 0] }
  B: { pos: [0, 2] }
  C: { pos: [2, 1] }
  D: { pos: [1, 3] }
links: [{ from: A, to: B }, { from: B, to: C }, { from: C, to: A }, { from: D, to: A }]
`);
    new LinkRouter(topo).routeLinks();
    const taken = occupiedCells(topo);
    placeLabels(topo);

    const seen = new Set<string>();
    for (const node of topo.nodes.values()) {
      const dir = parseCompass(node.labelAt);
      if (!dir || !node.pos) continue;
      const cell = moveBy({ x: node.pos[0], y: node.pos[1] }, dir);
      expect(taken.contains(cell)).toBe(false);
      const key = `${cell.x},${cell.y}`;
      expect(seen.has(key)).toBe(false);
      seen.add(key);
    }
  });
});
