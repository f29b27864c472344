import { describe, expect, it } from "vitest";
import { chebyshev, fromVec, keyOf, ListGrid, maxPos, minPos, SparseGrid } from "./grid.js";

describe("grid positions", () => {
  it("takes component-wise min and max", () => {
    expect(minPos({ x: 3, y: -1 }, { x: 1, y: 4 })).toEqual({ x: 1, y: -1 });
    expect(maxPos({ x: 3, y: -1 }, { x: 1, y: 4 })).toEqual({ x: 3, y: 4 });
  });

  it("measures Chebyshev distance", () => {
    expect(chebyshev({ x: 0, y: 0 }, { x: 3, y: -7 })).toBe(7);
    expect(chebyshev({ x: 2, y: 2 }, { x: 2, y: 2 })).toBe(0);
  });

  it("truncates continuous points to cells", () => {
    expect(fromVec({ x: 2.9, y: -1.5 })).toEqual({ x: 2, y: -1 });
    expect(keyOf({ x: -3, y: 12 })).toBe("-3,12");
  });
});

describe("SparseGrid", () => {
  it("treats missing cells as empty", () => {
    const g = new SparseGrid<string>();
    expect(g.get({ x: 100, y: -100 })).toBeUndefined();
    expect(g.contains({ x: 0, y: 0 })).toBe(false);
    g.set({ x: 0, y: 0 }, "a");
    expect(g.get({ x: 0, y: 0 })).toBe("a");
    expect(g.size).toBe(1);
    g.remove({ x: 0, y: 0 });
    expect(g.contains({ x: 0, y: 0 })).toBe(false);
  });
});

describe("ListGrid", () => {
  it("appends without duplicates and drops emptied cells", () => {
    const g = new ListGrid<string>();
    const p = { x: 1, y: 2 };
    g.append(p, "l1");
    g.append(p, "l2");
    g.append(p, "l1");
    expect(g.list(p)).toEqual(["l1", "l2"]);

    g.removeValue(p, "l1");
    expect(g.list(p)).toEqual(["l2"]);
    g.removeValue(p, "l2");
    expect(g.contains(p)).toBe(false);
    expect(g.list(p)).toEqual([]);
  });

  it("ignores removal from an empty cell", () => {
    const g = new ListGrid<string>();
    g.removeValue({ x: 0, y: 0 }, "x");
    expect(g.size).toBe(0);
  });
});
