import { describe, expect, it } from "vitest";
import { PriorityQueue } from "./priority_queue.js";

describe("PriorityQueue", () => {
  it("pops in priority order", () => {
    const q = new PriorityQueue<string>();
    q.push("c", 300);
    q.push("a", 100);
    q.push("d", 400);
    q.push("b", 200);
    q.push("z", -5);
    const out: string[] = [];
    while (!q.isEmpty()) {
      const v = q.popMin();
      if (v !== undefined) out.push(v);
    }
    expect(out).toEqual(["z", "a", "b", "c", "d"]);
  });

  it("returns undefined when empty", () => {
    const q = new PriorityQueue<number>();
    expect(q.popMin()).toBeUndefined();
    q.push(7, 1);
    expect(q.size).toBe(1);
    expect(q.popMin()).toBe(7);
    expect(q.popMin()).toBeUndefined();
  });

  it("keeps order across interleaved pushes and pops", () => {
    const q = new PriorityQueue<number>();
    for (const p of [50, 10, 40]) q.push(p, p);
    expect(q.popMin()).toBe(10);
    q.push(5, 5);
    q.push(45, 45);
    expect([q.popMin(), q.popMin(), q.popMin(), q.popMin()]).toEqual([5, 40, 45, 50]);
  });
});
