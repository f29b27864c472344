import type { Vec2 } from "./vec.js";

export type GridPos = {
  x: number;
  y: number;
};

export function keyOf(p: GridPos): string {
  return `${p.x},${p.y}`;
}

export function posEq(a: GridPos, b: GridPos): boolean {
  return a.x === b.x && a.y === b.y;
}

export function minPos(a: GridPos, b: GridPos): GridPos {
  return { x: Math.min(a.x, b.x), y: Math.min(a.y, b.y) };
}

export function maxPos(a: GridPos, b: GridPos): GridPos {
  return { x: Math.max(a.x, b.x), y: Math.max(a.y, b.y) };
}

// max(|dx|, |dy|)
export function chebyshev(a: GridPos, b: GridPos): number {
  return Math.max(Math.abs(a.x - b.x), Math.abs(a.y - b.y));
}

export function toVec(p: GridPos): Vec2 {
  return { x: p.x, y: p.y };
}

// Route points are grid cells; fractional parts are dropped like an integer cast.
export function fromVec(v: Vec2): GridPos {
  return { x: Math.trunc(v.x), y: Math.trunc(v.y) };
}

// Unbounded grid; a missing key is empty space.
export class SparseGrid<V> {
  protected readonly cells = new Map<string, V>();

  public get(p: GridPos): V | undefined {
    return this.cells.get(keyOf(p));
  }

  public set(p: GridPos, v: V): void {
    this.cells.set(keyOf(p), v);
  }

  public remove(p: GridPos): void {
    this.cells.delete(keyOf(p));
  }

  public contains(p: GridPos): boolean {
    return this.cells.has(keyOf(p));
  }

  public get size(): number {
    return this.cells.size;
  }
}

// A grid whose cells hold small lists, e.g. the links passing through a cell.
export class ListGrid<V> extends SparseGrid<V[]> {
  // Appends v unless the cell already lists it.
  public append(p: GridPos, v: V): void {
    const key = keyOf(p);
    const cur = this.cells.get(key);
    if (!cur) {
      this.cells.set(key, [v]);
      return;
    }
    if (!cur.includes(v)) cur.push(v);
  }

  // Removes every occurrence of v; an emptied cell is dropped.
  public removeValue(p: GridPos, v: V): void {
    const key = keyOf(p);
    const cur = this.cells.get(key);
    if (!cur) return;
    const next = cur.filter((x) => x !== v);
    if (next.length > 0) this.cells.set(key, next);
    else this.cells.delete(key);
  }

  public list(p: GridPos): readonly V[] {
    return this.cells.get(keyOf(p)) ?? [];
  }
}
