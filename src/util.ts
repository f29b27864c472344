import fs from "fs";
import type { Vec2 } from "./vec.js";

export type NodeId = string;
export type LinkId = string;

export type NodeExtents = {
  width: number;
  height: number;
};

export type ShapeStyle = {
  size?: number;
  radius?: number;
  stroke?: string;
  strokeWidth?: number;
  fill?: string;
  opacity?: number;
};

export type TopoNode = {
  id: NodeId;
  pos?: [number, number];
  label?: string;
  // Compass direction ("n", "ne", ...), "c" for centred, or unset when the placer should choose.
  labelAt?: string;
  extents?: NodeExtents;
  class?: string;
  style?: ShapeStyle;
};

// Per-direction data of a link, typically utilisation as a fraction and the traffic as text.
export type LinkData = {
  value?: number;
  label?: string;
};

export type TopoLink = {
  id: LinkId;
  from: NodeId;
  to: NodeId;
  via?: Array<[number, number]>;
  route?: Vec2[];
  splitAt?: number;
  class?: string;
  style?: ShapeStyle;
  fromData?: LinkData;
  toData?: LinkData;
};

export type Topology = {
  nodes: Map<NodeId, TopoNode>;
  links: Map<LinkId, TopoLink>;
};

export function emptyTopology(): Topology {
  return { nodes: new Map(), links: new Map() };
}

export function die(msg: string): never {
  throw new Error(msg);
}

export function readText(path: string): string {
  return fs.readFileSync(path, "utf8");
}

export function writeText(path: string, data: string): void {
  fs.writeFileSync(path, data, "utf8");
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function asArray<T>(v: T | T[] | undefined | null): T[] {
  if (v === undefined || v === null) return [];
  return Array.isArray(v) ? v : [v];
}

// Code-point order, never locale order, so output does not depend on the host.
export function cmpStr(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function sortedIds<T>(m: Map<string, T>): string[] {
  return Array.from(m.keys()).sort(cmpStr);
}

export function isMultiCell(node: TopoNode): boolean {
  const ext = node.extents;
  if (!ext || ext.width <= 0 || ext.height <= 0) return false;
  return ext.width > 1 || ext.height > 1;
}

// The rectangle a node covers in grid space; pos is its centre.
export function nodeBounds(node: TopoNode): { min: Vec2; max: Vec2 } | undefined {
  if (!node.pos) return undefined;
  const [x, y] = node.pos;
  const w = node.extents?.width ?? 0;
  const h = node.extents?.height ?? 0;
  return {
    min: { x: x - w / 2, y: y - h / 2 },
    max: { x: x + w / 2, y: y + h / 2 },
  };
}

// Integer cell range [minX, maxX) x [minY, maxY) covered by a multi-cell node.
export type CellRect = { minX: number; minY: number; maxX: number; maxY: number };

export function nodeCellRect(node: TopoNode): CellRect | undefined {
  if (!isMultiCell(node)) return undefined;
  const b = nodeBounds(node);
  if (!b) return undefined;
  return {
    minX: Math.ceil(b.min.x),
    minY: Math.ceil(b.min.y),
    maxX: Math.ceil(b.max.x),
    maxY: Math.ceil(b.max.y),
  };
}
