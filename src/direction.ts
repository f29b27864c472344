import type { GridPos } from "./grid.js";

export type Compass = "n" | "ne" | "e" | "se" | "s" | "sw" | "w" | "nw";

// Clockwise from north. Label placement evaluates candidates in this order.
export const COMPASS: readonly Compass[] = ["n", "ne", "e", "se", "s", "sw", "w", "nw"];

// y grows towards the south.
const OFFSETS: Record<Compass, GridPos> = {
  n: { x: 0, y: -1 },
  ne: { x: 1, y: -1 },
  e: { x: 1, y: 0 },
  se: { x: 1, y: 1 },
  s: { x: 0, y: 1 },
  sw: { x: -1, y: 1 },
  w: { x: -1, y: 0 },
  nw: { x: -1, y: -1 },
};

const OPPOSITE: Record<Compass, Compass> = {
  n: "s",
  ne: "sw",
  e: "w",
  se: "nw",
  s: "n",
  sw: "ne",
  w: "e",
  nw: "se",
};

const ALIASES = new Map<string, Compass>([
  ["n", "n"],
  ["north", "n"],
  ["ne", "ne"],
  ["northeast", "ne"],
  ["north-east", "ne"],
  ["e", "e"],
  ["east", "e"],
  ["se", "se"],
  ["southeast", "se"],
  ["south-east", "se"],
  ["s", "s"],
  ["south", "s"],
  ["sw", "sw"],
  ["southwest", "sw"],
  ["south-west", "sw"],
  ["w", "w"],
  ["west", "w"],
  ["nw", "nw"],
  ["northwest", "nw"],
  ["north-west", "nw"],
]);

export function parseCompass(raw: string | undefined): Compass | undefined {
  if (!raw) return undefined;
  return ALIASES.get(raw.trim().toLowerCase());
}

export function isCardinal(d: Compass): boolean {
  return d === "n" || d === "e" || d === "s" || d === "w";
}

export function opposite(d: Compass): Compass {
  return OPPOSITE[d];
}

export function moveBy(p: GridPos, d: Compass | undefined): GridPos {
  if (!d) return { x: p.x, y: p.y };
  const o = OFFSETS[d];
  return { x: p.x + o.x, y: p.y + o.y };
}
