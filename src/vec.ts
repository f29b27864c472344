export type Vec2 = {
  x: number;
  y: number;
};

// A polyline with fewer than 2 points is degenerate.
export type Polyline = Vec2[];

export function vec(x: number, y: number): Vec2 {
  return { x, y };
}

export function add(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function sub(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x - b.x, y: a.y - b.y };
}

export function scale(v: Vec2, m: number): Vec2 {
  return { x: v.x * m, y: v.y * m };
}

export function dot(a: Vec2, b: Vec2): number {
  return a.x * b.x + a.y * b.y;
}

export function length(v: Vec2): number {
  return Math.hypot(v.x, v.y);
}

export function normalized(v: Vec2): Vec2 {
  const len = length(v);
  if (len === 0) return { x: 0, y: 0 };
  return { x: v.x / len, y: v.y / len };
}

// 90 degrees counterclockwise (in a y-down frame this points to the left of travel).
export function perp(v: Vec2): Vec2 {
  return { x: -v.y, y: v.x };
}

export function rotate(v: Vec2, angle: number): Vec2 {
  const c = Math.cos(angle);
  const s = Math.sin(angle);
  return { x: v.x * c - v.y * s, y: v.x * s + v.y * c };
}

export function lerp(a: Vec2, b: Vec2, t: number): Vec2 {
  return { x: a.x * (1 - t) + b.x * t, y: a.y * (1 - t) + b.y * t };
}

export function vecEq(a: Vec2, b: Vec2): boolean {
  return a.x === b.x && a.y === b.y;
}

export function approxEq(a: Vec2, b: Vec2, eps = 1e-6): boolean {
  return Math.abs(a.x - b.x) <= eps && Math.abs(a.y - b.y) <= eps;
}

export function scalePolyline(pl: Polyline, m: number): Polyline {
  return pl.map((p) => scale(p, m));
}

export function polylineLength(pl: Polyline): number {
  let total = 0;
  for (let i = 0; i + 1 < pl.length; i += 1) {
    total += length(sub(pl[i + 1], pl[i]));
  }
  return total;
}

// Drops NaN points and zero-length segments.
export function fixPolyline(pl: Polyline): Polyline {
  const out: Polyline = [];
  for (const p of pl) {
    if (Number.isNaN(p.x) || Number.isNaN(p.y)) continue;
    const prev = out[out.length - 1];
    if (prev && vecEq(prev, p)) continue;
    out.push(p);
  }
  return out;
}

// Removes interior points whose incoming and outgoing directions agree to within
// `threshold` (cosine of the angle between them).
export function simplifyPolyline(pl: Polyline, threshold = 0.99): Polyline {
  if (pl.length <= 2) return pl.slice();
  const out: Polyline = [pl[0]];
  for (let i = 1; i < pl.length - 1; i += 1) {
    const prevDir = normalized(sub(pl[i], pl[i - 1]));
    const nextDir = normalized(sub(pl[i + 1], pl[i]));
    if (dot(prevDir, nextDir) < threshold) out.push(pl[i]);
  }
  out.push(pl[pl.length - 1]);
  return out;
}

// Indexes of the two points bracketing t*length, and the local parameter between them.
function locate(pl: Polyline, t: number): [number, number, number] | undefined {
  if (pl.length === 0) return undefined;
  if (pl.length === 1 || t <= 0) return [0, 0, 0];
  if (t >= 1) return [pl.length - 1, pl.length - 1, 1];
  if (pl.length === 2) return [0, 1, t];

  const target = polylineLength(pl) * t;
  let cur = 0;
  for (let i = 0; i + 1 < pl.length; i += 1) {
    const segLen = length(sub(pl[i + 1], pl[i]));
    if (segLen === 0) continue;
    const next = cur + segLen;
    if (next === target) return [i + 1, i + 1, 0];
    if (next >= target) return [i, i + 1, (target - cur) / segLen];
    cur = next;
  }
  return undefined;
}

// The point t*length along the line, t clamped to [0, 1].
export function interpolate(pl: Polyline, t: number): Vec2 {
  const loc = locate(pl, t);
  if (!loc) return { x: 0, y: 0 };
  const [i, j, lt] = loc;
  if (i === j) return pl[i];
  return lerp(pl[i], pl[j], lt);
}

// Splits at t*length. Both halves keep the original order and share the split point.
export function splitAt(pl: Polyline, t: number): [Polyline, Polyline] {
  const loc = locate(pl, t);
  if (!loc) return [[], []];
  const [i, j, lt] = loc;
  const first = pl.slice(0, i + 1);
  const second: Polyline = [];
  if (i !== j) {
    const p = lerp(pl[i], pl[j], lt);
    first.push(p);
    second.push(p);
  }
  second.push(...pl.slice(j));
  return [first, second];
}
