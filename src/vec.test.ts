import { describe, expect, it } from "vitest";
import { fixPolyline, interpolate, normalized, perp, polylineLength, simplifyPolyline, splitAt, type Polyline } from "./vec.js";

const bent: Polyline = [
  { x: 0, y: 0 },
  { x: 2, y: 0 },
  { x: 2, y: 2 },
];

describe("vectors", () => {
  it("normalizes, leaving the zero vector alone", () => {
    expect(normalized({ x: 3, y: 4 })).toEqual({ x: 0.6, y: 0.8 });
    expect(normalized({ x: 0, y: 0 })).toEqual({ x: 0, y: 0 });
  });

  it("turns a quarter", () => {
    expect(perp({ x: 2, y: 5 })).toEqual({ x: -5, y: 2 });
  });
});

describe("polylines", () => {
  it("sums segment lengths", () => {
    expect(polylineLength([{ x: 0, y: 0 }, { x: 3, y: 4 }, { x: 3, y: 10 }])).toBe(11);
    expect(polylineLength([{ x: 1, y: 1 }])).toBe(0);
  });

  it("drops NaN points and repeats", () => {
    const out = fixPolyline([
      { x: 0, y: 0 },
      { x: 0, y: 0 },
      { x: Number.NaN, y: 1 },
      { x: 1, y: 1 },
      { x: 1, y: 1 },
      { x: 2, y: 2 },
    ]);
    expect(out).toEqual([
      { x: 0, y: 0 },
      { x: 1, y: 1 },
      { x: 2, y: 2 },
    ]);
  });

  it("removes colinear interior points", () => {
    const out = simplifyPolyline([
      { x: 0, y: 0 },
      { x: 1, y: 0 },
      { x: 2, y: 0 },
      { x: 2, y: 1 },
    ]);
    expect(out).toEqual([
      { x: 0, y: 0 },
      { x: 2, y: 0 },
      { x: 2, y: 1 },
    ]);
  });

  it("interpolates by fraction of length", () => {
    expect(interpolate(bent, 0.75)).toEqual({ x: 2, y: 1 });
    expect(interpolate(bent, 0.5)).toEqual({ x: 2, y: 0 });
    expect(interpolate(bent, -1)).toEqual({ x: 0, y: 0 });
    expect(interpolate(bent, 2)).toEqual({ x: 2, y: 2 });
  });

  it("splits with both halves sharing the split point", () => {
    expect(splitAt(bent, 0.75)).toEqual([
      [
        { x: 0, y: 0 },
        { x: 2, y: 0 },
        { x: 2, y: 1 },
      ],
      [
        { x: 2, y: 1 },
        { x: 2, y: 2 },
      ],
    ]);
  });

  it("splits on a vertex without inventing a point", () => {
    expect(splitAt(bent, 0.5)).toEqual([
      [
        { x: 0, y: 0 },
        { x: 2, y: 0 },
      ],
      [
        { x: 2, y: 0 },
        { x: 2, y: 2 },
      ],
    ]);
  });
});
