import { describe, expect, it } from "vitest";
import { colorAt, DEFAULT_COLOR_SCALE, formatColor, parseColor, sortStops } from "./color_scale.js";

const greys = [
  { value: 0, color: "#000000" },
  { value: 1, color: "#ffffff" },
];

describe("colours", () => {
  it("parses long and short hex forms", () => {
    expect(parseColor("#1d4877")).toEqual([29, 72, 119]);
    expect(parseColor("#abc")).toEqual([170, 187, 204]);
    expect(parseColor("red")).toBeUndefined();
    expect(parseColor("#12345")).toBeUndefined();
  });

  it("formats rounded lowercase hex", () => {
    expect(formatColor([255, 127.6, 0])).toBe("#ff8000");
  });
});

describe("colorAt", () => {
  it("mixes between stops", () => {
    expect(colorAt(greys, 0.5)).toBe("#808080");
    expect(colorAt(greys, 0.25)).toBe("#404040");
  });

  it("clamps outside the scale", () => {
    expect(colorAt(greys, -1)).toBe("#000000");
    expect(colorAt(greys, 3)).toBe("#ffffff");
    expect(colorAt(DEFAULT_COLOR_SCALE, 0.95)).toBe("#ee3e32");
  });

  it("lands on a stop exactly", () => {
    expect(colorAt(DEFAULT_COLOR_SCALE, 0.5)).toBe("#fbb021");
  });

  it("has nothing for an empty scale", () => {
    expect(colorAt([], 0.5)).toBeUndefined();
  });

  it("sorts stops without touching the input", () => {
    const stops = [greys[1], greys[0]];
    expect(sortStops(stops)).toEqual(greys);
    expect(stops[0]).toBe(greys[1]);
  });
});
