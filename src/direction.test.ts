import { describe, expect, it } from "vitest";
import { COMPASS, isCardinal, moveBy, opposite, parseCompass } from "./direction.js";

describe("compass directions", () => {
  it("parses short and long forms", () => {
    expect(parseCompass("ne")).toBe("ne");
    expect(parseCompass(" North-West ")).toBe("nw");
    expect(parseCompass("south")).toBe("s");
    expect(parseCompass("c")).toBeUndefined();
    expect(parseCompass("")).toBeUndefined();
    expect(parseCompass("constructor")).toBeUndefined();
  });

  it("lists directions clockwise from north", () => {
    expect(COMPASS).toEqual(["n", "ne", "e", "se", "s", "sw", "w", "nw"]);
    expect(COMPASS.filter(isCardinal)).toEqual(["n", "e", "s", "w"]);
  });

  it("moves with y growing southwards", () => {
    expect(moveBy({ x: 0, y: 0 }, "n")).toEqual({ x: 0, y: -1 });
    expect(moveBy({ x: 0, y: 0 }, "se")).toEqual({ x: 1, y: 1 });
    expect(moveBy({ x: 4, y: 4 }, undefined)).toEqual({ x: 4, y: 4 });
  });

  it("pairs opposites", () => {
    for (const d of COMPASS) expect(opposite(opposite(d))).toBe(d);
    expect(opposite("ne")).toBe("sw");
  });
});
