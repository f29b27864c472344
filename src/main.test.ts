import { describe, expect, it } from "vitest";
import { defaultConfig } from "./config.js";
import { isGraphml, makeMap, parseArgs } from "./main.js";
import { parseTopology } from "./topology_parse.js";

describe("parseArgs", () => {
  it("reads options and up to two files", () => {
    expect(parseArgs(["-c", "rules.yaml", "--orthogonal", "-v", "in.yaml", "out.svg"])).toEqual({
      rulesPath: "rules.yaml",
      dumpConfig: false,
      noSpreadLinks: false,
      orthogonal: true,
      verbose: true,
      help: false,
      input: "in.yaml",
      output: "out.svg",
    });
  });

  it("takes - for standard input", () => {
    const opts = parseArgs(["--no-spread-links", "-", "map.svg"]);
    expect(opts.noSpreadLinks).toBe(true);
    expect(opts.input).toBe("-");
    expect(opts.output).toBe("map.svg");
  });

  it("rejects what it does not know", () => {
    expect(() => parseArgs(["--bogus"])).toThrow("Unknown option '--bogus'");
    expect(() => parseArgs(["--config"])).toThrow("--config needs a file argument");
    expect(() => parseArgs(["a", "b", "c"])).toThrow("Too many arguments");
  });
});

describe("isGraphml", () => {
  it("goes by the file extension", () => {
    expect(isGraphml("net.GraphML")).toBe(true);
    expect(isGraphml("net.xml")).toBe(true);
    expect(isGraphml("net.yaml")).toBe(false);
    expect(isGraphml(undefined)).toBe(false);
  });
});

describe("makeMap", () => {
  it("routes, labels and draws a topology", () => {
    const topo = parseTopology("nodes: { a: { pos: [0, 0] }, b: { pos: [3, 0] } }\nlinks: { a-b: { from: a, to: b } }");
    const { svg, stats } = makeMap(topo, defaultConfig());
    expect(stats.routed).toEqual(["a-b"]);
    expect(stats.unrouted).toEqual([]);
    expect(topo.links.get("a-b")?.route).toEqual([
      { x: 0, y: 0 },
      { x: 1, y: 0 },
      { x: 2, y: 0 },
      { x: 3, y: 0 },
    ]);
    expect(topo.nodes.get("a")?.labelAt).toBeDefined();
    expect(svg).toContain('<g id="L-a-b" class="link">');
    expect(svg.startsWith('<?xml version="1.0" encoding="UTF-8"?>\n<svg')).toBe(true);
  });
});
