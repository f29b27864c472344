import { describe, expect, it } from "vitest";
import { defaultConfig } from "./config.js";
import { defaultSplit, findSplit, PathBuilder, renderArrow, renderScale, renderSvg } from "./render_svg.js";
import { parseTopology } from "./topology_parse.js";

const PAIR = `
nodes:
  a: { pos: [0, 0] }
  b: { pos: [2, 0] }
links:
  a-b: { from: a, to: b, route: [[0, 0], [2, 0]] }
`;

describe("PathBuilder", () => {
  it("starts with a move", () => {
    const d = new PathBuilder().lineTo({ x: 0, y: 0 }).lineTo({ x: 1, y: 2.346 }).close().toString();
    expect(d).toBe("M0,0 L1,2.35 Z");
  });
});

describe("renderArrow", () => {
  it("draws a band ending in a point", () => {
    const d = renderArrow(
      [
        { x: 0, y: 0 },
        { x: 29, y: 0 },
      ],
      10,
      10,
    )?.toString();
    expect(d).toBe("M0,5 L24,5 L29,0 L24,-5 L0,-5 Z");
  });

  it("needs two points", () => {
    expect(renderArrow([{ x: 0, y: 0 }], 10, 10)).toBeUndefined();
  });
});

describe("findSplit", () => {
  it("returns both halves ending at the split", () => {
    const [a, b] = findSplit(
      [
        { x: 0, y: 0 },
        { x: 2, y: 0 },
      ],
      0.5,
      0.1,
    );
    expect(a).toEqual([
      { x: 0, y: 0 },
      { x: 1, y: 0 },
    ]);
    expect(b).toEqual([
      { x: 2, y: 0 },
      { x: 1, y: 0 },
    ]);
  });
});

describe("scale and split", () => {
  it("fits the largest node with its stroke", () => {
    const cfg = defaultConfig().render;
    expect(renderScale(cfg)).toBe(29);
    cfg.nodeStyles.set("big", { size: 40 });
    expect(renderScale(cfg)).toBe(49);
    cfg.scale = 12;
    expect(renderScale(cfg)).toBe(12);
  });

  it("splits in the middle between equal nodes", () => {
    const route = [
      { x: 0, y: 0 },
      { x: 4, y: 0 },
    ];
    expect(defaultSplit(route, 20, 20, 10)).toBe(0.5);
    // A bigger node at the start pushes the split towards the end.
    expect(defaultSplit(route, 30, 10, 10)).toBe(0.75);
  });
});

describe("renderSvg", () => {
  it("draws both halves of a link under its nodes", () => {
    const svg = renderSvg(parseTopology(PAIR), defaultConfig().render);
    expect(svg).toContain('viewBox="-22 -22 102 44"');
    expect(svg).toContain('<g id="L-a-b" class="link">');
    expect(svg).toContain('<g class="link-segment" data-from="a" data-to="b">');
    expect(svg).toContain('<path d="M0,5 L24,5 L29,0 L24,-5 L0,-5 Z" style="fill:#808080"/>');
    expect(svg).toContain('<path d="M58,-5 L34,-5 L29,0 L34,5 L58,5 Z" style="fill:#808080"/>');
    expect(svg).toContain('<circle class="node" cx="58" cy="0" r="10"/>');
    expect(svg.indexOf('<g id="links">')).toBeLessThan(svg.indexOf('<g id="nodes">'));
  });

  it("colours halves by their value and labels them", () => {
    const topo = parseTopology(PAIR);
    const link = topo.links.get("a-b");
    if (link) link.fromData = { value: 0, label: "1G" };
    const svg = renderSvg(topo, defaultConfig().render);
    expect(svg).toContain('<path d="M0,5 L24,5 L29,0 L24,-5 L0,-5 Z" style="fill:#1d4877"/>');
    expect(svg).toContain('<g class="link-label" transform="translate(19.5,0)">');
    expect(svg).toContain('<text class="link-label-text" x="0" y="4" text-anchor="middle" font-size="8">1G</text>');
  });

  it("places and escapes node labels", () => {
    const topo = parseTopology('nodes: { a: { pos: [0, 0], label: "R&D", label_at: e, class: "core router" } }');
    const svg = renderSvg(topo, defaultConfig().render);
    expect(svg).toContain('<circle class="node core-router" cx="0" cy="0" r="10"/>');
    expect(svg).toContain('<text class="node-label-text" x="14" y="8" text-anchor="start" font-size="16">R&amp;D</text>');
  });

  it("draws multi-cell nodes as rectangles", () => {
    const topo = parseTopology("nodes: { a: { pos: [0, 0], extents: { width: 2, height: 1 }, label_at: c } }");
    const svg = renderSvg(topo, defaultConfig().render);
    expect(svg).toContain('<rect class="node" x="-29" y="-14.5" width="58" height="29" rx="10" ry="10"/>');
    expect(svg).toContain('text-anchor="middle" font-size="16">a</text>');
  });

  it("skips links without a route", () => {
    const topo = parseTopology("nodes: { a: { pos: [0, 0] }, b: { pos: [2, 0] } }\nlinks: { a-b: { from: a, to: b } }");
    expect(renderSvg(topo, defaultConfig().render)).not.toContain('id="L-a-b"');
  });
});
