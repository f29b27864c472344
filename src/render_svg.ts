import { pathToFileURL } from "url";
import { colorAt } from "./color_scale.js";
import { loadConfig, type LabelStyle, type RenderConfig } from "./config.js";
import { parseTopology } from "./topology_parse.js";
import { cmpStr, isMultiCell, nodeBounds, readText, sortedIds, writeText, type NodeId, type ShapeStyle, type Topology, type TopoLink, type TopoNode } from "./util.js";
import {
  add,
  approxEq,
  dot,
  fixPolyline,
  interpolate,
  length,
  normalized,
  perp,
  polylineLength,
  rotate,
  scale,
  scalePolyline,
  simplifyPolyline,
  splitAt,
  sub,
  vec,
  vecEq,
  type Polyline,
  type Vec2,
} from "./vec.js";

function esc(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/\"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function cls(s: string): string {
  return s.replace(/[^a-zA-Z0-9_-]+/g, "-").replace(/^-+|-+$/g, "");
}

// Two decimals are plenty at canvas scale.
function fmt(n: number): string {
  return String(Math.round(n * 100) / 100);
}

function clean(pl: Polyline): Polyline {
  return simplifyPolyline(fixPolyline(pl));
}

// First value set wins.
function layerStyles(...layers: Array<ShapeStyle | undefined>): ShapeStyle {
  const out: ShapeStyle = {};
  for (const s of layers) {
    if (!s) continue;
    out.size ??= s.size;
    out.radius ??= s.radius;
    out.stroke ??= s.stroke;
    out.strokeWidth ??= s.strokeWidth;
    out.fill ??= s.fill;
    out.opacity ??= s.opacity;
  }
  return out;
}

function cssDecls(s: ShapeStyle): string[] {
  const out: string[] = [];
  if (s.fill !== undefined) out.push(`fill: ${s.fill};`);
  if (s.stroke !== undefined) out.push(`stroke: ${s.stroke};`);
  if (s.strokeWidth !== undefined) out.push(`stroke-width: ${fmt(s.strokeWidth)};`);
  if (s.opacity !== undefined) out.push(`opacity: ${fmt(s.opacity)};`);
  return out;
}

function cssRule(selector: string, decls: string[]): string {
  return `${selector} {\n${decls.map((d) => `  ${d}\n`).join("")}}\n`;
}

class Bounds {
  private min: Vec2 | undefined;
  private max: Vec2 | undefined;

  public add(p: Vec2): void {
    this.min = this.min ? { x: Math.min(this.min.x, p.x), y: Math.min(this.min.y, p.y) } : { x: p.x, y: p.y };
    this.max = this.max ? { x: Math.max(this.max.x, p.x), y: Math.max(this.max.y, p.y) } : { x: p.x, y: p.y };
  }

  public addRect(x: number, y: number, w: number, h: number): void {
    this.add({ x, y });
    this.add({ x: x + w, y: y + h });
  }

  public box(margin: number): { x: number; y: number; w: number; h: number } {
    const min = this.min ?? { x: 0, y: 0 };
    const max = this.max ?? { x: 0, y: 0 };
    return { x: min.x - margin, y: min.y - margin, w: max.x - min.x + 2 * margin, h: max.y - min.y + 2 * margin };
  }
}

// SVG path data in absolute commands. The first lineTo on an empty path is a moveTo.
export class PathBuilder {
  private readonly parts: string[] = [];
  public readonly points: Vec2[] = [];

  public lineTo(p: Vec2): this {
    this.parts.push(`${this.parts.length === 0 ? "M" : "L"}${fmt(p.x)},${fmt(p.y)}`);
    this.points.push(p);
    return this;
  }

  public arc(to: Vec2, radius: number, sweep: 0 | 1): this {
    this.parts.push(`A${fmt(radius)},${fmt(radius)} 0 0 ${sweep} ${fmt(to.x)},${fmt(to.y)}`);
    this.points.push(to);
    return this;
  }

  public close(): this {
    this.parts.push("Z");
    return this;
  }

  // Corner from `start` through `peak` to `end`, rounded with `radius` where the legs allow.
  public roundCorner(radius: number, start: Vec2, peak: Vec2, end: Vec2): this {
    const leg1 = sub(start, peak);
    const leg2 = sub(end, peak);
    const dist1 = length(leg1);
    const dist2 = length(leg2);
    if (radius <= 0 || dist1 === 0 || dist2 === 0) {
      return this.lineTo(start).lineTo(peak).lineTo(end);
    }

    const dir1 = scale(leg1, 1 / dist1);
    const dir2 = scale(leg2, 1 / dist2);
    if (approxEq(dir1, scale(dir2, -1), 1e-8)) {
      return this.lineTo(start).lineTo(end);
    }

    const halfAngle = Math.acos(Math.max(-1, Math.min(1, dot(dir1, dir2)))) / 2;
    const radiusOffset = radius / Math.tan(halfAngle);
    const offset = Math.min(radiusOffset, dist1, dist2);
    let r = radius;
    if (offset < radiusOffset) r = offset * Math.tan(halfAngle);

    const arcStart = offset < dist1 ? add(peak, scale(dir1, offset)) : start;
    const arcEnd = offset < dist2 ? add(peak, scale(dir2, offset)) : end;
    const sweep = dot(perp(sub(end, start)), dir1) > 0 ? 1 : 0;
    return this.lineTo(arcStart).arc(arcEnd, r, sweep).lineTo(end);
  }

  public toString(): string {
    return this.parts.join(" ");
  }
}

/**
 * Outline of a link half drawn as a band of `width` along `route`, ending in a point at
 * the last vertex. Corners are rounded with `radius` on the centre line.
 */
export function renderArrow(input: Polyline, width: number, radius: number): PathBuilder | undefined {
  if (input.length < 2) return undefined;
  const halfWidth = width / 2;

  // The last vertex becomes the tip; the band stops half a width short of it.
  const arrowPoint = input[input.length - 1];
  const back = sub(arrowPoint, input[input.length - 2]);
  const backLen = length(back);
  let route = input.slice();
  if (backLen > halfWidth) {
    route[route.length - 1] = sub(arrowPoint, scale(back, halfWidth / backLen));
  } else {
    const total = polylineLength(route);
    if (total === 0) return undefined;
    route = splitAt(route, 1 - halfWidth / total)[0];
  }

  route = clean(route);
  if (route.length < 2) return undefined;

  const path = new PathBuilder();
  const n = route.length;
  const addPoint = (prevIdx: number, curIdx: number, nextIdx: number): void => {
    const cur = route[curIdx];
    if (prevIdx < 0 || prevIdx >= n) {
      const dir = normalized(sub(route[nextIdx], cur));
      path.lineTo(add(cur, scale(perp(dir), halfWidth)));
      return;
    }
    if (nextIdx < 0 || nextIdx >= n) {
      const dir = normalized(sub(cur, route[prevIdx]));
      path.lineTo(add(cur, scale(perp(dir), halfWidth)));
      return;
    }

    let prev = route[prevIdx];
    let next = route[nextIdx];
    const prevDir = normalized(sub(cur, prev));
    const nextDir = normalized(sub(next, cur));

    // Corners never reach past the middle of a leg shared with another corner.
    if (prevIdx > 0 && prevIdx < n - 1) prev = scale(add(prev, cur), 0.5);
    if (nextIdx > 0 && nextIdx < n - 1) next = scale(add(cur, next), 0.5);

    const prevNorm = perp(prevDir);
    const nextNorm = perp(nextDir);
    const cornerStart = add(prev, scale(prevNorm, halfWidth));
    const cornerEnd = add(next, scale(nextNorm, halfWidth));

    const offsetVec = normalized(add(prevNorm, nextNorm));
    const along = dot(offsetVec, prevNorm);
    if (Math.abs(along) < 1e-9) {
      path.lineTo(cornerStart).lineTo(cornerEnd);
      return;
    }
    const cornerPeak = add(cur, scale(offsetVec, halfWidth / along));

    const outside = dot(perp(sub(cornerEnd, cornerStart)), sub(cornerPeak, cornerStart)) > 0;
    path.roundCorner(outside ? radius + halfWidth : radius - halfWidth, cornerStart, cornerPeak, cornerEnd);
  };

  for (let i = 0; i < n; i += 1) addPoint(i - 1, i, i + 1);
  path.lineTo(arrowPoint);
  for (let i = n - 1; i >= 0; i -= 1) addPoint(i + 1, i, i - 1);
  return path.close();
}

/**
 * Splits `route` near `t` into the half leaving the start and the half leaving the end
 * (reversed, so both end at the split point). The split moves off corners and away
 * from corners closer than `tolerance`.
 */
export function findSplit(input: Polyline, t: number, tolerance: number): [Polyline, Polyline] {
  const route = clean(input);
  let [first, second] = splitAt(route, t);

  const splitPoint = second[0];
  if (splitPoint && route.some((p) => vecEq(p, splitPoint))) {
    [first, second] = splitAt(route, t + 0.005);
  }
  first = clean(first);
  second = clean(second);

  if (first.length >= 2 && second.length >= 2) {
    const seg1 = length(sub(first[first.length - 1], first[first.length - 2]));
    const seg2 = length(sub(second[0], second[1]));
    let adjusted = false;
    if (seg1 < tolerance) {
      const next = t + (tolerance - seg1) / polylineLength(first);
      if (next > 0 && next < 1) {
        [first, second] = splitAt(route, next);
        adjusted = true;
      }
    }
    if (!adjusted && seg2 < tolerance) {
      const next = t - (tolerance - seg2) / polylineLength(second);
      if (next > 0 && next < 1) {
        [first, second] = splitAt(route, next);
        adjusted = true;
      }
    }
    if (adjusted) {
      first = clean(first);
      second = clean(second);
    }
  }

  return [first, second.slice().reverse()];
}

// Grid to canvas units: the largest node with its stroke, plus the minimum gap.
export function renderScale(cfg: RenderConfig): number {
  if (cfg.scale !== undefined && cfg.scale > 0) return cfg.scale;
  let size = cfg.nodeStyle.size ?? 0;
  let stroke = cfg.nodeStyle.strokeWidth ?? 0;
  for (const s of cfg.nodeStyles.values()) {
    if (s.size !== undefined && s.size > size) size = s.size;
    if (s.strokeWidth !== undefined && s.strokeWidth > stroke) stroke = s.strokeWidth;
  }
  return cfg.minNodeSep + size + stroke;
}

// Diagonal labels sit at 67.5 degrees from horizontal, closer to the vertical than 45.
const DIAG = (3 * Math.PI) / 8;

type LabelPlacement = { angle: number | undefined; anchor: "start" | "middle" | "end"; adjustY: number };

function labelPlacement(labelAt: string | undefined, multi: boolean, textSize: number): LabelPlacement | undefined {
  switch (labelAt) {
    case "n":
      return { angle: -Math.PI / 2, anchor: "middle", adjustY: 0 };
    case "ne":
      return { angle: -DIAG, anchor: "start", adjustY: 0 };
    case "e":
      return { angle: 0, anchor: "start", adjustY: textSize / 2 };
    case "se":
      return { angle: DIAG, anchor: "start", adjustY: textSize };
    case "s":
      return { angle: Math.PI / 2, anchor: "middle", adjustY: textSize };
    case "sw":
      return { angle: Math.PI - DIAG, anchor: "end", adjustY: textSize };
    case "w":
      return { angle: Math.PI, anchor: "end", adjustY: textSize / 2 };
    case "nw":
      return { angle: Math.PI + DIAG, anchor: "end", adjustY: 0 };
    case "c":
      return multi ? { angle: undefined, anchor: "middle", adjustY: textSize / 2 } : undefined;
    default:
      return undefined;
  }
}

function textBounds(b: Bounds, p: Vec2, text: string, anchor: LabelPlacement["anchor"], size: number): void {
  // Rough advance of a proportional font.
  const w = text.length * size * 0.6;
  const x = anchor === "start" ? p.x : anchor === "end" ? p.x - w : p.x - w / 2;
  b.addRect(x, p.y - size, w, size);
}

type RenderContext = {
  cfg: RenderConfig;
  scale: number;
  nodeSizes: Map<NodeId, number>;
  bounds: Bounds;
};

function nodeStyle(ctx: RenderContext, node: TopoNode): ShapeStyle {
  return layerStyles(node.style, node.class ? ctx.cfg.nodeStyles.get(node.class) : undefined, ctx.cfg.nodeStyle);
}

function linkStyle(ctx: RenderContext, link: TopoLink): ShapeStyle {
  return layerStyles(link.style, link.class ? ctx.cfg.linkStyles.get(link.class) : undefined, ctx.cfg.linkStyle);
}

function nodeSize(ctx: RenderContext, id: NodeId): number {
  return ctx.nodeSizes.get(id) ?? ctx.cfg.nodeStyle.size ?? 0;
}

function renderNodeLabel(ctx: RenderContext, node: TopoNode, style: ShapeStyle): string {
  if (!node.pos) return "";
  const textSize = ctx.cfg.nodeLabelStyle.size;
  const placement = labelPlacement(node.labelAt, isMultiCell(node), textSize);
  if (!placement) return "";

  const centre = scale(vec(node.pos[0], node.pos[1]), ctx.scale);
  const dist = (style.size ?? 0) / 2 + (style.strokeWidth ?? 0);
  const offset = placement.angle === undefined ? vec(0, 0) : rotate(vec(dist, 0), placement.angle);
  const p = add(add(centre, offset), vec(0, placement.adjustY));
  const text = node.label || node.id;
  textBounds(ctx.bounds, p, text, placement.anchor, textSize);
  return `\n      <text class="node-label-text" x="${fmt(p.x)}" y="${fmt(p.y)}" text-anchor="${placement.anchor}" font-size="${fmt(textSize)}">${esc(text)}</text>`;
}

function renderNode(ctx: RenderContext, node: TopoNode): string {
  if (!node.pos) return "";
  const style = nodeStyle(ctx, node);
  const size = style.size ?? 0;
  const stroke = style.strokeWidth ?? 0;
  const classes = ["node", ...(node.class ? [cls(node.class)] : [])].join(" ");
  const inline = node.style ? cssDecls(node.style).join(" ") : "";
  const styleAttr = inline ? ` style="${esc(inline)}"` : "";

  let shape: string;
  const bounds = isMultiCell(node) ? nodeBounds(node) : undefined;
  if (bounds) {
    const min = scale(bounds.min, ctx.scale);
    const max = scale(bounds.max, ctx.scale);
    const w = max.x - min.x;
    const h = max.y - min.y;
    const r = Math.min(size / 2, w / 2, h / 2);
    shape = `<rect class="${classes}" x="${fmt(min.x)}" y="${fmt(min.y)}" width="${fmt(w)}" height="${fmt(h)}" rx="${fmt(r)}" ry="${fmt(r)}"${styleAttr}/>`;
    ctx.bounds.addRect(min.x - stroke / 2, min.y - stroke / 2, w + stroke, h + stroke);
  } else {
    const c = scale(vec(node.pos[0], node.pos[1]), ctx.scale);
    shape = `<circle class="${classes}" cx="${fmt(c.x)}" cy="${fmt(c.y)}" r="${fmt(size / 2)}"${styleAttr}/>`;
    const ext = size / 2 + stroke / 2;
    ctx.bounds.addRect(c.x - ext, c.y - ext, 2 * ext, 2 * ext);
  }

  const label = renderNodeLabel(ctx, node, style);
  return `\n    <g id="N-${esc(node.id)}" data-node="${esc(node.id)}">\n      ${shape}${label}\n    </g>`;
}

function renderLinkLabel(ctx: RenderContext, pos: Vec2, text: string): string {
  const ls: LabelStyle = ctx.cfg.linkLabelStyle;
  const width = ls.width ?? 0;
  const height = ls.size + 5;
  const r = Math.min(ls.borderRadius ?? 0, height / 2);
  const radiusAttrs = r > 0 ? ` rx="${fmt(r)}" ry="${fmt(r)}"` : "";
  ctx.bounds.addRect(pos.x - width / 2, pos.y - height / 2, width, height);
  return (
    `\n        <g class="link-label" transform="translate(${fmt(pos.x)},${fmt(pos.y)})">` +
    `\n          <rect class="link-label-box" x="${fmt(-width / 2)}" y="${fmt(-height / 2)}" width="${fmt(width)}" height="${fmt(height)}"${radiusAttrs}/>` +
    `\n          <text class="link-label-text" x="0" y="${fmt(ls.size / 2)}" text-anchor="middle" font-size="${fmt(ls.size)}">${esc(text)}</text>` +
    `\n        </g>`
  );
}

// Where the two halves meet: halfway along the part of the link outside both nodes.
export function defaultSplit(route: Polyline, fromSize: number, toSize: number, canvasScale: number): number {
  if (fromSize === toSize) return 0.5;
  const len = polylineLength(route);
  if (len === 0) return 0.5;
  return (1 + (fromSize / canvasScale - toSize / canvasScale) / len) / 2;
}

function renderLink(ctx: RenderContext, link: TopoLink): string {
  if (!link.route || link.route.length < 2) return "";
  const route = clean(link.route);
  if (route.length < 2) return "";

  const style = linkStyle(ctx, link);
  const width = style.size ?? 0;
  const fromSize = nodeSize(ctx, link.from);
  const toSize = nodeSize(ctx, link.to);

  const raw = link.splitAt ?? defaultSplit(route, fromSize, toSize, ctx.scale);
  const t = Math.max(Math.min(raw, 0.99), 0.01);
  const [halfA, halfB] = findSplit(route, t, width / ctx.scale);
  const linkCls = link.class ? ` ${cls(link.class)}` : "";

  const segment = (half: Polyline, value: number | undefined, label: string | undefined, from: NodeId, to: NodeId): string => {
    const scaled = scalePolyline(half, ctx.scale);
    const path = renderArrow(scaled, width, style.radius ?? 0);
    if (!path) return "";
    for (const p of path.points) ctx.bounds.add(p);

    const fill = (value !== undefined ? colorAt(ctx.cfg.linkColorScale, value) : undefined) ?? style.fill;
    const fillAttr = fill ? ` style="fill:${esc(fill)}"` : "";

    let labelSvg = "";
    if (label) {
      // Centre of what is visible between the node and the arrow tip.
      const adjustment = nodeSize(ctx, from) - width;
      const pos = interpolate(scaled, (1 + adjustment / polylineLength(scaled)) / 2);
      labelSvg = renderLinkLabel(ctx, pos, label);
    }

    return `\n      <g class="link-segment${linkCls}" data-from="${esc(from)}" data-to="${esc(to)}">\n        <path d="${path.toString()}"${fillAttr}/>${labelSvg}\n      </g>`;
  };

  const segA = segment(halfA, link.fromData?.value, link.fromData?.label, link.from, link.to);
  const segB = segment(halfB, link.toData?.value, link.toData?.label, link.to, link.from);
  return `\n    <g id="L-${esc(link.id)}" class="link${linkCls}">${segA}${segB}\n    </g>`;
}

function renderStyles(cfg: RenderConfig): string {
  let css = cssRule(".node", cssDecls(cfg.nodeStyle));
  for (const [name, s] of [...cfg.nodeStyles].sort(([a], [b]) => cmpStr(a, b))) {
    css += cssRule(`.node.${cls(name)}`, cssDecls(s));
  }
  css += cssRule(".link-segment", cssDecls(cfg.linkStyle));
  for (const [name, s] of [...cfg.linkStyles].sort(([a], [b]) => cmpStr(a, b))) {
    css += cssRule(`.link-segment.${cls(name)}`, cssDecls(s));
  }

  const nl = cfg.nodeLabelStyle;
  css += cssRule(".node-label-text", [`fill: ${nl.color};`, `font-family: ${nl.fontFamily};`]);
  const ll = cfg.linkLabelStyle;
  css += cssRule(".link-label-text", [`fill: ${ll.color};`, `font-family: ${ll.fontFamily};`]);
  const box: string[] = [];
  if (ll.background) box.push(`fill: ${ll.background};`);
  if (ll.border) box.push(`stroke: ${ll.border};`);
  if (ll.opacity !== undefined) box.push(`opacity: ${fmt(ll.opacity)};`);
  box.push("stroke-width: 1;");
  css += cssRule(".link-label-box", box);
  return css;
}

/**
 * Draws a routed topology. Links without a route of two or more points and nodes
 * without a position are skipped; links are drawn under nodes.
 */
export function renderSvg(topo: Topology, cfg: RenderConfig): string {
  const canvasScale = renderScale(cfg);
  const nodeSizes = new Map<NodeId, number>();
  const ctx: RenderContext = { cfg, scale: canvasScale, nodeSizes, bounds: new Bounds() };

  const nodes: TopoNode[] = [];
  for (const id of sortedIds(topo.nodes)) {
    const node = topo.nodes.get(id);
    if (!node || !node.pos) continue;
    nodes.push(node);
    nodeSizes.set(node.id, nodeStyle(ctx, node).size ?? 0);
  }
  const links: TopoLink[] = [];
  for (const id of sortedIds(topo.links)) {
    const link = topo.links.get(id);
    if (link && link.route && link.route.length >= 2) links.push(link);
  }

  const linkSvg = links.map((l) => renderLink(ctx, l)).join("");
  const nodeSvg = nodes.map((n) => renderNode(ctx, n)).join("");
  const box = ctx.bounds.box(cfg.margin);

  return `<?xml version="1.0" encoding="UTF-8"?>\n<svg xmlns="http://www.w3.org/2000/svg" width="${fmt(box.w)}" height="${fmt(box.h)}" viewBox="${fmt(box.x)} ${fmt(box.y)} ${fmt(box.w)} ${fmt(box.h)}">\n<style>\n${renderStyles(cfg)}</style>\n<g id="topology">\n  <g id="links">${linkSvg}\n  </g>\n  <g id="nodes">${nodeSvg}\n  </g>\n</g>\n</svg>\n`;
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 4) {
  const input = process.argv[2];
  const output = process.argv[3];
  const rulesPath = process.argv[4];
  const topo = parseTopology(readText(input));
  const svg = renderSvg(topo, loadConfig(rulesPath).render);
  writeText(output, svg);
}
