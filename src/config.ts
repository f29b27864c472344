import yaml from "js-yaml";
import { pathToFileURL } from "url";
import { DEFAULT_COLOR_SCALE, parseColor, sortStops, type ColorStop } from "./color_scale.js";
import { DEFAULT_ROUTER_OPTIONS, type RouterOptions } from "./link_router.js";
import { isRecord, readText, type ShapeStyle } from "./util.js";

export type RouterConfig = RouterOptions & {
  // Free cells added around the derived extents on every side.
  extentsMargin: number;
};

export type LabelStyle = {
  size: number;
  color: string;
  fontFamily: string;
  // The rest only apply to link labels.
  background?: string;
  border?: string;
  borderRadius?: number;
  width?: number;
  opacity?: number;
};

export type RenderConfig = {
  minNodeSep: number;
  // Grid to canvas units. Derived from the node styles when unset.
  scale?: number;
  margin: number;
  nodeStyle: ShapeStyle;
  nodeStyles: Map<string, ShapeStyle>;
  linkStyle: ShapeStyle;
  linkStyles: Map<string, ShapeStyle>;
  nodeLabelStyle: LabelStyle;
  linkLabelStyle: LabelStyle;
  linkColorScale: ColorStop[];
};

export type MapConfig = {
  router: RouterConfig;
  render: RenderConfig;
};

const defaultRouterConfig: RouterConfig = {
  ...DEFAULT_ROUTER_OPTIONS,
  extentsMargin: 1,
};

const defaultNodeStyle: ShapeStyle = { size: 20, strokeWidth: 4, stroke: "#000000", fill: "#ffffff" };
const defaultLinkStyle: ShapeStyle = { size: 10, radius: 10, fill: "#808080" };

const defaultNodeLabelStyle: LabelStyle = { size: 16, color: "#000000", fontFamily: "sans-serif" };
const defaultLinkLabelStyle: LabelStyle = {
  size: 8,
  color: "#000000",
  fontFamily: "monospace",
  background: "#ffffff",
  border: "#000000",
  borderRadius: 3,
  width: 28,
  opacity: 0.9,
};

export function defaultConfig(): MapConfig {
  return {
    router: { ...defaultRouterConfig },
    render: {
      minNodeSep: 5,
      margin: 10,
      nodeStyle: { ...defaultNodeStyle },
      nodeStyles: new Map(),
      linkStyle: { ...defaultLinkStyle },
      linkStyles: new Map(),
      nodeLabelStyle: { ...defaultNodeLabelStyle },
      linkLabelStyle: { ...defaultLinkLabelStyle },
      linkColorScale: DEFAULT_COLOR_SCALE.map((s) => ({ ...s })),
    },
  };
}

function asNum(v: unknown): number | undefined {
  if (typeof v === "number" && Number.isFinite(v)) return v;
  if (typeof v === "string" && v.trim().length > 0) {
    const n = Number(v);
    if (Number.isFinite(n)) return n;
  }
  return undefined;
}

function asBool(v: unknown): boolean | undefined {
  if (typeof v === "boolean") return v;
  if (v === "true") return true;
  if (v === "false") return false;
  return undefined;
}

function asStr(v: unknown): string | undefined {
  return typeof v === "string" && v.length > 0 ? v : undefined;
}

function asColor(v: unknown): string | undefined {
  const s = asStr(v);
  return s && parseColor(s) ? s : undefined;
}

function mergeStyle(raw: unknown, base: ShapeStyle): ShapeStyle {
  if (!isRecord(raw)) return { ...base };
  return {
    size: asNum(raw.size) ?? base.size,
    radius: asNum(raw.radius) ?? base.radius,
    stroke: asStr(raw.stroke) ?? base.stroke,
    strokeWidth: asNum(raw.stroke_width) ?? base.strokeWidth,
    fill: asStr(raw.fill) ?? base.fill,
    opacity: asNum(raw.opacity) ?? base.opacity,
  };
}

// Class styles only carry what they set; the renderer layers them over the default.
function mergeClassStyles(raw: unknown): Map<string, ShapeStyle> {
  const out = new Map<string, ShapeStyle>();
  if (!isRecord(raw)) return out;
  for (const [cls, v] of Object.entries(raw)) {
    out.set(cls, dropUnset(mergeStyle(v, {})));
  }
  return out;
}

function dropUnset(s: ShapeStyle): ShapeStyle {
  const out: ShapeStyle = {};
  if (s.size !== undefined) out.size = s.size;
  if (s.radius !== undefined) out.radius = s.radius;
  if (s.stroke !== undefined) out.stroke = s.stroke;
  if (s.strokeWidth !== undefined) out.strokeWidth = s.strokeWidth;
  if (s.fill !== undefined) out.fill = s.fill;
  if (s.opacity !== undefined) out.opacity = s.opacity;
  return out;
}

function mergeLabelStyle(raw: unknown, base: LabelStyle): LabelStyle {
  if (!isRecord(raw)) return { ...base };
  return {
    size: asNum(raw.size) ?? base.size,
    color: asColor(raw.color) ?? base.color,
    fontFamily: asStr(raw.font_family) ?? base.fontFamily,
    background: asColor(raw.background) ?? base.background,
    border: asColor(raw.border) ?? base.border,
    borderRadius: asNum(raw.border_radius) ?? base.borderRadius,
    width: asNum(raw.width) ?? base.width,
    opacity: asNum(raw.opacity) ?? base.opacity,
  };
}

function mergeColorScale(raw: unknown, base: ColorStop[]): ColorStop[] {
  if (!Array.isArray(raw)) return base;
  const list: unknown[] = raw;
  const stops: ColorStop[] = [];
  for (const s of list) {
    if (!isRecord(s)) continue;
    const value = asNum(s.value);
    const color = asColor(s.color);
    if (value !== undefined && color !== undefined) stops.push({ value, color });
  }
  return stops.length > 0 ? sortStops(stops) : base;
}

/**
 * Effective configuration for a rules document. Numbers may be given as strings;
 * values that do not parse fall back to the default.
 */
export function mergeRules(rules: unknown): MapConfig {
  const cfg = defaultConfig();
  if (!isRecord(rules)) return cfg;

  const router = isRecord(rules.router) ? rules.router : {};
  const d = cfg.router;
  cfg.router = {
    avoidNodes: asBool(router.avoid_nodes) ?? d.avoidNodes,
    attachMultiCellsCardinal: asBool(router.attach_multi_cells_cardinal) ?? d.attachMultiCellsCardinal,
    spreadLinks: asBool(router.spread_links) ?? d.spreadLinks,
    orthogonal: asBool(router.orthogonal) ?? d.orthogonal,
    linkPenaltyWeight: asNum(router.link_penalty_weight) ?? d.linkPenaltyWeight,
    extentsMargin: Math.max(0, Math.trunc(asNum(router.extents_margin) ?? d.extentsMargin)),
  };

  const render = isRecord(rules.render) ? rules.render : {};
  const r = cfg.render;
  cfg.render = {
    minNodeSep: asNum(render.min_node_sep) ?? r.minNodeSep,
    scale: asNum(render.scale),
    margin: asNum(render.margin) ?? r.margin,
    nodeStyle: mergeStyle(render.node_style, r.nodeStyle),
    nodeStyles: mergeClassStyles(render.node_styles),
    linkStyle: mergeStyle(render.link_style, r.linkStyle),
    linkStyles: mergeClassStyles(render.link_styles),
    nodeLabelStyle: mergeLabelStyle(render.node_label_style, r.nodeLabelStyle),
    linkLabelStyle: mergeLabelStyle(render.link_label_style, r.linkLabelStyle),
    linkColorScale: mergeColorScale(render.link_color_scale, r.linkColorScale),
  };
  return cfg;
}

export function loadConfig(path: string | undefined): MapConfig {
  if (!path) return defaultConfig();
  return mergeRules(yaml.load(readText(path)));
}

function styleDoc(s: ShapeStyle): Record<string, unknown> {
  const doc: Record<string, unknown> = {};
  if (s.size !== undefined) doc.size = s.size;
  if (s.radius !== undefined) doc.radius = s.radius;
  if (s.stroke !== undefined) doc.stroke = s.stroke;
  if (s.strokeWidth !== undefined) doc.stroke_width = s.strokeWidth;
  if (s.fill !== undefined) doc.fill = s.fill;
  if (s.opacity !== undefined) doc.opacity = s.opacity;
  return doc;
}

function labelDoc(s: LabelStyle): Record<string, unknown> {
  const doc: Record<string, unknown> = { size: s.size, color: s.color, font_family: s.fontFamily };
  if (s.background !== undefined) doc.background = s.background;
  if (s.border !== undefined) doc.border = s.border;
  if (s.borderRadius !== undefined) doc.border_radius = s.borderRadius;
  if (s.width !== undefined) doc.width = s.width;
  if (s.opacity !== undefined) doc.opacity = s.opacity;
  return doc;
}

function classesDoc(m: Map<string, ShapeStyle>): Record<string, unknown> {
  const doc: Record<string, unknown> = {};
  for (const [k, v] of m) doc[k] = styleDoc(v);
  return doc;
}

// The effective configuration as a rules document that loads back to the same values.
export function configDoc(cfg: MapConfig): Record<string, unknown> {
  const { router, render } = cfg;
  const renderDoc: Record<string, unknown> = { min_node_sep: render.minNodeSep };
  if (render.scale !== undefined) renderDoc.scale = render.scale;
  Object.assign(renderDoc, {
    margin: render.margin,
    node_style: styleDoc(render.nodeStyle),
    node_styles: classesDoc(render.nodeStyles),
    link_style: styleDoc(render.linkStyle),
    link_styles: classesDoc(render.linkStyles),
    node_label_style: labelDoc(render.nodeLabelStyle),
    link_label_style: labelDoc(render.linkLabelStyle),
    link_color_scale: render.linkColorScale.map((s) => ({ value: s.value, color: s.color })),
  });
  return {
    router: {
      avoid_nodes: router.avoidNodes,
      attach_multi_cells_cardinal: router.attachMultiCellsCardinal,
      spread_links: router.spreadLinks,
      orthogonal: router.orthogonal,
      link_penalty_weight: router.linkPenaltyWeight,
      extents_margin: router.extentsMargin,
    },
    render: renderDoc,
  };
}

export function dumpConfig(cfg: MapConfig): string {
  return yaml.dump(configDoc(cfg), { noRefs: true, lineWidth: -1 });
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain) {
  process.stdout.write(dumpConfig(loadConfig(process.argv[2])));
}
