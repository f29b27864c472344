import { pathToFileURL } from "url";
import yaml from "js-yaml";
import {
  die,
  emptyTopology,
  isRecord,
  readText,
  sortedIds,
  writeText,
  type LinkData,
  type NodeExtents,
  type ShapeStyle,
  type Topology,
  type TopoLink,
  type TopoNode,
} from "./util.js";
import type { Vec2 } from "./vec.js";

function optString(v: unknown, what: string): string | undefined {
  if (v === undefined || v === null) return undefined;
  if (typeof v === "string") return v;
  if (typeof v === "number") return String(v);
  return die(`${what} must be a string`);
}

function optNumber(v: unknown, what: string): number | undefined {
  if (v === undefined || v === null) return undefined;
  const n = typeof v === "string" && v.trim() !== "" ? Number(v) : v;
  if (typeof n === "number" && Number.isFinite(n)) return n;
  return die(`${what} must be a number`);
}

function intPair(v: unknown, what: string): [number, number] {
  if (Array.isArray(v) && v.length === 2) {
    const [x, y]: unknown[] = v;
    if (typeof x === "number" && typeof y === "number" && Number.isInteger(x) && Number.isInteger(y)) {
      return [x, y];
    }
  }
  return die(`${what} must be a pair of integers`);
}

function isCoord(v: unknown): v is number {
  return typeof v === "number" && Number.isFinite(v);
}

// Finite coordinates only; YAML .nan and .inf are rejected.
function point(v: unknown, what: string): Vec2 {
  if (Array.isArray(v) && v.length === 2) {
    const [x, y]: unknown[] = v;
    if (isCoord(x) && isCoord(y)) return { x, y };
  }
  if (isRecord(v) && isCoord(v.x) && isCoord(v.y)) {
    return { x: v.x, y: v.y };
  }
  return die(`${what} must be an [x, y] pair or an {x, y} object of finite numbers`);
}

function parseExtents(v: unknown, what: string): NodeExtents | undefined {
  if (v === undefined || v === null) return undefined;
  if (!isRecord(v)) return die(`${what} must be an object with width and height`);
  return {
    width: optNumber(v.width, `${what}.width`) ?? 0,
    height: optNumber(v.height, `${what}.height`) ?? 0,
  };
}

export function parseStyle(v: unknown, what: string): ShapeStyle | undefined {
  if (v === undefined || v === null) return undefined;
  if (!isRecord(v)) return die(`${what} must be an object`);
  const style: ShapeStyle = {};
  const size = optNumber(v.size, `${what}.size`);
  if (size !== undefined) style.size = size;
  const radius = optNumber(v.radius, `${what}.radius`);
  if (radius !== undefined) style.radius = radius;
  const stroke = optString(v.stroke, `${what}.stroke`);
  if (stroke !== undefined) style.stroke = stroke;
  const strokeWidth = optNumber(v.stroke_width ?? v["stroke-width"], `${what}.stroke_width`);
  if (strokeWidth !== undefined) style.strokeWidth = strokeWidth;
  const fill = optString(v.fill, `${what}.fill`);
  if (fill !== undefined) style.fill = fill;
  const opacity = optNumber(v.opacity, `${what}.opacity`);
  if (opacity !== undefined) style.opacity = opacity;
  return style;
}

function parseLinkData(v: unknown, what: string): LinkData | undefined {
  if (v === undefined || v === null) return undefined;
  if (!isRecord(v)) return die(`${what} must be an object`);
  const data: LinkData = {};
  const value = optNumber(v.value, `${what}.value`);
  if (value !== undefined) data.value = value;
  const label = optString(v.label, `${what}.label`);
  if (label !== undefined) data.label = label;
  return data;
}

// A YAML key with nothing after it is a node with no fields.
function parseNode(id: string, raw: unknown): TopoNode {
  if (raw === null || raw === undefined) return { id };
  if (!isRecord(raw)) return die(`Node '${id}' must be an object`);
  const what = `Node '${id}'`;

  const node: TopoNode = { id };
  if (raw.pos !== undefined && raw.pos !== null) node.pos = intPair(raw.pos, `${what} pos`);
  const label = optString(raw.label, `${what} label`);
  if (label !== undefined) node.label = label;
  const labelAt = optString(raw.label_at, `${what} label_at`);
  if (labelAt) node.labelAt = labelAt;
  const extents = parseExtents(raw.extents, `${what} extents`);
  if (extents) node.extents = extents;
  const cls = optString(raw.class, `${what} class`);
  if (cls) node.class = cls;
  const style = parseStyle(raw.style, `${what} style`);
  if (style) node.style = style;
  return node;
}

function parseLink(id: string, raw: Record<string, unknown>, what: string): TopoLink {
  const from = optString(raw.from, `${what} from`);
  const to = optString(raw.to, `${what} to`);
  if (!from || !to) return die(`${what} must have "from" and "to"`);

  const link: TopoLink = { id, from, to };
  if (raw.via !== undefined && raw.via !== null) {
    if (!Array.isArray(raw.via)) return die(`${what} via must be a list`);
    link.via = raw.via.map((v: unknown, i) => intPair(v, `${what} via[${i}]`));
  }
  if (raw.route !== undefined && raw.route !== null) {
    if (!Array.isArray(raw.route)) return die(`${what} route must be a list`);
    link.route = raw.route.map((v: unknown, i) => point(v, `${what} route[${i}]`));
  }
  const splitAt = optNumber(raw.split_at, `${what} split_at`);
  if (splitAt !== undefined) link.splitAt = splitAt;
  const cls = optString(raw.class, `${what} class`);
  if (cls) link.class = cls;
  const style = parseStyle(raw.style, `${what} style`);
  if (style) link.style = style;
  const fromData = parseLinkData(raw.from_data, `${what} from_data`);
  if (fromData) link.fromData = fromData;
  const toData = parseLinkData(raw.to_data, `${what} to_data`);
  if (toData) link.toData = toData;
  return link;
}

// `<from>-<to>`, then `<from>-<to>-2`, `-3`, ... until unused.
export function autoLinkId(from: string, to: string, taken: (id: string) => boolean): string {
  let id = `${from}-${to}`;
  let n = 2;
  while (taken(id)) {
    id = `${from}-${to}-${n}`;
    n += 1;
  }
  return id;
}

/**
 * Reads a topology from a JSON or YAML document with top-level `nodes` and `links`.
 *
 * Each may be a list of objects, or an object keyed by id. In list form nodes must
 * carry a unique `id`; links without one are named after their ends.
 */
export function parseTopology(text: string): Topology {
  const doc: unknown = yaml.load(text);
  const topo = emptyTopology();
  if (doc === undefined || doc === null) return topo;
  if (!isRecord(doc)) return die("Topology must be an object with \"nodes\" and \"links\"");

  const rawNodes = doc.nodes;
  if (Array.isArray(rawNodes)) {
    const list: unknown[] = rawNodes;
    for (const raw of list) {
      const id = isRecord(raw) ? optString(raw.id, "Node id") : undefined;
      if (!id) return die("Node must have an id");
      if (topo.nodes.has(id)) return die(`Duplicate node id '${id}'`);
      topo.nodes.set(id, parseNode(id, raw));
    }
  } else if (isRecord(rawNodes)) {
    for (const [id, raw] of Object.entries(rawNodes)) {
      topo.nodes.set(id, parseNode(id, raw));
    }
  } else if (rawNodes !== undefined && rawNodes !== null) {
    return die("\"nodes\" must be an array or object");
  }

  const rawLinks = doc.links;
  if (Array.isArray(rawLinks)) {
    const list: unknown[] = rawLinks;
    for (const [i, raw] of list.entries()) {
      if (!isRecord(raw)) return die(`Link ${i} must be an object`);
      let id = optString(raw.id, `Link ${i} id`);
      if (!id) {
        const body = parseLink("", raw, `Link ${i}`);
        id = autoLinkId(body.from, body.to, (x) => topo.links.has(x));
      }
      if (topo.links.has(id)) return die(`Duplicate link id '${id}'`);
      topo.links.set(id, parseLink(id, raw, `Link '${id}'`));
    }
  } else if (isRecord(rawLinks)) {
    for (const [id, raw] of Object.entries(rawLinks)) {
      const body = raw === null || raw === undefined ? {} : raw;
      if (!isRecord(body)) return die(`Link '${id}' must be an object`);
      topo.links.set(id, parseLink(id, body, `Link '${id}'`));
    }
  } else if (rawLinks !== undefined && rawLinks !== null) {
    return die("\"links\" must be an array or object");
  }

  return topo;
}

function styleDoc(s: ShapeStyle): Record<string, unknown> {
  return {
    size: s.size,
    radius: s.radius,
    stroke: s.stroke,
    stroke_width: s.strokeWidth,
    fill: s.fill,
    opacity: s.opacity,
  };
}

function nodeDoc(n: TopoNode): Record<string, unknown> {
  return {
    id: n.id,
    pos: n.pos,
    label: n.label,
    label_at: n.labelAt,
    extents: n.extents,
    class: n.class,
    style: n.style ? styleDoc(n.style) : undefined,
  };
}

function linkDoc(l: TopoLink): Record<string, unknown> {
  return {
    id: l.id,
    from: l.from,
    to: l.to,
    via: l.via,
    route: l.route?.map((p) => [p.x, p.y]),
    split_at: l.splitAt,
    class: l.class,
    style: l.style ? styleDoc(l.style) : undefined,
    from_data: l.fromData,
    to_data: l.toData,
  };
}

// JSON in the object form, ids in order. Undefined fields are left out.
export function serializeTopology(topo: Topology): string {
  const nodes: Record<string, unknown> = {};
  for (const id of sortedIds(topo.nodes)) {
    const node = topo.nodes.get(id);
    if (node) nodes[id] = nodeDoc(node);
  }
  const links: Record<string, unknown> = {};
  for (const id of sortedIds(topo.links)) {
    const link = topo.links.get(id);
    if (link) links[id] = linkDoc(link);
  }
  return JSON.stringify({ nodes, links }, null, 2) + "\n";
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 4) {
  const input = process.argv[2];
  const output = process.argv[3];
  const topo = parseTopology(readText(input));
  writeText(output, serializeTopology(topo));
  console.error(`topology_parse: nodes=${topo.nodes.size} links=${topo.links.size}`);
}
