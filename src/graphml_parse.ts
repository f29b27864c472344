import { pathToFileURL } from "url";
import { XMLParser } from "fast-xml-parser";
import { autoLinkId, serializeTopology } from "./topology_parse.js";
import { asArray, die, emptyTopology, isRecord, readText, writeText, type Topology, type TopoLink, type TopoNode } from "./util.js";

function extractText(val: unknown): string | undefined {
  if (val === undefined || val === null) return undefined;
  if (typeof val === "string" || typeof val === "number" || typeof val === "boolean") {
    return String(val);
  }
  if (isRecord(val)) {
    const text = val["#text"];
    if (text !== undefined && text !== null) return String(text);
  }
  return undefined;
}

// yEd keeps labels inside <y:NodeLabel> and friends.
function findLabelDeep(val: unknown): string | undefined {
  const scalar = extractText(val);
  if (scalar) return scalar;
  if (!isRecord(val)) return undefined;

  for (const key of ["y:NodeLabel", "y:EdgeLabel", "y:Label"]) {
    if (val[key] !== undefined) {
      const nested = findLabelDeep(val[key]);
      if (nested) return nested;
    }
  }
  for (const [k, v] of Object.entries(val)) {
    if (k.startsWith("@_")) continue;
    const nested = findLabelDeep(v);
    if (nested) return nested;
  }
  return undefined;
}

// <data key="..."> values by attribute name. Structured values are kept aside for labels.
function readData(el: Record<string, unknown>, keyMap: Map<string, string>): { attrs: Map<string, string>; rich: unknown[] } {
  const attrs = new Map<string, string>();
  const rich: unknown[] = [];
  for (const d of asArray<unknown>(el.data)) {
    if (!isRecord(d)) continue;
    const key = extractText(d["@_key"]);
    const value = extractText(d);
    if (key && value !== undefined) attrs.set(keyMap.get(key) ?? key, value.trim());
    else rich.push(d);
  }
  return { attrs, rich };
}

function parseNumber(raw: string | undefined, what: string): number | undefined {
  if (raw === undefined || raw === "") return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n)) return die(`${what} must be a number, got '${raw}'`);
  return n;
}

function parseInteger(raw: string | undefined, what: string): number | undefined {
  const n = parseNumber(raw, what);
  if (n !== undefined && !Number.isInteger(n)) return die(`${what} must be an integer, got '${raw}'`);
  return n;
}

// "x,y" with optional spaces.
function parseCoord(raw: string, what: string): [number, number] {
  const parts = raw.split(",").map((s) => s.trim());
  if (parts.length !== 2) return die(`${what} must look like 'x,y', got '${raw}'`);
  const x = parseInteger(parts[0], what);
  const y = parseInteger(parts[1], what);
  if (x === undefined || y === undefined) return die(`${what} must look like 'x,y', got '${raw}'`);
  return [x, y];
}

function parseNode(el: Record<string, unknown>, keyMap: Map<string, string>): TopoNode | undefined {
  const id = extractText(el["@_id"]);
  if (!id) return undefined;
  const { attrs, rich } = readData(el, keyMap);
  const what = `Node '${id}'`;

  const node: TopoNode = { id };
  const pos = attrs.get("pos");
  if (pos) {
    node.pos = parseCoord(pos, `${what} pos`);
  } else {
    const x = parseInteger(attrs.get("x"), `${what} x`);
    const y = parseInteger(attrs.get("y"), `${what} y`);
    if (x !== undefined && y !== undefined) node.pos = [x, y];
  }

  let label = attrs.get("label");
  if (label === undefined) {
    for (const d of rich) {
      label = findLabelDeep(d);
      if (label) break;
    }
  }
  if (label) node.label = label;

  const labelAt = attrs.get("label_at");
  if (labelAt) node.labelAt = labelAt;

  const width = parseNumber(attrs.get("width"), `${what} width`);
  const height = parseNumber(attrs.get("height"), `${what} height`);
  if (width !== undefined || height !== undefined) {
    node.extents = { width: width ?? 1, height: height ?? 1 };
  }

  const cls = attrs.get("class");
  if (cls) node.class = cls;
  return node;
}

function parseEdge(el: Record<string, unknown>, keyMap: Map<string, string>, topo: Topology): TopoLink | undefined {
  const from = extractText(el["@_source"]);
  const to = extractText(el["@_target"]);
  if (!from || !to) return undefined;
  const id = extractText(el["@_id"]) || autoLinkId(from, to, (x) => topo.links.has(x));
  const { attrs } = readData(el, keyMap);
  const what = `Link '${id}'`;

  const link: TopoLink = { id, from, to };
  const via = attrs.get("via");
  if (via) {
    link.via = via
      .split(/\s+/)
      .filter((s) => s !== "")
      .map((s, i) => parseCoord(s, `${what} via[${i}]`));
  }
  const splitAt = parseNumber(attrs.get("split_at"), `${what} split_at`);
  if (splitAt !== undefined) link.splitAt = splitAt;
  const cls = attrs.get("class");
  if (cls) link.class = cls;
  return link;
}

/**
 * Reads a topology from GraphML. Node and edge fields come from `<data>` elements
 * whose keys are declared with `attr.name`; nested graphs are flattened.
 */
export function parseGraphml(text: string): Topology {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    parseTagValue: false,
  });
  const doc: unknown = parser.parse(text);
  const topo = emptyTopology();
  const graphml = isRecord(doc) ? doc.graphml : undefined;
  if (!isRecord(graphml)) return topo;

  const keyMap = new Map<string, string>();
  for (const k of asArray<unknown>(graphml.key)) {
    if (!isRecord(k)) continue;
    const keyId = extractText(k["@_id"]);
    const attrName = extractText(k["@_attr.name"]);
    if (keyId && attrName) keyMap.set(keyId, attrName);
  }

  const visitGraph = (g: unknown): void => {
    if (!isRecord(g)) return;
    for (const n of asArray<unknown>(g.node)) {
      if (!isRecord(n)) continue;
      const node = parseNode(n, keyMap);
      if (node) {
        if (topo.nodes.has(node.id)) die(`Duplicate node id '${node.id}'`);
        topo.nodes.set(node.id, node);
      }
      for (const nested of asArray<unknown>(n.graph)) visitGraph(nested);
    }
    for (const e of asArray<unknown>(g.edge)) {
      if (!isRecord(e)) continue;
      const link = parseEdge(e, keyMap, topo);
      if (!link) continue;
      if (topo.links.has(link.id)) die(`Duplicate link id '${link.id}'`);
      topo.links.set(link.id, link);
    }
  };

  for (const g of asArray<unknown>(graphml.graph)) visitGraph(g);
  return topo;
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 4) {
  const input = process.argv[2];
  const output = process.argv[3];
  if (!input || !output) {
    console.error("Usage: node dist/graphml_parse.js <in.graphml> <out.json>");
    process.exit(1);
  }
  const topo = parseGraphml(readText(input));
  writeText(output, serializeTopology(topo));
  console.error(`graphml_parse: nodes=${topo.nodes.size} links=${topo.links.size}`);
}
