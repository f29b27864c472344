import { describe, expect, it } from "vitest";
import { parseGraphml } from "./graphml_parse.js";

const DOC = `<?xml version="1.0" encoding="UTF-8"?>
<graphml xmlns="http://graphml.graphdrawing.org/xmlns" xmlns:y="http://www.yworks.com/xml/graphml">
  <key id="d0" for="node" attr.name="pos" attr.type="string"/>
  <key id="d1" for="node" attr.name="label" attr.type="string"/>
  <key id="d2" for="edge" attr.name="via" attr.type="string"/>
  <key id="d3" for="node" yfiles.type="nodegraphics"/>
  <key id="d4" for="node" attr.name="width" attr.type="double"/>
  <key id="d5" for="edge" attr.name="class" attr.type="string"/>
  <graph id="G" edgedefault="undirected">
    <node id="a">
      <data key="d0">0,0</data>
      <data key="d1">Alpha</data>
    </node>
    <node id="b">
      <data key="d0">4, 2</data>
      <data key="d3"><y:ShapeNode><y:NodeLabel>Beta</y:NodeLabel></y:ShapeNode></data>
      <data key="d4">3</data>
    </node>
    <node id="group">
      <graph id="G2">
        <node id="c"/>
      </graph>
    </node>
    <edge source="a" target="b">
      <data key="d2">1,1 2,2</data>
      <data key="d5">backbone</data>
    </edge>
    <edge source="a" target="b"/>
    <edge id="own" source="b" target="c"/>
  </graph>
</graphml>
`;

describe("parseGraphml", () => {
  it("reads nodes and edges through the declared keys", () => {
    const topo = parseGraphml(DOC);
    expect(topo.nodes.get("a")).toEqual({ id: "a", pos: [0, 0], label: "Alpha" });
    expect(topo.nodes.get("b")).toEqual({ id: "b", pos: [4, 2], label: "Beta", extents: { width: 3, height: 1 } });
    expect(topo.links.get("a-b")).toEqual({ id: "a-b", from: "a", to: "b", via: [[1, 1], [2, 2]], class: "backbone" });
    expect(topo.links.get("a-b-2")).toEqual({ id: "a-b-2", from: "a", to: "b" });
    expect(topo.links.get("own")).toEqual({ id: "own", from: "b", to: "c" });
  });

  it("flattens nested graphs", () => {
    const topo = parseGraphml(DOC);
    expect([...topo.nodes.keys()].sort()).toEqual(["a", "b", "c", "group"]);
  });

  it("returns an empty topology without a graph", () => {
    const topo = parseGraphml("<graphml/>");
    expect(topo.nodes.size).toBe(0);
    expect(topo.links.size).toBe(0);
  });

  it("rejects bad coordinates and repeated ids", () => {
    const withPos = (pos: string): string =>
      `<graphml><key id="p" attr.name="pos"/><graph><node id="a"><data key="p">${pos}</data></node></graph></graphml>`;
    expect(() => parseGraphml(withPos("1;2"))).toThrow("Node 'a' pos must look like 'x,y', got '1;2'");
    expect(() => parseGraphml(withPos("1.5,2"))).toThrow("Node 'a' pos must be an integer, got '1.5'");
    expect(() => parseGraphml('<graphml><graph><node id="a"/><node id="a"/></graph></graphml>')).toThrow(
      "Duplicate node id 'a'",
    );
  });
});
