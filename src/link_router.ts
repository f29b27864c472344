import { parseCompass, moveBy } from "./direction.js";
import { fromVec, ListGrid, maxPos, minPos, posEq, SparseGrid, type GridPos } from "./grid.js";
import { RouteFinder, type OccupancyView, type Route, type SearchOptions } from "./route_finder.js";
import { cmpStr, nodeCellRect, sortedIds, type CellRect, type LinkId, type NodeId, type Topology, type TopoNode } from "./util.js";
import { polylineLength, type Polyline, type Vec2 } from "./vec.js";

// Cap on the number of rounds of the fix-point pass.
export const ROUTE_ITER_LIMIT = 32;

// Weight of the link-crossing penalty. The higher it is, the further a route goes out
// of its way to avoid other links.
export const LINK_PENALTY_WEIGHT = 10;

export type RouterOptions = SearchOptions;

export const DEFAULT_ROUTER_OPTIONS: Readonly<RouterOptions> = {
  avoidNodes: true,
  attachMultiCellsCardinal: true,
  spreadLinks: true,
  orthogonal: false,
  linkPenaltyWeight: LINK_PENALTY_WEIGHT,
};

export type RouteStats = {
  routed: LinkId[];
  unrouted: LinkId[];
  // Fix-point rounds actually run.
  rounds: number;
};

function anchorOf(node: TopoNode | undefined): GridPos | undefined {
  if (!node || !node.pos) return undefined;
  return { x: node.pos[0], y: node.pos[1] };
}

// Outer ring of a footprint; a multi-cell node starts its links from any of these.
function boundaryCells(r: CellRect): GridPos[] {
  const out: GridPos[] = [];
  for (let x = r.minX; x < r.maxX; x += 1) {
    out.push({ x, y: r.minY });
    out.push({ x, y: r.maxY - 1 });
  }
  for (let y = r.minY + 1; y < r.maxY; y += 1) {
    out.push({ x: r.minX, y });
    out.push({ x: r.maxX - 1, y });
  }
  return out;
}

// Order-preserving stable sort, kept explicit so each pass reads the same.
function stableSort<T>(items: T[], key: (t: T) => number): T[] {
  return items
    .map((item, i) => ({ item, i, k: key(item) }))
    .sort((a, b) => (a.k < b.k ? -1 : a.k > b.k ? 1 : a.i - b.i))
    .map((e) => e.item);
}

/**
 * Routes every link of a topology over a sparse grid.
 *
 * The router owns three occupancy grids built from the topology when it is created:
 * node cells (multi-cell footprints included), node label cells and the cells each
 * link passes through. Only `addRoute`, `removeRoute` and `moveRoute` change the link
 * grid; searches read it through the {@link OccupancyView} interface.
 */
export class LinkRouter implements OccupancyView {
  public readonly options: RouterOptions;

  private readonly nodes = new SparseGrid<NodeId>();
  private readonly nodeLabels = new SparseGrid<boolean>();
  private readonly linkMap = new ListGrid<LinkId>();
  private extentMin: GridPos | undefined;
  private extentMax: GridPos | undefined;

  public constructor(
    private readonly topo: Topology,
    options: Partial<RouterOptions> = {},
  ) {
    this.options = { ...DEFAULT_ROUTER_OPTIONS, ...options };

    for (const id of sortedIds(topo.nodes)) {
      const node = topo.nodes.get(id);
      const pos = anchorOf(node);
      if (!node || !pos) continue;

      this.extend(pos);
      this.nodes.set(pos, node.id);

      const rect = nodeCellRect(node);
      if (rect) {
        for (let x = rect.minX; x < rect.maxX; x += 1) {
          for (let y = rect.minY; y < rect.maxY; y += 1) {
            this.nodes.set({ x, y }, node.id);
          }
        }
        this.extend({ x: rect.minX, y: rect.minY });
        this.extend({ x: rect.maxX, y: rect.maxY });
      }

      const labelAt = moveBy(pos, parseCompass(node.labelAt));
      if (!posEq(labelAt, pos)) {
        this.nodeLabels.set(labelAt, true);
        this.extend(labelAt);
      }
    }

    for (const id of sortedIds(topo.links)) {
      const link = topo.links.get(id);
      if (!link) continue;

      if (link.route && link.route.length > 0) {
        this.addRoute(id, link.route);
        continue;
      }

      // Claiming the vias and both ends up front nudges the first routes of other links
      // away from them.
      for (const [x, y] of link.via ?? []) {
        this.addLink({ x, y }, id);
      }
      const from = anchorOf(topo.nodes.get(link.from));
      if (from) this.addLink(from, id);
      const to = anchorOf(topo.nodes.get(link.to));
      if (to) this.addLink(to, id);
    }
  }

  /**
   * Sets the bounds of the search space, both corners inclusive. They are otherwise
   * derived from the positions of nodes, labels and vias. Nodes left outside the
   * bounds cannot be reached.
   */
  public setExtents(minX: number, minY: number, maxX: number, maxY: number): void {
    const a = { x: minX, y: minY };
    const b = { x: maxX, y: maxY };
    this.extentMin = minPos(a, b);
    this.extentMax = maxPos(a, b);
  }

  public getExtents(): { min: Vec2; max: Vec2 } {
    const min = this.extentMin ?? { x: 0, y: 0 };
    const max = this.extentMax ?? { x: 0, y: 0 };
    return { min: { x: min.x, y: min.y }, max: { x: max.x, y: max.y } };
  }

  /**
   * Routes every link without a route and writes the result to `link.route`.
   *
   * Links are routed alone first, then again cheapest first with the other routes in
   * place, then repeatedly until no route gets cheaper.
   */
  public routeLinks(): RouteStats {
    const { links } = this.topo;
    const routes: Route[] = [];
    const unrouted: LinkId[] = [];

    for (const id of sortedIds(links)) {
      const link = links.get(id);
      if (!link || (link.route && link.route.length > 0)) continue;
      const route = this.routeLink(id);
      if (!route) {
        unrouted.push(id);
        continue;
      }
      routes.push(route);
      link.route = route.path;
      this.addRoute(id, route.path);
    }

    // Later results depend on the order links are re-routed in; sorting by weight keeps
    // it stable between runs and gives cheap links first claim on good cells.
    const newRoutes: Route[] = [];
    for (const initRoute of stableSort(routes, (r) => r.weight)) {
      const route = this.routeLink(initRoute.id);
      const link = links.get(initRoute.id);
      if (!route || !link) {
        newRoutes.push(initRoute);
        continue;
      }
      this.moveRoute(route.id, initRoute.path, route.path);
      link.route = route.path;
      newRoutes.push(route);
    }

    // Short links have less room to move, so they get improved first. A found route takes
    // at least one step, so its weight is never zero.
    const current = stableSort(newRoutes, (r) => polylineLength(r.path) / r.weight);

    let rounds = 0;
    while (rounds < ROUTE_ITER_LIMIT) {
      rounds += 1;
      let updated = false;
      for (let i = 0; i < current.length; i += 1) {
        const prev = current[i];
        const route = this.routeLink(prev.id);
        const link = links.get(prev.id);
        if (!route || !link || route.weight >= prev.weight) continue;
        this.moveRoute(route.id, prev.path, route.path);
        link.route = route.path;
        current[i] = route;
        updated = true;
      }
      if (!updated) break;
    }

    return {
      routed: current.map((r) => r.id).sort(cmpStr),
      unrouted,
      rounds,
    };
  }

  // Finds a route for one link against the current occupancy without registering it.
  public routeLink(id: LinkId): Route | undefined {
    const link = this.topo.links.get(id);
    if (!link) return undefined;

    const start = this.topo.nodes.get(link.from);
    const goal = this.topo.nodes.get(link.to);
    const startPos = anchorOf(start);
    const goalPos = anchorOf(goal);
    if (!start || !goal || !startPos || !goalPos) return undefined;

    const startRect = nodeCellRect(start);
    const finder = new RouteFinder(this, {
      linkId: id,
      starts: startRect ? boundaryCells(startRect) : [startPos],
      goal: goalPos,
      goalNode: link.to,
      goalRect: nodeCellRect(goal),
      vias: (link.via ?? []).map(([x, y]) => ({ x, y })),
    });
    return finder.run();
  }

  public addRoute(id: LinkId, path: Polyline): void {
    for (const p of path) this.addLink(fromVec(p), id);
  }

  public removeRoute(id: LinkId, path: Polyline): void {
    for (const p of path) this.linkMap.removeValue(fromVec(p), id);
  }

  public moveRoute(id: LinkId, oldPath: Polyline, newPath: Polyline): void {
    this.removeRoute(id, oldPath);
    this.addRoute(id, newPath);
  }

  public nodeAt(p: GridPos): NodeId | undefined {
    return this.nodes.get(p);
  }

  public hasNodeLabel(p: GridPos): boolean {
    return this.nodeLabels.get(p) === true;
  }

  public linksAt(p: GridPos): readonly LinkId[] {
    return this.linkMap.list(p);
  }

  public inExtents(p: GridPos): boolean {
    if (!this.extentMin || !this.extentMax) return false;
    return p.x >= this.extentMin.x && p.x <= this.extentMax.x && p.y >= this.extentMin.y && p.y <= this.extentMax.y;
  }

  private addLink(p: GridPos, id: LinkId): void {
    this.linkMap.append(p, id);
    this.extend(p);
  }

  private extend(p: GridPos): void {
    this.extentMin = this.extentMin ? minPos(this.extentMin, p) : { x: p.x, y: p.y };
    this.extentMax = this.extentMax ? maxPos(this.extentMax, p) : { x: p.x, y: p.y };
  }
}
