import { chebyshev, posEq, toVec, type GridPos } from "./grid.js";
import { PriorityQueue } from "./priority_queue.js";
import type { CellRect, LinkId, NodeId } from "./util.js";
import { fixPolyline, type Polyline } from "./vec.js";

// Cap on the number of states the search expands for one link.
export const SEARCH_LIMIT = 8192;

export type SearchOptions = {
  // Treat cells holding other nodes as walls.
  avoidNodes: boolean;
  // Only enter multi-cell goal nodes along an axis.
  attachMultiCellsCardinal: boolean;
  // Penalise running alongside other links so parallel links fan out.
  spreadLinks: boolean;
  // Disable diagonal moves.
  orthogonal: boolean;
  // Multiplier for every link-occupancy penalty.
  linkPenaltyWeight: number;
};

// What the search may read of the router's shared state. It never writes to it.
export interface OccupancyView {
  readonly options: Readonly<SearchOptions>;
  nodeAt(p: GridPos): NodeId | undefined;
  hasNodeLabel(p: GridPos): boolean;
  linksAt(p: GridPos): readonly LinkId[];
  inExtents(p: GridPos): boolean;
}

export type RouteRequest = {
  linkId: LinkId;
  // Several starts when the source node spans many cells.
  starts: GridPos[];
  goal: GridPos;
  goalNode: NodeId;
  // Footprint of a multi-cell goal node.
  goalRect?: CellRect;
  vias: GridPos[];
};

export type Route = {
  id: LinkId;
  path: Polyline;
  weight: number;
};

// A bug in the search itself, never a property of the input.
export class RouteInvariantError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "RouteInvariantError";
  }
}

// Node of the implicit search graph. `via` counts the waypoints still to visit, so the
// same cell and heading at different counts are different states.
export type SearchState = {
  pos: GridPos;
  dx: number;
  dy: number;
  via: number;
};

export function stateKey(s: SearchState): string {
  return `${s.pos.x},${s.pos.y},${s.dx},${s.dy},${s.via}`;
}

function stateEq(a: SearchState, b: SearchState): boolean {
  return posEq(a.pos, b.pos) && a.dx === b.dx && a.dy === b.dy && a.via === b.via;
}

// Cardinals first: departures along an axis win ties.
const CARDINAL_STEPS: ReadonlyArray<readonly [number, number]> = [
  [-1, 0],
  [0, -1],
  [0, 1],
  [1, 0],
];

const DIAGONAL_STEPS: ReadonlyArray<readonly [number, number]> = [
  [-1, -1],
  [-1, 1],
  [1, -1],
  [1, 1],
];

function rectDistance(p: GridPos, r: CellRect): number {
  const dx = Math.max(r.minX - p.x, 0, p.x - (r.maxX - 1));
  const dy = Math.max(r.minY - p.y, 0, p.y - (r.maxY - 1));
  return Math.max(dx, dy);
}

/**
 * A* search for a single link over states (cell, heading, vias left).
 *
 * A moving state only continues straight ahead or turns on the spot by 45 degrees
 * (90 when orthogonal); turning is an edge of its own with a cost. Waypoints are
 * enforced by the via counter, which only goes down when the next waypoint is entered,
 * and the goal only accepts states with no waypoints left.
 */
export class RouteFinder {
  private readonly cameFrom = new Map<string, SearchState>();

  public constructor(
    private readonly grid: OccupancyView,
    private readonly req: RouteRequest,
  ) {}

  public run(): Route | undefined {
    const { starts, vias } = this.req;
    if (starts.length === 0) return undefined;

    const open = new PriorityQueue<SearchState>();
    const weights = new Map<string, number>();

    // Equivalent to a virtual source with every start at distance zero.
    for (const pos of starts) {
      const s: SearchState = { pos, dx: 0, dy: 0, via: vias.length };
      open.push(s, 0);
      weights.set(stateKey(s), 0);
    }

    let iter = 0;
    while (iter < SEARCH_LIMIT) {
      const current = open.popMin();
      if (current === undefined) break;
      const curWeight = weights.get(stateKey(current)) ?? 0;

      if (this.isGoal(current)) {
        return this.buildRoute(current, curWeight);
      }

      for (const n of this.neighbours(current)) {
        const newWeight = curWeight + this.weight(current, n);
        const key = stateKey(n);
        const known = weights.get(key);
        if (known === undefined || newWeight < known) {
          this.cameFrom.set(key, current);
          weights.set(key, newWeight);
          // Counting the waypoints left makes the estimate inadmissible on purpose: the
          // search clears waypoints early at the price of an occasional longer route.
          const h = this.goalDistance(n.pos) + n.via;
          open.push(n, Math.round((newWeight + h) * 100));
        }
      }

      iter += 1;
    }

    return undefined;
  }

  // Any cell of the goal node counts, whatever the heading.
  private isGoal(s: SearchState): boolean {
    if (s.via !== 0) return false;
    return posEq(s.pos, this.req.goal) || this.grid.nodeAt(s.pos) === this.req.goalNode;
  }

  private buildRoute(end: SearchState, weight: number): Route | undefined {
    const endKey = stateKey(end);
    let c = this.cameFrom.get(endKey);
    // The goal was one of the starts.
    if (c === undefined) return undefined;

    const cells: GridPos[] = [end.pos];
    const seen = new Set<string>([endKey]);
    const maxIter = this.cameFrom.size + 1;
    let i = 0;
    while (c !== undefined && i < maxIter) {
      const key = stateKey(c);
      if (seen.has(key)) {
        throw new RouteInvariantError(`Loop in search path at (${c.pos.x}, ${c.pos.y}) for link '${this.req.linkId}'`);
      }
      seen.add(key);
      cells.push(c.pos);
      c = this.cameFrom.get(key);
      i += 1;
    }

    if (c !== undefined) {
      throw new RouteInvariantError(`Could not rebuild the route for link '${this.req.linkId}'`);
    }

    cells.reverse();
    return {
      id: this.req.linkId,
      path: fixPolyline(cells.map(toVec)),
      weight,
    };
  }

  private nextVia(remaining: number): GridPos | undefined {
    const { vias } = this.req;
    if (remaining === 0 || remaining > vias.length) return undefined;
    return vias[vias.length - remaining];
  }

  private neighbours(cur: SearchState): SearchState[] {
    const out: SearchState[] = [];
    const { options } = this.grid;
    const prev = this.cameFrom.get(stateKey(cur));
    const via = this.nextVia(cur.via);

    const produce = (candidate: SearchState): void => {
      if (stateEq(candidate, cur)) return;
      if (prev && stateEq(prev, candidate)) return;

      const g = via && posEq(candidate.pos, via) ? { ...candidate, via: candidate.via - 1 } : candidate;

      if (posEq(g.pos, this.req.goal) || this.grid.nodeAt(g.pos) === this.req.goalNode) {
        if (this.req.goalRect && options.attachMultiCellsCardinal && g.dx !== 0 && g.dy !== 0) return;
        out.push(g);
        return;
      }

      if (!this.grid.inExtents(g.pos)) return;
      if (options.avoidNodes && this.grid.nodeAt(g.pos) !== undefined) return;
      if (this.grid.hasNodeLabel(g.pos)) return;
      out.push(g);
    };

    const at = (dx: number, dy: number, pos: GridPos): SearchState => ({ pos, dx, dy, via: cur.via });

    if (cur.dx === 0 && cur.dy === 0) {
      for (const [dx, dy] of CARDINAL_STEPS) {
        produce(at(dx, dy, { x: cur.pos.x + dx, y: cur.pos.y + dy }));
      }
      if (!options.orthogonal) {
        for (const [dx, dy] of DIAGONAL_STEPS) {
          produce(at(dx, dy, { x: cur.pos.x + dx, y: cur.pos.y + dy }));
        }
      }
      return out;
    }

    // Straight on is the only move to another cell.
    produce(at(cur.dx, cur.dy, { x: cur.pos.x + cur.dx, y: cur.pos.y + cur.dy }));

    if (options.orthogonal) {
      if (cur.dx === 0) {
        produce(at(cur.dy, 0, cur.pos));
        produce(at(-cur.dy, 0, cur.pos));
      } else {
        produce(at(0, cur.dx, cur.pos));
        produce(at(0, -cur.dx, cur.pos));
      }
      return out;
    }

    // The two 45 degree turns.
    if (cur.dx === 0) {
      produce(at(1, cur.dy, cur.pos));
      produce(at(-1, cur.dy, cur.pos));
    } else if (cur.dy !== 0) {
      produce(at(0, cur.dy, cur.pos));
    }
    if (cur.dy === 0) {
      produce(at(cur.dx, 1, cur.pos));
      produce(at(cur.dx, -1, cur.pos));
    } else if (cur.dx !== 0) {
      produce(at(cur.dx, 0, cur.pos));
    }

    return out;
  }

  private weight(from: SearchState, to: SearchState): number {
    const { options } = this.grid;
    const { linkId } = this.req;
    let dist = chebyshev(from.pos, to.pos);
    let penalty = 0;

    if (posEq(from.pos, to.pos)) {
      // Turning on the spot. A second turn straight after the first costs more, so two
      // 45 degree turns a cell apart (4) beat one sharp 90 degree corner (6).
      dist = 2;
      const prev = this.cameFrom.get(stateKey(from));
      if (prev && posEq(prev.pos, from.pos)) dist = 4;
    } else if (!posEq(to.pos, this.req.goal) && this.grid.nodeAt(to.pos) !== this.req.goalNode) {
      // Each further link in the cell costs half the one before.
      let n = 1;
      for (const l of this.grid.linksAt(to.pos)) {
        if (l === linkId) continue;
        penalty += 1 / n;
        n *= 2;
      }

      // A diagonal step crosses any link that holds both cells beside the step,
      // even when neither end of the step is occupied.
      if (from.dx !== 0 && from.dy !== 0) {
        const side1 = this.grid.linksAt({ x: from.pos.x + from.dx, y: from.pos.y });
        const side2 = this.grid.linksAt({ x: from.pos.x, y: from.pos.y + from.dy });
        for (const l of side1) {
          if (l === linkId || !side2.includes(l)) continue;
          penalty += 1 / n;
          n *= 2;
        }
      }

      if (options.spreadLinks) {
        const nearby = (p: GridPos): void => {
          let m = 16;
          for (const l of this.grid.linksAt(p)) {
            if (l === linkId) continue;
            penalty += 1 / m;
            m *= 2;
          }
        };

        // Cells ahead and to either side of the heading.
        if (to.dx === 0) {
          nearby({ x: to.pos.x + 1, y: to.pos.y + to.dy });
          nearby({ x: to.pos.x - 1, y: to.pos.y + to.dy });
        } else if (to.dy !== 0) {
          nearby({ x: to.pos.x, y: to.pos.y + to.dy });
        }
        if (to.dy === 0) {
          nearby({ x: to.pos.x + to.dx, y: to.pos.y + 1 });
          nearby({ x: to.pos.x + to.dx, y: to.pos.y - 1 });
        } else if (to.dx !== 0) {
          nearby({ x: to.pos.x + to.dx, y: to.pos.y });
        }
      }
    }

    return dist + penalty * options.linkPenaltyWeight;
  }

  private goalDistance(p: GridPos): number {
    if (this.req.goalRect) return rectDistance(p, this.req.goalRect);
    return chebyshev(p, this.req.goal);
  }
}
