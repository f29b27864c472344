import { COMPASS, isCardinal, moveBy, opposite, parseCompass, type Compass } from "./direction.js";
import { fromVec, SparseGrid, type GridPos } from "./grid.js";
import { nodeCellRect, sortedIds, type NodeId, type Topology } from "./util.js";

// Orthogonal labels are preferred over diagonal ones.
const CARDINAL_COST = 50;
const DIAGONAL_COST = 100;

// Occupied neighbours beside a label are likely to overlap its text.
const SIDE_PENALTY = 50;
const NEIGHBOUR_PENALTY = 5;

// Label direction for a node that spans several cells.
export const CENTRED = "c";

function anchor(pos: [number, number]): GridPos {
  return { x: pos[0], y: pos[1] };
}

// Cells taken by nodes, existing labels and routed links.
export function occupiedCells(topo: Topology): SparseGrid<boolean> {
  const fill = new SparseGrid<boolean>();

  for (const node of topo.nodes.values()) {
    if (!node.pos) continue;
    const pos = anchor(node.pos);
    fill.set(pos, true);

    const rect = nodeCellRect(node);
    if (rect) {
      for (let x = rect.minX; x < rect.maxX; x += 1) {
        for (let y = rect.minY; y < rect.maxY; y += 1) fill.set({ x, y }, true);
      }
    }

    const dir = parseCompass(node.labelAt);
    if (dir) fill.set(moveBy(pos, dir), true);
  }

  for (const link of topo.links.values()) {
    for (const p of link.route ?? []) fill.set(fromVec(p), true);
  }

  return fill;
}

/**
 * Cost of putting the label of node `id` in direction `dir`, at cell `pos`. Lower is
 * better. Other nodes repel by the inverse square of their distance, and each occupied
 * cell around the candidate adds a penalty, except the one holding the node itself.
 */
export function scoreLabelPosition(
  pos: GridPos,
  dir: Compass,
  id: NodeId,
  topo: Topology,
  fill: SparseGrid<boolean>,
): number {
  const dirCost = isCardinal(dir) ? CARDINAL_COST : DIAGONAL_COST;
  let score = 0;

  for (const nid of sortedIds(topo.nodes)) {
    if (nid === id) continue;
    const other = topo.nodes.get(nid)?.pos;
    if (!other) continue;
    const dx = pos.x - other[0];
    const dy = pos.y - other[1];
    score += dirCost / (dx * dx + dy * dy);
  }

  const back = opposite(dir);
  for (const d of COMPASS) {
    if (d === back) continue;
    if (!fill.contains(moveBy(pos, d))) continue;
    score += d === "e" || d === "w" ? SIDE_PENALTY : NEIGHBOUR_PENALTY;
  }

  return score;
}

/**
 * Chooses a label direction for every positioned node that has none. Nodes spanning
 * several cells are not scored: their label always goes to `"c"`, centred on the
 * footprint, even when a neighbouring cell would score well. A node whose eight
 * neighbouring cells are all taken is left without a label.
 */
export function placeLabels(topo: Topology): void {
  const fill = occupiedCells(topo);

  for (const id of sortedIds(topo.nodes)) {
    const node = topo.nodes.get(id);
    if (!node || !node.pos || node.labelAt) continue;

    if (nodeCellRect(node)) {
      node.labelAt = CENTRED;
      continue;
    }

    const pos = anchor(node.pos);
    let best: Compass | undefined;
    let bestScore = 0;
    for (const dir of COMPASS) {
      const candidate = moveBy(pos, dir);
      if (fill.contains(candidate)) continue;
      const score = scoreLabelPosition(candidate, dir, id, topo, fill);
      if (best === undefined || score < bestScore) {
        best = dir;
        bestScore = score;
      }
    }

    if (best !== undefined) {
      node.labelAt = best;
      fill.set(moveBy(pos, best), true);
    }
  }
}
