/**
 * Grid A* over a partially observed map.
 *
 * Unit step cost on a 4-connected grid with a Manhattan heuristic, so the
 * first time the goal is popped its cost is optimal. Cells with no recorded
 * status are treated as passable by the grid's `isPassable`. The open set is
 * a binary heap ordered by f, ties broken by insertion order; improved nodes
 * are pushed again and stale heap entries are skipped once their cell is
 * closed.
 */
import type { Cell, Direction, TileStatus } from "../shared/types.js";
import { MAX_SEARCH_EXPANSIONS } from "../shared/constants.js";
import { cellKey, formatCell, manhattan, sameCell } from "../shared/grid.js";

export interface Neighbor {
  direction: Direction;
  cell: Cell;
}

/** What the search needs to know about the world for one query. */
export interface SearchGrid {
  statusAt(cell: Cell): TileStatus | undefined;
  /** Adjacent in-bounds cells, in a fixed direction order. */
  neighbors(cell: Cell): Neighbor[];
  isPassable(status: TileStatus | undefined): boolean;
}

export interface PathResult {
  success: boolean;
  /** Start-to-goal moves; empty when start is the goal or on failure. */
  moves: Direction[];
  nodesExplored: number;
  failureReason?: string;
}

interface SearchNode {
  cell: Cell;
  g: number;
  f: number;
  parent: string | null;
  direction: Direction | null;
}

interface OpenEntry {
  key: string;
  f: number;
  seq: number;
}

class OpenHeap {
  private items: OpenEntry[] = [];

  get size(): number {
    return this.items.length;
  }

  push(entry: OpenEntry): void {
    const a = this.items;
    a.push(entry);
    this.siftUp(a.length - 1);
  }

  pop(): OpenEntry | undefined {
    const a = this.items;
    if (a.length === 0) return undefined;
    const top = a[0];
    const last = a.pop();
    if (last && a.length > 0) {
      a[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  private less(x: OpenEntry, y: OpenEntry): boolean {
    return x.f < y.f || (x.f === y.f && x.seq < y.seq);
  }

  private siftUp(i: number): void {
    const a = this.items;
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (!this.less(a[i], a[p])) break;
      [a[i], a[p]] = [a[p], a[i]];
      i = p;
    }
  }

  private siftDown(i: number): void {
    const a = this.items;
    const n = a.length;
    while (true) {
      let s = i;
      const l = i * 2 + 1;
      const r = l + 1;
      if (l < n && this.less(a[l], a[s])) s = l;
      if (r < n && this.less(a[r], a[s])) s = r;
      if (s === i) break;
      [a[i], a[s]] = [a[s], a[i]];
      i = s;
    }
  }
}

export function findPath(
  start: Cell,
  goal: Cell,
  grid: SearchGrid,
  maxExpansions: number = MAX_SEARCH_EXPANSIONS,
): PathResult {
  if (sameCell(start, goal)) {
    return { success: true, moves: [], nodesExplored: 0 };
  }

  const nodes = new Map<string, SearchNode>();
  const closed = new Set<string>();
  const open = new OpenHeap();
  let seq = 0;

  const startKey = cellKey(start);
  const goalKey = cellKey(goal);
  const h0 = manhattan(start, goal);
  nodes.set(startKey, { cell: start, g: 0, f: h0, parent: null, direction: null });
  open.push({ key: startKey, f: h0, seq: seq++ });

  let expanded = 0;
  while (open.size > 0) {
    const entry = open.pop();
    if (!entry || closed.has(entry.key)) continue;

    if (expanded >= maxExpansions) {
      return {
        success: false,
        moves: [],
        nodesExplored: expanded,
        failureReason: `expansion limit ${maxExpansions} reached before ${formatCell(goal)}`,
      };
    }
    expanded++;

    if (entry.key === goalKey) {
      return { success: true, moves: reconstructMoves(nodes, goalKey), nodesExplored: expanded };
    }

    closed.add(entry.key);
    const current = nodes.get(entry.key);
    if (!current) continue;

    for (const { direction, cell } of grid.neighbors(current.cell)) {
      const key = cellKey(cell);
      if (closed.has(key)) continue;
      if (!grid.isPassable(grid.statusAt(cell))) continue;

      const g = current.g + 1;
      const known = nodes.get(key);
      if (known && g >= known.g) continue;

      const f = g + manhattan(cell, goal);
      nodes.set(key, { cell, g, f, parent: entry.key, direction });
      open.push({ key, f, seq: seq++ });
    }
  }

  return {
    success: false,
    moves: [],
    nodesExplored: expanded,
    failureReason: `no route to ${formatCell(goal)} after ${expanded} expansions`,
  };
}

function reconstructMoves(nodes: Map<string, SearchNode>, goalKey: string): Direction[] {
  const moves: Direction[] = [];
  let node = nodes.get(goalKey);
  while (node && node.parent !== null && node.direction !== null) {
    moves.push(node.direction);
    node = nodes.get(node.parent);
  }
  return moves.reverse();
}
