/**
 * Knowledge store: every tile status the agent has observed, the cells it
 * has stood on, and the keys it holds. Grows monotonically over a run.
 */
import type { Cell, KeyColor, NeighborMap, TileStatus } from "../shared/types.js";
import { DIRECTION_ORDER, KEY_COLORS, KEY_TILES } from "../shared/constants.js";
import { cellKey } from "../shared/grid.js";

export interface KnowledgeStore {
  /** Latest observed status per cell key; re-observation overwrites. */
  tiles: Map<string, TileStatus>;
  /** Cell coordinates by key, kept alongside `tiles` so cells can be listed. */
  cells: Map<string, Cell>;
  visited: Set<string>;
  inventory: Set<KeyColor>;
}

export function createKnowledgeStore(): KnowledgeStore {
  return {
    tiles: new Map(),
    cells: new Map(),
    visited: new Set(),
    inventory: new Set(),
  };
}

/**
 * Fold one tick's local observation into the store.
 *
 * Directions missing from either map are skipped. Holdings that do not name a
 * key are ignored; keys already held stay held even if the environment stops
 * reporting them.
 */
export function observe(
  knowledge: KnowledgeStore,
  current: Cell,
  neighborCells: NeighborMap<Cell> | null,
  neighborStatuses: NeighborMap<TileStatus> | null,
  holdings: readonly string[] | null,
): void {
  knowledge.visited.add(cellKey(current));

  if (neighborCells && neighborStatuses) {
    for (const dir of DIRECTION_ORDER) {
      const cell = neighborCells[dir];
      const status = neighborStatuses[dir];
      if (!cell || status === undefined) continue;
      recordTile(knowledge, cell, status);
    }
  }

  if (holdings) {
    for (const item of holdings) {
      const color = keyColorForItem(item);
      if (color) knowledge.inventory.add(color);
    }
  }
}

export function recordTile(knowledge: KnowledgeStore, cell: Cell, status: TileStatus): void {
  const key = cellKey(cell);
  knowledge.tiles.set(key, status);
  if (!knowledge.cells.has(key)) knowledge.cells.set(key, { row: cell.row, col: cell.col });
}

export function knownStatus(knowledge: KnowledgeStore, cell: Cell): TileStatus | undefined {
  return knowledge.tiles.get(cellKey(cell));
}

export function hasVisited(knowledge: KnowledgeStore, cell: Cell): boolean {
  return knowledge.visited.has(cellKey(cell));
}

/** Known cells whose latest status is one of `statuses`, in first-seen order. */
export function cellsWithStatus(knowledge: KnowledgeStore, statuses: readonly TileStatus[]): Cell[] {
  const wanted = new Set(statuses);
  const found: Cell[] = [];
  for (const [key, status] of knowledge.tiles) {
    if (!wanted.has(status)) continue;
    const cell = knowledge.cells.get(key);
    if (cell) found.push(cell);
  }
  return found;
}

function keyColorForItem(item: string): KeyColor | null {
  for (const color of KEY_COLORS) {
    if (KEY_TILES[color] === item) return color;
  }
  return null;
}
