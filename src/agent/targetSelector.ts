import type { Cell, Direction } from "../shared/types.js";
import { MAX_SEARCH_EXPANSIONS } from "../shared/constants.js";
import { findPath } from "./pathfinder.js";
import type { SearchGrid } from "./pathfinder.js";

export interface SelectedTarget {
  cell: Cell;
  moves: Direction[];
}

/**
 * Pick the candidate with the shortest planned route from `start`.
 *
 * Candidates without a route (or equal to `start`) are dropped; on equal
 * length the earlier candidate wins. One search per candidate, which is fine
 * for the handful of chips and keys on a map.
 */
export function selectNearest(
  start: Cell,
  candidates: readonly Cell[],
  grid: SearchGrid,
  maxExpansions: number = MAX_SEARCH_EXPANSIONS,
): SelectedTarget | null {
  let best: SelectedTarget | null = null;

  for (const cell of candidates) {
    const result = findPath(start, cell, grid, maxExpansions);
    if (!result.success || result.moves.length === 0) continue;
    if (!best || result.moves.length < best.moves.length) {
      best = { cell, moves: result.moves };
    }
  }

  return best;
}
