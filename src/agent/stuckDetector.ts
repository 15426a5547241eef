import type { Cell } from "../shared/types.js";
import {
  LOOP_REVISIT_COUNT,
  RECENT_AVOID_DEPTH,
  RECENT_WINDOW_SIZE,
  STUCK_MAX_DISTINCT,
  STUCK_WINDOW,
} from "../shared/constants.js";
import { cellKey, sameCell } from "../shared/grid.js";

export interface MovementHistory {
  /** Last positions, oldest first, never longer than RECENT_WINDOW_SIZE. */
  recent: Cell[];
  visitCounts: Map<string, number>;
}

export interface StuckAssessment {
  /** Last STUCK_WINDOW positions cover at most STUCK_MAX_DISTINCT cells. */
  oscillating: boolean;
  /** Current cell occurs at least LOOP_REVISIT_COUNT times in the window. */
  revisiting: boolean;
  stuck: boolean;
}

export function createMovementHistory(): MovementHistory {
  return { recent: [], visitCounts: new Map() };
}

export function recordPosition(history: MovementHistory, cell: Cell): void {
  history.recent.push({ row: cell.row, col: cell.col });
  while (history.recent.length > RECENT_WINDOW_SIZE) {
    history.recent.shift();
  }
  const key = cellKey(cell);
  history.visitCounts.set(key, (history.visitCounts.get(key) ?? 0) + 1);
}

export function assessStuck(history: MovementHistory, current: Cell): StuckAssessment {
  const window = history.recent;
  if (window.length < STUCK_WINDOW) {
    return { oscillating: false, revisiting: false, stuck: false };
  }

  const tail = window.slice(-STUCK_WINDOW);
  const distinct = new Set(tail.map(cellKey));
  const oscillating = distinct.size <= STUCK_MAX_DISTINCT;

  const occurrences = window.filter((cell) => sameCell(cell, current)).length;
  const revisiting = occurrences >= LOOP_REVISIT_COUNT;

  return { oscillating, revisiting, stuck: oscillating || revisiting };
}

export function isRecentlyVisited(history: MovementHistory, cell: Cell, depth: number = RECENT_AVOID_DEPTH): boolean {
  return history.recent.slice(-depth).some((c) => sameCell(c, cell));
}

export function visitCount(history: MovementHistory, cell: Cell): number {
  return history.visitCounts.get(cellKey(cell)) ?? 0;
}
