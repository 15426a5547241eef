import type { Cell, Direction } from "./types.js";
import { DIRECTION_DELTAS } from "./constants.js";

export function cellKey(cell: Cell): string {
  return `${cell.row},${cell.col}`;
}

export function sameCell(a: Cell, b: Cell): boolean {
  return a.row === b.row && a.col === b.col;
}

export function manhattan(a: Cell, b: Cell): number {
  return Math.abs(a.row - b.row) + Math.abs(a.col - b.col);
}

/** The cell one step from `cell` in `dir`, unbounded. */
export function stepFrom(cell: Cell, dir: Direction): Cell {
  const delta = DIRECTION_DELTAS[dir];
  return { row: cell.row + delta.dRow, col: cell.col + delta.dCol };
}

export function formatCell(cell: Cell): string {
  return `(${cell.row}, ${cell.col})`;
}

/** Inverse of `cellKey`; null for anything that is not two integers. */
export function parseCellKey(key: string): Cell | null {
  const parts = key.split(",");
  if (parts.length !== 2) return null;
  const row = Number(parts[0]);
  const col = Number(parts[1]);
  if (!Number.isInteger(row) || !Number.isInteger(col)) return null;
  return { row, col };
}
