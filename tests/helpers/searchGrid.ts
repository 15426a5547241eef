import type { Cell, KeyColor } from "../../src/shared/types.js";
import { TileStatus } from "../../src/shared/types.js";
import { DIRECTION_ORDER, GLYPHS } from "../../src/shared/constants.js";
import { cellKey, stepFrom } from "../../src/shared/grid.js";
import { isPassableOrUnknown } from "../../src/agent/passability.js";
import type { Neighbor, SearchGrid } from "../../src/agent/pathfinder.js";

const STATUS_BY_GLYPH = new Map<string, TileStatus>(
  Object.values(TileStatus).map((status) => [GLYPHS[status], status]),
);

export interface TestGrid extends SearchGrid {
  width: number;
  height: number;
  /** Passable by the real rules, unknown cells excluded. */
  open(cell: Cell): boolean;
}

/**
 * Search grid from ASCII rows using the level glyphs, plus `?` for a cell
 * with no recorded status.
 */
export function gridFrom(
  rows: string[],
  inventory: ReadonlySet<KeyColor> = new Set(),
  remainingChips = 1,
): TestGrid {
  const statuses = new Map<string, TileStatus>();
  rows.forEach((line, row) => {
    [...line].forEach((glyph, col) => {
      const status = STATUS_BY_GLYPH.get(glyph);
      if (status !== undefined) statuses.set(cellKey({ row, col }), status);
    });
  });
  const height = rows.length;
  const width = Math.max(...rows.map((r) => r.length));
  const inBounds = (c: Cell) => c.row >= 0 && c.row < height && c.col >= 0 && c.col < width;

  const grid: TestGrid = {
    width,
    height,
    statusAt: (cell) => statuses.get(cellKey(cell)),
    neighbors(cell) {
      const out: Neighbor[] = [];
      for (const direction of DIRECTION_ORDER) {
        const next = stepFrom(cell, direction);
        if (inBounds(next)) out.push({ direction, cell: next });
      }
      return out;
    },
    isPassable: (status) => isPassableOrUnknown(status, inventory, remainingChips),
    open: (cell) => inBounds(cell) && statuses.has(cellKey(cell)) && grid.isPassable(grid.statusAt(cell)),
  };
  return grid;
}
