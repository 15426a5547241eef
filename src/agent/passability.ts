import type { KeyColor } from "../shared/types.js";
import { TileStatus } from "../shared/types.js";
import { DOOR_TILES, KEY_COLORS } from "../shared/constants.js";

/** Colour of the door at `status`, or null when it is not a coloured door. */
export function doorColor(status: TileStatus): KeyColor | null {
  for (const color of KEY_COLORS) {
    if (DOOR_TILES[color] === status) return color;
  }
  return null;
}

/**
 * Whether a tile with a concrete status may be entered right now.
 *
 * 1. Walls and water never.
 * 2. A coloured door only with the matching key.
 * 3. The goal only once every chip is collected.
 * 4. Anything else always.
 */
export function isPassable(
  status: TileStatus,
  inventory: ReadonlySet<KeyColor>,
  remainingChips: number,
): boolean {
  if (status === TileStatus.Wall || status === TileStatus.Water) return false;

  const color = doorColor(status);
  if (color) return inventory.has(color);

  if (status === TileStatus.Goal) return remainingChips === 0;

  return true;
}

/**
 * Optimistic variant for search: a cell nobody has observed yet is assumed
 * open. Plans through it are corrected by replanning once it is seen.
 */
export function isPassableOrUnknown(
  status: TileStatus | undefined,
  inventory: ReadonlySet<KeyColor>,
  remainingChips: number,
): boolean {
  if (status === undefined) return true;
  return isPassable(status, inventory, remainingChips);
}
