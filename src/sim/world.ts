/**
 * Reference grid world: holds tiles and agent bodies, enforces move legality,
 * collects chips and keys, and answers the planner's environment queries.
 */
import type { Cell, KeyColor, NeighborMap, PositionsByStatus } from "../shared/types.js";
import { Action, Direction, TileStatus } from "../shared/types.js";
import { DIRECTION_ORDER, KEY_COLORS, KEY_TILES } from "../shared/constants.js";
import { cellKey, sameCell, stepFrom } from "../shared/grid.js";
import { isPassable } from "../agent/passability.js";
import type { Environment } from "../agent/environment.js";

export interface AgentBody {
  id: string;
  pos: Cell;
  /** Item names, e.g. `key_blue`. Keys are never consumed. */
  holdings: string[];
}

export interface WorldOptions {
  /** Expose the full tile map through `getTiles()`. */
  fullMapVisible?: boolean;
  /** Answer `getEnvironmentPositions()`; when false it returns null. */
  listPositions?: boolean;
}

export interface WorldState {
  width: number;
  height: number;
  /** Row-major: tiles[row][col]. */
  tiles: TileStatus[][];
  agents: Map<string, AgentBody>;
  goal: Cell | null;
  remainingChips: number;
  fullMapVisible: boolean;
  listPositions: boolean;
  /** Cells an agent has stood on or next to. */
  revealed: Set<string>;
  victory: boolean;
}

export type MoveOutcome = "idle" | "moved" | "blocked" | "no_agent";

const ACTION_DIRECTIONS: Partial<Record<Action, Direction>> = {
  [Action.MoveUp]: Direction.Up,
  [Action.MoveDown]: Direction.Down,
  [Action.MoveLeft]: Direction.Left,
  [Action.MoveRight]: Direction.Right,
};

export function createWorld(
  width: number,
  height: number,
  fill: TileStatus = TileStatus.Blank,
  options: WorldOptions = {},
): WorldState {
  const tiles: TileStatus[][] = [];
  for (let row = 0; row < height; row++) {
    tiles[row] = [];
    for (let col = 0; col < width; col++) {
      tiles[row][col] = fill;
    }
  }
  return {
    width,
    height,
    tiles,
    agents: new Map(),
    goal: null,
    remainingChips: fill === TileStatus.Chip ? width * height : 0,
    fullMapVisible: options.fullMapVisible ?? false,
    listPositions: options.listPositions ?? true,
    revealed: new Set(),
    victory: false,
  };
}

export function inBounds(world: WorldState, cell: Cell): boolean {
  return cell.row >= 0 && cell.row < world.height && cell.col >= 0 && cell.col < world.width;
}

export function tileAt(world: WorldState, cell: Cell): TileStatus | null {
  return inBounds(world, cell) ? world.tiles[cell.row][cell.col] : null;
}

/** Set a tile, keeping the chip count and goal cell in step with it. */
export function setTile(world: WorldState, cell: Cell, status: TileStatus): void {
  const previous = world.tiles[cell.row][cell.col];
  if (previous === TileStatus.Chip) world.remainingChips--;
  if (previous === TileStatus.Goal && world.goal && sameCell(world.goal, cell)) world.goal = null;

  world.tiles[cell.row][cell.col] = status;
  if (status === TileStatus.Chip) world.remainingChips++;
  if (status === TileStatus.Goal) world.goal = { row: cell.row, col: cell.col };
}

export function addAgent(world: WorldState, id: string, pos: Cell): AgentBody {
  const body: AgentBody = { id, pos: { row: pos.row, col: pos.col }, holdings: [] };
  world.agents.set(id, body);
  reveal(world, body.pos);
  return body;
}

/** Apply one agent action. Illegal moves leave the agent where it is. */
export function applyAction(world: WorldState, agentId: string, action: Action): MoveOutcome {
  const body = world.agents.get(agentId);
  if (!body) return "no_agent";

  const dir = ACTION_DIRECTIONS[action];
  if (!dir) return "idle";

  const target = stepFrom(body.pos, dir);
  const status = tileAt(world, target);
  if (status === null || !isPassable(status, heldColors(body), world.remainingChips)) {
    return "blocked";
  }

  body.pos = target;
  reveal(world, target);

  if (status === TileStatus.Chip) {
    setTile(world, target, TileStatus.Blank);
  } else if (status === TileStatus.Goal) {
    world.victory = true;
  } else {
    const color = KEY_COLORS.find((c) => KEY_TILES[c] === status);
    if (color) {
      if (!body.holdings.includes(status)) body.holdings.push(status);
      setTile(world, target, TileStatus.Blank);
    }
  }
  return "moved";
}

/** Environment view of the world for the planner. Reads live state. */
export function worldEnvironment(world: WorldState): Environment {
  return {
    getAgentPosition(agentId) {
      const body = world.agents.get(agentId);
      return body ? { row: body.pos.row, col: body.pos.col } : null;
    },
    getNeighborPositions(cell) {
      const out: NeighborMap<Cell> = {};
      for (const dir of DIRECTION_ORDER) {
        const next = stepFrom(cell, dir);
        if (inBounds(world, next)) out[dir] = next;
      }
      return out;
    },
    getNeighborTiles(agentId) {
      const body = world.agents.get(agentId);
      if (!body) return null;
      const out: NeighborMap<TileStatus> = {};
      for (const dir of DIRECTION_ORDER) {
        const status = tileAt(world, stepFrom(body.pos, dir));
        if (status !== null) out[dir] = status;
      }
      return out;
    },
    getTiles() {
      if (!world.fullMapVisible) return null;
      const tiles = new Map<string, TileStatus>();
      for (let row = 0; row < world.height; row++) {
        for (let col = 0; col < world.width; col++) {
          tiles.set(cellKey({ row, col }), world.tiles[row][col]);
        }
      }
      return tiles;
    },
    getEnvironmentPositions() {
      return world.listPositions ? positionsByStatus(world) : null;
    },
    getRemainingChips() {
      return world.remainingChips;
    },
    getHoldings(agentId) {
      const body = world.agents.get(agentId);
      return body ? [...body.holdings] : null;
    },
    getGoalPosition() {
      if (!world.goal) return null;
      if (!world.fullMapVisible && !world.revealed.has(cellKey(world.goal))) return null;
      return { row: world.goal.row, col: world.goal.col };
    },
  };
}

/** Every non-blank tile grouped by status, row-major within each group. */
export function positionsByStatus(world: WorldState): PositionsByStatus {
  const out: PositionsByStatus = {};
  for (let row = 0; row < world.height; row++) {
    for (let col = 0; col < world.width; col++) {
      const status = world.tiles[row][col];
      if (status === TileStatus.Blank) continue;
      const list = out[status] ?? [];
      list.push({ row, col });
      out[status] = list;
    }
  }
  return out;
}

function heldColors(body: AgentBody): Set<KeyColor> {
  const held = new Set<KeyColor>();
  for (const color of KEY_COLORS) {
    if (body.holdings.includes(KEY_TILES[color])) held.add(color);
  }
  return held;
}

function reveal(world: WorldState, cell: Cell): void {
  world.revealed.add(cellKey(cell));
  for (const dir of DIRECTION_ORDER) {
    const next = stepFrom(cell, dir);
    if (inBounds(world, next)) world.revealed.add(cellKey(next));
  }
}
