import * as ROT from "rot-js";
import type { Cell } from "../shared/types.js";
import { TileStatus } from "../shared/types.js";
import {
  DEFAULT_AGENT_ID,
  DEFAULT_CHIP_COUNT,
  DEFAULT_MAP_HEIGHT,
  DEFAULT_MAP_WIDTH,
  DIRECTION_ORDER,
  DOOR_TILES,
  KEY_COLORS,
  KEY_TILES,
} from "../shared/constants.js";
import { cellKey, sameCell, stepFrom } from "../shared/grid.js";
import { doorColor } from "../agent/passability.js";
import { addAgent, createWorld, setTile, tileAt } from "./world.js";
import type { WorldOptions, WorldState } from "./world.js";

export interface GenerateOptions extends WorldOptions {
  width?: number;
  height?: number;
  chipCount?: number;
  agentId?: string;
}

type DiggerRoom = {
  getLeft(): number;
  getRight(): number;
  getTop(): number;
  getBottom(): number;
  getDoors(cb: (x: number, y: number) => void): void;
};

/**
 * Generate a level from a seed.
 *
 * The agent starts in the first room and the goal sits in the last. With four
 * or more rooms one middle room is locked behind doors of a single colour and
 * holds a chip; its key is placed somewhere reachable without crossing any
 * door. Remaining chips go on cells reachable once the doors are open.
 */
export function generate(seed: number, options: GenerateOptions = {}): WorldState {
  const width = options.width ?? DEFAULT_MAP_WIDTH;
  const height = options.height ?? DEFAULT_MAP_HEIGHT;
  const chipCount = options.chipCount ?? DEFAULT_CHIP_COUNT;

  // Seed ROT.js global RNG for deterministic map generation
  ROT.RNG.setSeed(seed);

  const world = createWorld(width, height, TileStatus.Wall, options);
  const map = new ROT.Map.Digger(width, height, {
    dugPercentage: 0.35,
    roomWidth: [3, 7],
    roomHeight: [3, 5],
  });
  map.create((x, y, wall) => {
    if (!wall) world.tiles[y][x] = TileStatus.Blank;
  });

  const rooms: DiggerRoom[] = map.getRooms();
  const floor = floorCells(world);
  if (floor.length < 2) throw new Error(`seed ${seed} produced no usable floor`);

  const start = rooms.length > 0 ? roomCenter(rooms[0]) : floor[0];
  let goal = rooms.length > 1 ? roomCenter(rooms[rooms.length - 1]) : pick(floor);
  while (sameCell(goal, start)) goal = pick(floor);
  setTile(world, goal, TileStatus.Goal);

  const reserved = new Set([cellKey(start), cellKey(goal)]);
  let placedChips = 0;

  if (rooms.length >= 4 && chipCount > 0) {
    placedChips += lockRoom(world, rooms, start, reserved);
  }

  const openReach = reachable(world, start, (status) => status !== TileStatus.Goal);
  const chipCandidates = shuffle(
    floor.filter((cell) => openReach.has(cellKey(cell)) && !reserved.has(cellKey(cell))
      && tileAt(world, cell) === TileStatus.Blank),
  );
  for (const cell of chipCandidates) {
    if (placedChips >= chipCount) break;
    setTile(world, cell, TileStatus.Chip);
    reserved.add(cellKey(cell));
    placedChips++;
  }

  addAgent(world, options.agentId ?? DEFAULT_AGENT_ID, start);
  return world;
}

/**
 * Turn one middle room's doors into coloured doors, drop a chip in it and
 * place the key outside. Returns the number of chips placed (0 or 1).
 */
function lockRoom(world: WorldState, rooms: DiggerRoom[], start: Cell, reserved: Set<string>): number {
  const room = rooms[1 + Math.floor(ROT.RNG.getUniform() * (rooms.length - 2))];
  const color = KEY_COLORS[Math.floor(ROT.RNG.getUniform() * KEY_COLORS.length)];
  const center = roomCenter(room);
  if (reserved.has(cellKey(center))) return 0;

  const doors: Cell[] = [];
  room.getDoors((x, y) => doors.push({ row: y, col: x }));
  if (doors.length === 0) return 0;
  for (const door of doors) setTile(world, door, DOOR_TILES[color]);

  const dryReach = reachable(world, start, (status) => status !== TileStatus.Goal && doorColor(status) === null);
  const keySpots = floorCells(world).filter(
    (cell) => dryReach.has(cellKey(cell)) && !reserved.has(cellKey(cell)),
  );
  if (dryReach.has(cellKey(center)) || keySpots.length === 0) {
    // Room reachable around its doors, or nowhere to put the key: unlock again.
    for (const door of doors) setTile(world, door, TileStatus.Blank);
    return 0;
  }

  const keyCell = pick(keySpots);
  setTile(world, keyCell, KEY_TILES[color]);
  setTile(world, center, TileStatus.Chip);
  reserved.add(cellKey(keyCell));
  reserved.add(cellKey(center));
  return 1;
}

/** Breadth-first flood from `from` over cells whose status `canPass` accepts. */
export function reachable(world: WorldState, from: Cell, canPass: (status: TileStatus) => boolean): Set<string> {
  const seen = new Set<string>([cellKey(from)]);
  const queue: Cell[] = [from];
  while (queue.length > 0) {
    const cur = queue.shift();
    if (!cur) break;
    for (const dir of DIRECTION_ORDER) {
      const next = stepFrom(cur, dir);
      const status = tileAt(world, next);
      if (status === null || status === TileStatus.Wall || status === TileStatus.Water) continue;
      if (!canPass(status)) continue;
      const key = cellKey(next);
      if (seen.has(key)) continue;
      seen.add(key);
      queue.push(next);
    }
  }
  return seen;
}

function floorCells(world: WorldState): Cell[] {
  const cells: Cell[] = [];
  for (let row = 0; row < world.height; row++) {
    for (let col = 0; col < world.width; col++) {
      if (world.tiles[row][col] === TileStatus.Blank) cells.push({ row, col });
    }
  }
  return cells;
}

function roomCenter(room: DiggerRoom): Cell {
  return {
    row: Math.floor((room.getTop() + room.getBottom()) / 2),
    col: Math.floor((room.getLeft() + room.getRight()) / 2),
  };
}

function pick<T>(items: T[]): T {
  return items[Math.floor(ROT.RNG.getUniform() * items.length)];
}

function shuffle<T>(items: T[]): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(ROT.RNG.getUniform() * (i + 1));
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}
