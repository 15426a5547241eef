import { Action, Direction, KeyColor, TileStatus } from "./types.js";

// ── Search ───────────────────────────────────────────────────
export const MAX_SEARCH_EXPANSIONS = 1000; // A* gives up (no path) past this many expansions
export const MAX_EXPLORE_CANDIDATES = 16; // least-visited cells tried when exploring by plan

// ── Stuck / loop detection ───────────────────────────────────
export const RECENT_WINDOW_SIZE = 10;
export const STUCK_WINDOW = 6; // positions inspected for oscillation
export const STUCK_MAX_DISTINCT = 2; // <= this many distinct cells in STUCK_WINDOW = oscillating
export const LOOP_REVISIT_COUNT = 3; // current cell seen this often in the window = revisiting
export const RECENT_AVOID_DEPTH = 3; // greedy moves skip the last N positions

// ── Decision log ─────────────────────────────────────────────
export const DECISION_LOG_LIMIT = 200;

// ── Harness ──────────────────────────────────────────────────
export const DEFAULT_MAX_TICKS = 500;
export const DEFAULT_AGENT_ID = "robot";
export const GOLDEN_SEED = 184201;

// ── Procgen ──────────────────────────────────────────────────
export const DEFAULT_MAP_WIDTH = 40;
export const DEFAULT_MAP_HEIGHT = 20;
export const DEFAULT_CHIP_COUNT = 5;

// ── Directions ───────────────────────────────────────────────
/** Fixed enumeration order used for every neighbour scan and tie-break. */
export const DIRECTION_ORDER: readonly Direction[] = [
  Direction.Up,
  Direction.Down,
  Direction.Left,
  Direction.Right,
];

export const DIRECTION_DELTAS: Record<Direction, { dRow: number; dCol: number }> = {
  up: { dRow: -1, dCol: 0 },
  down: { dRow: 1, dCol: 0 },
  left: { dRow: 0, dCol: -1 },
  right: { dRow: 0, dCol: 1 },
};

export const DIRECTION_ACTIONS: Record<Direction, Action> = {
  up: Action.MoveUp,
  down: Action.MoveDown,
  left: Action.MoveLeft,
  right: Action.MoveRight,
};

// ── Keys and doors ───────────────────────────────────────────
export const KEY_COLORS: readonly KeyColor[] = [KeyColor.Blue, KeyColor.Green, KeyColor.Red, KeyColor.Yellow];

export const KEY_TILES: Record<KeyColor, TileStatus> = {
  blue: TileStatus.KeyBlue,
  green: TileStatus.KeyGreen,
  red: TileStatus.KeyRed,
  yellow: TileStatus.KeyYellow,
};

export const DOOR_TILES: Record<KeyColor, TileStatus> = {
  blue: TileStatus.DoorBlue,
  green: TileStatus.DoorGreen,
  red: TileStatus.DoorRed,
  yellow: TileStatus.DoorYellow,
};

// ── Glyphs ───────────────────────────────────────────────────
export const GLYPHS: Record<TileStatus, string> = {
  blank: ".",
  wall: "#",
  water: "~",
  chip: "c",
  key_blue: "b",
  key_green: "g",
  key_red: "r",
  key_yellow: "y",
  door_blue: "B",
  door_green: "G",
  door_red: "R",
  door_yellow: "Y",
  goal: "E",
};

export const AGENT_GLYPH = "@";
export const UNKNOWN_GLYPH = " ";
