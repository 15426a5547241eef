// ── Coordinates ──────────────────────────────────────────────
export interface Cell {
  row: number;
  col: number;
}

export enum Direction {
  Up = "up",
  Down = "down",
  Left = "left",
  Right = "right",
}

// ── Actions ──────────────────────────────────────────────────
export enum Action {
  DoNothing = "do_nothing",
  MoveUp = "move_up",
  MoveDown = "move_down",
  MoveLeft = "move_left",
  MoveRight = "move_right",
}

// ── Tiles ────────────────────────────────────────────────────
export enum KeyColor {
  Blue = "blue",
  Green = "green",
  Red = "red",
  Yellow = "yellow",
}

export enum TileStatus {
  Blank = "blank",
  Wall = "wall",
  Water = "water",
  Chip = "chip",
  KeyBlue = "key_blue",
  KeyGreen = "key_green",
  KeyRed = "key_red",
  KeyYellow = "key_yellow",
  DoorBlue = "door_blue",
  DoorGreen = "door_green",
  DoorRed = "door_red",
  DoorYellow = "door_yellow",
  Goal = "goal",
}

/** Per-direction lookup, absent where the environment has nothing to report. */
export type NeighborMap<T> = Partial<Record<Direction, T>>;

/** Positions grouped by tile status, as listed by the environment. */
export type PositionsByStatus = Partial<Record<TileStatus, Cell[]>>;

// ── Decision log ─────────────────────────────────────────────
export interface LogEntry {
  tick: number;
  source: string;
  text: string;
}
