/**
 * ASCII level format.
 *
 *   #  wall        ~  water      .  blank      c  chip
 *   b g r y  keys  B G R Y  doors   E  goal    @  agent start
 *
 * Rows may be ragged; short rows are padded with wall.
 */
import { readFileSync } from "node:fs";
import type { Cell } from "../shared/types.js";
import { TileStatus } from "../shared/types.js";
import { AGENT_GLYPH, DEFAULT_AGENT_ID, GLYPHS } from "../shared/constants.js";
import { addAgent, createWorld, setTile } from "./world.js";
import type { WorldOptions, WorldState } from "./world.js";

export class LevelParseError extends Error {
  constructor(
    message: string,
    readonly line: number,
    readonly column: number,
  ) {
    super(`${message} (line ${line}, column ${column})`);
    this.name = "LevelParseError";
  }
}

const STATUS_BY_GLYPH = new Map<string, TileStatus>(
  Object.values(TileStatus).map((status) => [GLYPHS[status], status]),
);

export function parseLevel(text: string, options: WorldOptions = {}, agentId: string = DEFAULT_AGENT_ID): WorldState {
  const lines = text.split(/\r?\n/);
  while (lines.length > 0 && lines[lines.length - 1].trim() === "") lines.pop();
  let firstLine = 0;
  while (firstLine < lines.length && lines[firstLine].trim() === "") firstLine++;
  const rows = lines.slice(firstLine);

  if (rows.length === 0) throw new LevelParseError("level is empty", 1, 1);

  const width = Math.max(...rows.map((r) => r.length));
  const world = createWorld(width, rows.length, TileStatus.Wall, options);
  let start: Cell | null = null;

  for (let row = 0; row < rows.length; row++) {
    const line = rows[row];
    const lineNo = firstLine + row + 1;
    for (let col = 0; col < line.length; col++) {
      const glyph = line[col];
      if (glyph === AGENT_GLYPH) {
        if (start) throw new LevelParseError("second agent start", lineNo, col + 1);
        start = { row, col };
        setTile(world, start, TileStatus.Blank);
        continue;
      }
      const status = STATUS_BY_GLYPH.get(glyph);
      if (status === undefined) throw new LevelParseError(`unknown glyph "${glyph}"`, lineNo, col + 1);
      if (status === TileStatus.Goal && world.goal) {
        throw new LevelParseError("second goal", lineNo, col + 1);
      }
      setTile(world, { row, col }, status);
    }
  }

  if (!start) throw new LevelParseError("no agent start (@)", firstLine + 1, 1);
  addAgent(world, agentId, start);
  return world;
}

export function loadLevel(path: string, options: WorldOptions = {}, agentId?: string): WorldState {
  return parseLevel(readFileSync(path, "utf8"), options, agentId);
}
