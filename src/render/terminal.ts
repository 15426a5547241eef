import type { WorldState } from "../sim/world.js";
import type { KnowledgeStore } from "../agent/knowledge.js";
import { AGENT_GLYPH, GLYPHS, UNKNOWN_GLYPH } from "../shared/constants.js";
import { cellKey } from "../shared/grid.js";

/**
 * Render the world to a plain-text string (for headless/harness use).
 * With a knowledge store, cells the agent has never observed are left blank.
 */
export function renderToString(world: WorldState, knowledge?: KnowledgeStore): string {
  const occupied = new Set<string>();
  for (const body of world.agents.values()) occupied.add(cellKey(body.pos));

  const lines: string[] = [];
  for (let row = 0; row < world.height; row++) {
    let line = "";
    for (let col = 0; col < world.width; col++) {
      const key = cellKey({ row, col });
      if (occupied.has(key)) {
        line += AGENT_GLYPH;
      } else if (knowledge && !knowledge.tiles.has(key) && !knowledge.visited.has(key)) {
        line += UNKNOWN_GLYPH;
      } else {
        line += GLYPHS[world.tiles[row][col]];
      }
    }
    lines.push(line);
  }

  lines.push(`Chips left: ${world.remainingChips}  Victory: ${world.victory}`);
  return lines.join("\n");
}
