// ── Environment query surface consumed by the planner ───────

import type { Cell, NeighborMap, PositionsByStatus, TileStatus } from "../shared/types.js";

/**
 * Read-only view of the grid world. Every query may answer `null` (or leave a
 * direction out) when the information is not available; callers treat that
 * as "no information", never as an error.
 */
export interface Environment {
  getAgentPosition(agentId: string): Cell | null;
  /** In-bounds cells adjacent to `cell`, keyed by direction. */
  getNeighborPositions(cell: Cell): NeighborMap<Cell> | null;
  /** Statuses of the tiles adjacent to the agent. */
  getNeighborTiles(agentId: string): NeighborMap<TileStatus> | null;
  /** Full tile map keyed by `cellKey`, when the world exposes it. */
  getTiles(): ReadonlyMap<string, TileStatus> | null;
  getEnvironmentPositions(): PositionsByStatus | null;
  getRemainingChips(): number;
  /** Item names held by the agent, e.g. `key_blue`. */
  getHoldings(agentId: string): string[] | null;
  getGoalPosition(): Cell | null;
}
