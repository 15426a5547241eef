import type { Action, LogEntry } from "../shared/types.js";
import { DEFAULT_AGENT_ID, DEFAULT_MAX_TICKS } from "../shared/constants.js";
import { createAgent, decide } from "../agent/planner.js";
import type { AgentOptions, AgentState } from "../agent/planner.js";
import { applyAction, worldEnvironment } from "../sim/world.js";
import type { MoveOutcome, WorldState } from "../sim/world.js";

export interface RunOptions {
  agentId?: string;
  maxTicks?: number;
  /** Reuse an existing agent instead of creating one. */
  agent?: AgentState;
  agentOptions?: AgentOptions;
  onTick?: (tick: number, action: Action, outcome: MoveOutcome) => void;
}

export interface EpisodeResult {
  victory: boolean;
  ticks: number;
  actions: Action[];
  chipsRemaining: number;
  blockedMoves: number;
  logs: LogEntry[];
}

/** Step one agent through the world until victory or the tick limit. */
export function runEpisode(world: WorldState, options: RunOptions = {}): EpisodeResult {
  const maxTicks = options.maxTicks ?? DEFAULT_MAX_TICKS;
  const agent = options.agent ?? createAgent(options.agentId ?? DEFAULT_AGENT_ID, options.agentOptions);
  const env = worldEnvironment(world);

  const actions: Action[] = [];
  let blockedMoves = 0;

  while (actions.length < maxTicks && !world.victory) {
    const action = decide(agent, env);
    const outcome = applyAction(world, agent.id, action);
    actions.push(action);
    if (outcome === "blocked") blockedMoves++;
    options.onTick?.(actions.length, action, outcome);
  }

  return {
    victory: world.victory,
    ticks: actions.length,
    actions,
    chipsRemaining: world.remainingChips,
    blockedMoves,
    logs: agent.logs,
  };
}
