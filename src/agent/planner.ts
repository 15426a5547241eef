/**
 * Per-tick decision making for the chip-collecting agent.
 *
 * Every tick: fold the local observation into the knowledge store, update
 * the movement history, replay the buffered plan if it is still valid, and
 * otherwise work down the priorities:
 *
 *   chips all collected  -> goal (door detour first when stuck)
 *   chips remain         -> nearest reachable chip, then nearest key
 *   stuck                -> walk toward a door we hold the key for
 *   otherwise            -> explore
 *
 * Inner steps report "nothing found" with null; only `decide` catches.
 */
import * as ROT from "rot-js";
import type { Cell, Direction, LogEntry, PositionsByStatus } from "../shared/types.js";
import { Action, TileStatus } from "../shared/types.js";
import {
  DECISION_LOG_LIMIT,
  DIRECTION_ACTIONS,
  DIRECTION_ORDER,
  DOOR_TILES,
  GOLDEN_SEED,
  KEY_COLORS,
  KEY_TILES,
  MAX_EXPLORE_CANDIDATES,
  MAX_SEARCH_EXPANSIONS,
} from "../shared/constants.js";
import { cellKey, formatCell, manhattan, parseCellKey, sameCell, stepFrom } from "../shared/grid.js";
import type { Environment } from "./environment.js";
import type { KnowledgeStore } from "./knowledge.js";
import { cellsWithStatus, createKnowledgeStore, hasVisited, observe } from "./knowledge.js";
import { isPassable, isPassableOrUnknown } from "./passability.js";
import { findPath } from "./pathfinder.js";
import type { Neighbor, SearchGrid } from "./pathfinder.js";
import { selectNearest } from "./targetSelector.js";
import type { MovementHistory, StuckAssessment } from "./stuckDetector.js";
import { assessStuck, createMovementHistory, isRecentlyVisited, recordPosition, visitCount } from "./stuckDetector.js";

// ── Agent state ──────────────────────────────────────────────

export interface AgentOptions {
  /** Seeds the loop-breaking RNG; defaults to GOLDEN_SEED. */
  seed?: number;
  maxExpansions?: number;
  /** Receives every decision log entry as it is written. */
  logSink?: (entry: LogEntry) => void;
}

interface BufferedPlan {
  /** Remaining moves, next move last (popped from the end). */
  moves: Direction[];
  /** Where the agent must be standing for the next move to apply. */
  expectedCell: Cell | null;
}

export interface AgentState {
  id: string;
  tick: number;
  knowledge: KnowledgeStore;
  history: MovementHistory;
  plan: BufferedPlan;
  rng: typeof ROT.RNG;
  maxExpansions: number;
  logs: LogEntry[];
  logSink: ((entry: LogEntry) => void) | null;
}

export function createAgent(id: string, options: AgentOptions = {}): AgentState {
  const rng = ROT.RNG.clone();
  rng.setSeed(options.seed ?? GOLDEN_SEED);
  return {
    id,
    tick: 0,
    knowledge: createKnowledgeStore(),
    history: createMovementHistory(),
    plan: { moves: [], expectedCell: null },
    rng,
    maxExpansions: options.maxExpansions ?? MAX_SEARCH_EXPANSIONS,
    logs: [],
    logSink: options.logSink ?? null,
  };
}

/** Buffered moves in the order they will be taken. */
export function pendingMoves(agent: AgentState): Direction[] {
  return [...agent.plan.moves].reverse();
}

// ── Tick context ─────────────────────────────────────────────

interface LocalNeighbor {
  direction: Direction;
  cell: Cell;
  status: TileStatus | undefined;
}

interface TickContext {
  agent: AgentState;
  env: Environment;
  current: Cell;
  remainingChips: number;
  neighbors: LocalNeighbor[];
  positions: PositionsByStatus | null;
  fullMap: ReadonlyMap<string, TileStatus> | null;
  grid: SearchGrid;
  stuck: StuckAssessment;
}

/**
 * Decide the agent's action for this tick. Never throws: an unexpected
 * fault is logged, the plan is dropped and the agent does nothing.
 */
export function decide(agent: AgentState, env: Environment): Action {
  agent.tick++;
  try {
    return decideTick(agent, env);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log(agent, "fault", `tick aborted: ${message}`);
    clearPlan(agent);
    return Action.DoNothing;
  }
}

function decideTick(agent: AgentState, env: Environment): Action {
  const current = env.getAgentPosition(agent.id);
  if (!current) {
    log(agent, "observe", "position unknown, waiting");
    return Action.DoNothing;
  }

  const neighborCells = env.getNeighborPositions(current);
  const neighborTiles = env.getNeighborTiles(agent.id);
  observe(agent.knowledge, current, neighborCells, neighborTiles, env.getHoldings(agent.id));

  recordPosition(agent.history, current);
  const stuck = assessStuck(agent.history, current);
  if (stuck.stuck) {
    const signal = stuck.oscillating ? "oscillating" : "revisiting";
    log(agent, "stuck", `${signal} at ${formatCell(current)}`);
  }

  const neighbors: LocalNeighbor[] = [];
  for (const direction of DIRECTION_ORDER) {
    const cell = neighborCells?.[direction];
    if (!cell) continue;
    neighbors.push({ direction, cell, status: neighborTiles?.[direction] });
  }

  const remainingChips = env.getRemainingChips();
  const fullMap = env.getTiles();
  const ctx: TickContext = {
    agent,
    env,
    current,
    remainingChips,
    neighbors,
    positions: env.getEnvironmentPositions(),
    fullMap,
    grid: buildSearchGrid(agent, env, fullMap, remainingChips),
    stuck,
  };

  const buffered = takeBufferedMove(ctx);
  if (buffered) return DIRECTION_ACTIONS[buffered];

  return chooseAction(ctx);
}

function buildSearchGrid(
  agent: AgentState,
  env: Environment,
  fullMap: ReadonlyMap<string, TileStatus> | null,
  remainingChips: number,
): SearchGrid {
  return {
    statusAt(cell) {
      const key = cellKey(cell);
      return fullMap?.get(key) ?? agent.knowledge.tiles.get(key);
    },
    neighbors(cell) {
      const around = env.getNeighborPositions(cell);
      if (!around) return [];
      const out: Neighbor[] = [];
      for (const direction of DIRECTION_ORDER) {
        const next = around[direction];
        if (next) out.push({ direction, cell: next });
      }
      return out;
    },
    isPassable(status) {
      return isPassableOrUnknown(status, agent.knowledge.inventory, remainingChips);
    },
  };
}

// ── Priorities ───────────────────────────────────────────────

function chooseAction(ctx: TickContext): Action {
  if (ctx.remainingChips === 0) return finishAction(ctx);

  const chipAction = pursueNearest(ctx, listedOrKnown(ctx, [TileStatus.Chip]), "chip");
  if (chipAction) return chipAction;

  const keyAction = pursueNearest(ctx, listedOrKnown(ctx, KEY_COLORS.map((c) => KEY_TILES[c])), "key");
  if (keyAction) return keyAction;

  if (ctx.stuck.stuck) {
    const doorAction = doorDetour(ctx);
    if (doorAction) return doorAction;
  }

  return explore(ctx);
}

function finishAction(ctx: TickContext): Action {
  const goal = locateGoal(ctx);
  if (goal && sameCell(goal, ctx.current)) {
    log(ctx.agent, "goal", `standing on goal ${formatCell(goal)}`);
    clearPlan(ctx.agent);
    return Action.DoNothing;
  }

  if (ctx.stuck.stuck) {
    const doorAction = doorDetour(ctx);
    if (doorAction) return doorAction;
  }

  if (goal) return moveToward(ctx, goal, "goal");

  log(ctx.agent, "goal", "all chips collected but goal not located, exploring");
  return explore(ctx);
}

/** Goal cell from the environment, the knowledge store, or the full map, in that order. */
function locateGoal(ctx: TickContext): Cell | null {
  const direct = ctx.env.getGoalPosition();
  if (direct) return direct;

  const listed = ctx.positions?.[TileStatus.Goal];
  if (listed && listed.length > 0) return listed[0];

  const known = cellsWithStatus(ctx.agent.knowledge, [TileStatus.Goal]);
  if (known.length > 0) return known[0];

  if (ctx.fullMap) {
    for (const [key, status] of ctx.fullMap) {
      if (status !== TileStatus.Goal) continue;
      const cell = parseCellKey(key);
      if (cell) return cell;
    }
  }
  return null;
}

function pursueNearest(ctx: TickContext, candidates: Cell[], label: string): Action | null {
  if (candidates.length === 0) return null;

  const target = selectNearest(ctx.current, candidates, ctx.grid, ctx.agent.maxExpansions);
  if (!target) {
    log(ctx.agent, "target", `no reachable ${label} among ${candidates.length}`);
    return null;
  }

  log(ctx.agent, "target", `${label} at ${formatCell(target.cell)}, ${target.moves.length} moves`);
  return bufferPlan(ctx, target.moves);
}

/** Doors we hold the key for: an unvisited one first, else the least visited. */
function doorDetour(ctx: TickContext): Action | null {
  const { knowledge, history } = ctx.agent;
  const held = KEY_COLORS.filter((color) => knowledge.inventory.has(color));
  if (held.length === 0) return null;

  const doors = listedOrKnown(ctx, held.map((color) => DOOR_TILES[color]))
    .filter((cell) => !sameCell(cell, ctx.current));
  if (doors.length === 0) return null;

  let target = doors.find((cell) => !hasVisited(knowledge, cell));
  if (!target) {
    target = doors[0];
    for (const cell of doors) {
      if (visitCount(history, cell) < visitCount(history, target)) target = cell;
    }
  }

  log(ctx.agent, "door", `detour toward door at ${formatCell(target)}`);
  return moveToward(ctx, target, "door");
}

// ── Movement strategies ──────────────────────────────────────

/**
 * Full plan to the target; else a plan to whichever in-bounds cell around it
 * is cheapest to reach; else one greedy step; else exploration.
 */
function moveToward(ctx: TickContext, target: Cell, label: string): Action {
  const { agent, grid, current } = ctx;

  const direct = findPath(current, target, grid, agent.maxExpansions);
  if (direct.success && direct.moves.length > 0) {
    log(agent, "plan", `${label} ${formatCell(target)}: ${direct.moves.length} moves`);
    return bufferPlan(ctx, direct.moves);
  }

  let around: Direction[] | null = null;
  for (const { cell } of grid.neighbors(target)) {
    if (sameCell(cell, current)) continue;
    if (!grid.isPassable(grid.statusAt(cell))) continue;
    const result = findPath(current, cell, grid, agent.maxExpansions);
    if (!result.success || result.moves.length === 0) continue;
    if (!around || result.moves.length < around.length) around = result.moves;
  }
  if (around) {
    log(agent, "plan", `${label} ${formatCell(target)} unreachable, heading beside it`);
    return bufferPlan(ctx, around);
  }

  let greedy: LocalNeighbor | null = null;
  let bestDistance = Infinity;
  for (const neighbor of passableNeighbors(ctx)) {
    if (isRecentlyVisited(agent.history, neighbor.cell)) continue;
    const distance = manhattan(neighbor.cell, target);
    if (distance < bestDistance) {
      bestDistance = distance;
      greedy = neighbor;
    }
  }
  if (greedy) return stepAction(ctx, greedy, `greedy step toward ${label}`);

  return explore(ctx);
}

function explore(ctx: TickContext): Action {
  const { agent } = ctx;
  const open = passableNeighbors(ctx);

  if (ctx.stuck.revisiting && open.length > 0) {
    const pick = agent.rng.getItem(open);
    if (pick) return stepAction(ctx, pick, "breaking loop");
  }

  const fresh = open.find((n) => !hasVisited(agent.knowledge, n.cell));
  if (fresh) return stepAction(ctx, fresh, "exploring unvisited");

  const planned = planToLeastVisited(ctx);
  if (planned) return planned;

  const notRecent = leastVisitedNeighbor(ctx, open.filter((n) => !isRecentlyVisited(agent.history, n.cell)));
  if (notRecent) return stepAction(ctx, notRecent, "moving away from recent cells");

  const any = leastVisitedNeighbor(ctx, open);
  if (any) return stepAction(ctx, any, "any open neighbour");

  log(agent, "explore", "no move available");
  clearPlan(agent);
  return Action.DoNothing;
}

/** Plan to the least-visited known passable cell that has a route. */
function planToLeastVisited(ctx: TickContext): Action | null {
  const { agent, current } = ctx;
  const candidates: Cell[] = [];
  for (const [key, status] of agent.knowledge.tiles) {
    if (!isPassable(status, agent.knowledge.inventory, ctx.remainingChips)) continue;
    const cell = agent.knowledge.cells.get(key);
    if (cell && !sameCell(cell, current)) candidates.push(cell);
  }
  // Array sort is stable, so equal counts keep first-seen order.
  candidates.sort((a, b) => visitCount(agent.history, a) - visitCount(agent.history, b));

  for (const cell of candidates.slice(0, MAX_EXPLORE_CANDIDATES)) {
    const result = findPath(current, cell, ctx.grid, agent.maxExpansions);
    if (result.success && result.moves.length > 0) {
      log(agent, "explore", `least visited cell ${formatCell(cell)}`);
      return bufferPlan(ctx, result.moves);
    }
  }
  return null;
}

function leastVisitedNeighbor(ctx: TickContext, options: LocalNeighbor[]): LocalNeighbor | null {
  let best: LocalNeighbor | null = null;
  for (const neighbor of options) {
    if (!best || visitCount(ctx.agent.history, neighbor.cell) < visitCount(ctx.agent.history, best.cell)) {
      best = neighbor;
    }
  }
  return best;
}

// ── Helpers ──────────────────────────────────────────────────

function passableNeighbors(ctx: TickContext): LocalNeighbor[] {
  const { inventory } = ctx.agent.knowledge;
  return ctx.neighbors.filter(
    (n) => n.status !== undefined && isPassable(n.status, inventory, ctx.remainingChips),
  );
}

/** Cells the environment lists for `statuses`, else the ones the agent has seen. */
function listedOrKnown(ctx: TickContext, statuses: TileStatus[]): Cell[] {
  const positions = ctx.positions;
  const listed = positions ? statuses.flatMap((status) => positions[status] ?? []) : [];
  return listed.length > 0 ? listed : cellsWithStatus(ctx.agent.knowledge, statuses);
}

/** Replay the buffered plan if it still fits what the agent sees now. */
function takeBufferedMove(ctx: TickContext): Direction | null {
  const { agent } = ctx;
  const plan = agent.plan;
  if (plan.moves.length === 0) return null;

  const next = plan.moves[plan.moves.length - 1];
  if (!plan.expectedCell || !sameCell(plan.expectedCell, ctx.current)) {
    log(agent, "plan", `off route at ${formatCell(ctx.current)}, replanning`);
    clearPlan(agent);
    return null;
  }
  if (ctx.stuck.stuck) {
    log(agent, "plan", "stuck, dropping buffered plan");
    clearPlan(agent);
    return null;
  }

  const neighbor = ctx.neighbors.find((n) => n.direction === next);
  const blocked =
    !neighbor ||
    (neighbor.status !== undefined &&
      !isPassable(neighbor.status, agent.knowledge.inventory, ctx.remainingChips));
  if (!neighbor || blocked) {
    log(agent, "plan", `next move ${next} is blocked, replanning`);
    clearPlan(agent);
    return null;
  }

  plan.moves.pop();
  plan.expectedCell = neighbor.cell;
  return next;
}

/** Replace the buffer with `moves`, returning the first as this tick's action. */
function bufferPlan(ctx: TickContext, moves: Direction[]): Action {
  const [first, ...rest] = moves;
  ctx.agent.plan = {
    moves: rest.reverse(),
    expectedCell: stepFrom(ctx.current, first),
  };
  return DIRECTION_ACTIONS[first];
}

function stepAction(ctx: TickContext, neighbor: LocalNeighbor, reason: string): Action {
  log(ctx.agent, "move", `${reason}: ${neighbor.direction}`);
  clearPlan(ctx.agent);
  return DIRECTION_ACTIONS[neighbor.direction];
}

function clearPlan(agent: AgentState): void {
  agent.plan = { moves: [], expectedCell: null };
}

function log(agent: AgentState, source: string, text: string): void {
  const entry: LogEntry = { tick: agent.tick, source, text };
  appendLog(agent, entry);
  if (!agent.logSink) return;
  try {
    agent.logSink(entry);
  } catch (err) {
    // Detach the sink; the entry stays in `logs`.
    agent.logSink = null;
    const message = err instanceof Error ? err.message : String(err);
    appendLog(agent, { tick: agent.tick, source: "fault", text: `log sink failed, detached: ${message}` });
  }
}

function appendLog(agent: AgentState, entry: LogEntry): void {
  agent.logs.push(entry);
  if (agent.logs.length > DECISION_LOG_LIMIT) {
    agent.logs.splice(0, agent.logs.length - DECISION_LOG_LIMIT);
  }
}
