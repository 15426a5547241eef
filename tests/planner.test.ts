import { describe, it, expect } from "vitest";
import { createAgent, decide, pendingMoves } from "../src/agent/planner.js";
import type { Environment } from "../src/agent/environment.js";
import { Action, Direction, TileStatus } from "../src/shared/types.js";
import { DECISION_LOG_LIMIT } from "../src/shared/constants.js";
import { addAgent, applyAction, createWorld, setTile, worldEnvironment } from "../src/sim/world.js";
import { parseLevel } from "../src/sim/levels.js";
import { runEpisode } from "../src/harness/runner.js";

describe("Planner", () => {
  it("collects the only chip and walks to the goal on a visible map", () => {
    const world = createWorld(3, 3, TileStatus.Blank, { fullMapVisible: true });
    setTile(world, { row: 2, col: 2 }, TileStatus.Chip);
    setTile(world, { row: 2, col: 0 }, TileStatus.Goal);
    addAgent(world, "robot", { row: 0, col: 0 });
    const agent = createAgent("robot");

    const result = runEpisode(world, { agent });

    expect(result.victory).toBe(true);
    expect(result.ticks).toBe(6);
    expect(result.actions).toEqual([
      Action.MoveRight,
      Action.MoveRight,
      Action.MoveDown,
      Action.MoveDown,
      Action.MoveLeft,
      Action.MoveLeft,
    ]);
    expect(result.blockedMoves).toBe(0);
    expect(decide(agent, worldEnvironment(world))).toBe(Action.DoNothing);
  });

  it("buffers the rest of a plan and replays it", () => {
    const world = createWorld(3, 3, TileStatus.Blank, { fullMapVisible: true });
    setTile(world, { row: 2, col: 2 }, TileStatus.Chip);
    setTile(world, { row: 2, col: 0 }, TileStatus.Goal);
    addAgent(world, "robot", { row: 0, col: 0 });
    const agent = createAgent("robot");

    expect(decide(agent, worldEnvironment(world))).toBe(Action.MoveRight);
    expect(pendingMoves(agent)).toEqual([Direction.Right, Direction.Down, Direction.Down]);
    expect(agent.plan.expectedCell).toEqual({ row: 0, col: 1 });
  });

  it("explores along a dark corridor to find the chip and the goal", () => {
    const world = parseLevel(["#########", "#@..c..E#", "#########"].join("\n"), { listPositions: false });
    const result = runEpisode(world, { maxTicks: 50 });

    expect(result.victory).toBe(true);
    expect(result.actions).toEqual(Array(6).fill(Action.MoveRight));
  });

  it("steps onto an adjacent goal once no chips remain, then waits", () => {
    const world = createWorld(3, 3);
    setTile(world, { row: 1, col: 2 }, TileStatus.Goal);
    addAgent(world, "robot", { row: 1, col: 1 });
    const env = worldEnvironment(world);
    const agent = createAgent("robot");

    const first = decide(agent, env);
    expect(first).toBe(Action.MoveRight);
    expect(applyAction(world, "robot", first)).toBe("moved");
    expect(world.victory).toBe(true);
    expect(decide(agent, env)).toBe(Action.DoNothing);
  });

  it("detours toward a door it holds the key for when oscillating", () => {
    const world = createWorld(5, 5, TileStatus.Blank, { fullMapVisible: true });
    setTile(world, { row: 0, col: 4 }, TileStatus.Goal);
    setTile(world, { row: 2, col: 1 }, TileStatus.DoorBlue);
    const body = addAgent(world, "robot", { row: 0, col: 0 });
    body.holdings.push("key_blue");
    const env = worldEnvironment(world);
    const agent = createAgent("robot");

    const bounce = [
      { row: 0, col: 0 },
      { row: 0, col: 1 },
    ];
    let action = Action.DoNothing;
    for (let i = 0; i < 6; i++) {
      body.pos = bounce[i % 2];
      action = decide(agent, env);
      if (i < 5) expect(action).toBe(Action.MoveRight);
    }

    expect(action).toBe(Action.MoveDown);
    const sources = agent.logs.filter((e) => e.tick === 6).map((e) => `${e.source}: ${e.text}`);
    expect(sources).toContain("stuck: oscillating at (0, 1)");
    expect(sources).toContain("door: detour toward door at (2, 1)");
  });

  it("drops a buffered move that turns out to be blocked and replans", () => {
    const world = parseLevel([
      "#######",
      "#@..#c#",
      "#.....#",
      "#######",
    ].join("\n"));
    const env = worldEnvironment(world);
    const agent = createAgent("robot");

    const actions: Action[] = [];
    for (let i = 0; i < 3; i++) {
      const action = decide(agent, env);
      actions.push(action);
      applyAction(world, "robot", action);
    }

    expect(actions).toEqual([Action.MoveRight, Action.MoveRight, Action.MoveDown]);
    expect(agent.logs.map((e) => e.text)).toContain("next move right is blocked, replanning");
  });

  it("replans when moved off its route", () => {
    const world = createWorld(3, 3, TileStatus.Blank, { fullMapVisible: true });
    setTile(world, { row: 2, col: 2 }, TileStatus.Chip);
    const body = addAgent(world, "robot", { row: 0, col: 0 });
    const env = worldEnvironment(world);
    const agent = createAgent("robot");

    decide(agent, env);
    body.pos = { row: 2, col: 1 };
    expect(decide(agent, env)).toBe(Action.MoveRight);
    expect(agent.logs.map((e) => e.text)).toContain("off route at (2, 1), replanning");
    expect(pendingMoves(agent)).toEqual([]);
  });

  it("turns an environment fault into a logged no-op", () => {
    const world = createWorld(3, 3);
    addAgent(world, "robot", { row: 1, col: 1 });
    const env: Environment = {
      ...worldEnvironment(world),
      getRemainingChips() {
        throw new Error("sensor offline");
      },
    };
    const agent = createAgent("robot");

    expect(decide(agent, env)).toBe(Action.DoNothing);
    expect(agent.logs.at(-1)).toEqual({ tick: 1, source: "fault", text: "tick aborted: sensor offline" });
    expect(pendingMoves(agent)).toEqual([]);
  });

  it("waits when its own position is unknown", () => {
    const world = createWorld(3, 3);
    const agent = createAgent("robot");
    expect(decide(agent, worldEnvironment(world))).toBe(Action.DoNothing);
    expect(agent.logs).toEqual([{ tick: 1, source: "observe", text: "position unknown, waiting" }]);
  });

  it("does nothing when boxed in", () => {
    const world = parseLevel(["###", "#@#", "###"].join("\n"));
    setTile(world, { row: 0, col: 0 }, TileStatus.Chip);
    const agent = createAgent("robot");
    expect(decide(agent, worldEnvironment(world))).toBe(Action.DoNothing);
  });

  it("bounds its decision log and forwards entries to the sink", () => {
    const world = createWorld(3, 3);
    const seen: string[] = [];
    const agent = createAgent("robot", { logSink: (entry) => seen.push(entry.source) });
    const env = worldEnvironment(world);

    for (let i = 0; i < DECISION_LOG_LIMIT + 25; i++) decide(agent, env);

    expect(agent.logs).toHaveLength(DECISION_LOG_LIMIT);
    expect(agent.logs[0].tick).toBe(26);
    expect(seen).toHaveLength(DECISION_LOG_LIMIT + 25);
  });

  it("makes the same choices for the same seed", () => {
    const level = ["#########", "#@..c...#", "#.###.#.#", "#c..#..E#", "#########"].join("\n");
    const a = runEpisode(parseLevel(level), { agentOptions: { seed: 7 } });
    const b = runEpisode(parseLevel(level), { agentOptions: { seed: 7 } });
    expect(a.actions).toEqual(b.actions);
    expect(a.victory).toBe(true);
  });
});

describe("Planner log sink", () => {
  it("detaches a throwing sink and still moves", () => {
    const world = createWorld(3, 3);
    addAgent(world, "robot", { row: 1, col: 1 });
    let calls = 0;
    const agent = createAgent("robot", {
      logSink: () => {
        calls++;
        throw new Error("sink closed");
      },
    });

    expect(decide(agent, worldEnvironment(world))).toBe(Action.MoveUp);
    expect(calls).toBe(1);
    expect(agent.logSink).toBeNull();
    expect(agent.logs).toEqual([
      { tick: 1, source: "goal", text: "all chips collected but goal not located, exploring" },
      { tick: 1, source: "fault", text: "log sink failed, detached: sink closed" },
      { tick: 1, source: "move", text: "exploring unvisited: up" },
    ]);
  });

  it("returns do_nothing when the sink throws while a fault is reported", () => {
    const world = createWorld(3, 3);
    addAgent(world, "robot", { row: 1, col: 1 });
    const env: Environment = {
      ...worldEnvironment(world),
      getRemainingChips() {
        throw new Error("sensor offline");
      },
    };
    const agent = createAgent("robot", {
      logSink: () => {
        throw new Error("sink closed");
      },
    });

    expect(decide(agent, env)).toBe(Action.DoNothing);
    expect(agent.logs.map((e) => e.text)).toEqual([
      "tick aborted: sensor offline",
      "log sink failed, detached: sink closed",
    ]);
  });
});

describe("Planner fallbacks", () => {
  it("heads for a cell beside a goal it cannot enter", () => {
    const world = createWorld(3, 3, TileStatus.Blank, { fullMapVisible: true });
    setTile(world, { row: 2, col: 2 }, TileStatus.Wall);
    addAgent(world, "robot", { row: 0, col: 0 });
    const env: Environment = { ...worldEnvironment(world), getGoalPosition: () => ({ row: 2, col: 2 }) };
    const agent = createAgent("robot");

    expect(decide(agent, env)).toBe(Action.MoveDown);
    expect(pendingMoves(agent)).toEqual([Direction.Right, Direction.Right]);
    expect(agent.logs.map((e) => e.text)).toContain("goal (2, 2) unreachable, heading beside it");
  });

  it("takes a greedy step when the goal is sealed off", () => {
    const world = parseLevel(["..#..", "@.#.E", "..#.."].join("\n"), { fullMapVisible: true });
    const agent = createAgent("robot");

    expect(decide(agent, worldEnvironment(world))).toBe(Action.MoveRight);
    expect(agent.logs.at(-1)).toEqual({ tick: 1, source: "move", text: "greedy step toward goal: right" });
    expect(pendingMoves(agent)).toEqual([]);
  });

  it("breaks a loop with a seeded random step", () => {
    const loop = [
      { row: 2, col: 2 },
      { row: 1, col: 2 },
      { row: 1, col: 1 },
      { row: 2, col: 2 },
      { row: 3, col: 2 },
      { row: 2, col: 2 },
    ];
    const play = () => {
      const world = createWorld(5, 5, TileStatus.Blank, { listPositions: false });
      setTile(world, { row: 4, col: 4 }, TileStatus.Chip);
      const body = addAgent(world, "robot", loop[0]);
      const env = worldEnvironment(world);
      const agent = createAgent("robot", { seed: 11 });
      let action = Action.DoNothing;
      for (const cell of loop) {
        body.pos = cell;
        action = decide(agent, env);
      }
      return { action, agent };
    };

    const { action, agent } = play();
    const tick6 = agent.logs.filter((e) => e.tick === 6).map((e) => `${e.source}: ${e.text}`);
    expect(tick6).toContain("stuck: revisiting at (2, 2)");
    const step = tick6.find((line) => line.startsWith("move: breaking loop: "));
    const direction = step?.slice("move: breaking loop: ".length);
    expect(["up", "down", "left", "right"]).toContain(direction);
    expect(action).toBe(`move_${direction}`);
    expect(play().action).toBe(action);
  });

  it("plans to the least visited known cell when every neighbour is visited", () => {
    const world = parseLevel(["#####", "#@..#", "#####"].join("\n"));
    const body = world.agents.get("robot");
    if (!body) throw new Error("no agent placed");
    const env = worldEnvironment(world);
    const agent = createAgent("robot");

    let action = Action.DoNothing;
    for (const cell of [{ row: 1, col: 1 }, { row: 1, col: 3 }, { row: 1, col: 1 }, { row: 1, col: 2 }]) {
      body.pos = cell;
      action = decide(agent, env);
    }

    expect(action).toBe(Action.MoveRight);
    expect(agent.logs.at(-1)).toEqual({ tick: 4, source: "explore", text: "least visited cell (1, 3)" });
  });

  it("steps away from recent cells when no plan can be made", () => {
    const world = parseLevel(["######", "#@...#", "######"].join("\n"));
    const body = world.agents.get("robot");
    if (!body) throw new Error("no agent placed");
    const env = worldEnvironment(world);
    const agent = createAgent("robot", { maxExpansions: 1 });

    let action = Action.DoNothing;
    for (const col of [2, 1, 4, 3]) {
      body.pos = { row: 1, col };
      action = decide(agent, env);
    }

    expect(action).toBe(Action.MoveLeft);
    expect(agent.logs.at(-1)).toEqual({ tick: 4, source: "move", text: "moving away from recent cells: left" });
  });

  it("falls back to any open neighbour when all are recent", () => {
    const world = parseLevel(["#####", "#@..#", "#####"].join("\n"));
    const body = world.agents.get("robot");
    if (!body) throw new Error("no agent placed");
    const env = worldEnvironment(world);
    const agent = createAgent("robot", { maxExpansions: 1 });

    let action = Action.DoNothing;
    for (const col of [1, 3, 2]) {
      body.pos = { row: 1, col };
      action = decide(agent, env);
    }

    expect(action).toBe(Action.MoveLeft);
    expect(agent.logs.at(-1)).toEqual({ tick: 3, source: "move", text: "any open neighbour: left" });
  });

  it("fetches the key when the only chip sits behind its door", () => {
    const world = parseLevel(["#######", "#b.@..#", "###B###", "#.c..E#", "#######"].join("\n"), {
      fullMapVisible: true,
    });
    const agent = createAgent("robot");
    const result = runEpisode(world, { agent });

    const tick1 = agent.logs.filter((e) => e.tick === 1).map((e) => `${e.source}: ${e.text}`);
    expect(tick1).toEqual(["target: no reachable chip among 1", "target: key at (1, 1), 2 moves"]);
    expect(result.actions[0]).toBe(Action.MoveLeft);
    expect(result.victory).toBe(true);
  });
});
