#!/usr/bin/env node
import { generate } from "../sim/procgen.js";
import { loadLevel, LevelParseError } from "../sim/levels.js";
import type { WorldState } from "../sim/world.js";
import { renderToString } from "../render/terminal.js";
import { createAgent } from "../agent/planner.js";
import { runEpisode } from "./runner.js";
import type { EpisodeResult } from "./runner.js";
import { DEFAULT_AGENT_ID, DEFAULT_MAX_TICKS, GOLDEN_SEED } from "../shared/constants.js";
import type { LogEntry } from "../shared/types.js";

// ── Arg parsing ──────────────────────────────────────────────

interface CliArgs {
  seed: number;
  level: string | null;
  maxTicks: number;
  fullMap: boolean;
  verbose: boolean;
  trace: boolean;
}

function parseArgs(): CliArgs {
  const argv = process.argv.slice(2);
  const opts: CliArgs = {
    seed: GOLDEN_SEED,
    level: null,
    maxTicks: DEFAULT_MAX_TICKS,
    fullMap: false,
    verbose: false,
    trace: false,
  };

  for (let i = 0; i < argv.length; i++) {
    switch (argv[i]) {
      case "--seed":
        opts.seed = parseInt(argv[++i], 10);
        if (Number.isNaN(opts.seed)) {
          console.error("ERROR: --seed requires a valid integer");
          process.exit(1);
        }
        break;
      case "--level":
        opts.level = argv[++i] ?? null;
        if (!opts.level) {
          console.error("ERROR: --level requires a file path");
          process.exit(1);
        }
        break;
      case "--max-ticks":
        opts.maxTicks = parseInt(argv[++i], 10);
        if (Number.isNaN(opts.maxTicks) || opts.maxTicks < 1) {
          console.error("ERROR: --max-ticks requires a positive integer");
          process.exit(1);
        }
        break;
      case "--full-map":
        opts.fullMap = true;
        break;
      case "--verbose":
        opts.verbose = true;
        break;
      case "--trace":
        opts.trace = true;
        break;
      default:
        console.error(`WARNING: Unknown argument "${argv[i]}"`);
        break;
    }
  }

  return opts;
}

// ── World setup ──────────────────────────────────────────────

function buildWorld(args: CliArgs): WorldState {
  const options = { fullMapVisible: args.fullMap };
  if (!args.level) return generate(args.seed, options);

  try {
    return loadLevel(args.level, options);
  } catch (err) {
    if (err instanceof LevelParseError) {
      console.error(`ERROR: ${args.level}: ${err.message}`);
    } else {
      console.error(`ERROR: Could not read level file "${args.level}": ${err}`);
    }
    process.exit(1);
  }
}

function formatLog(entry: LogEntry): string {
  return `[${String(entry.tick).padStart(4)} ${entry.source}] ${entry.text}`;
}

function printSummary(world: WorldState, result: EpisodeResult): void {
  console.log("");
  console.log("=== EPISODE OVER ===");
  console.log(`Result: ${result.victory ? "VICTORY" : "GAVE UP"}`);
  console.log(`Ticks: ${result.ticks}`);
  console.log(`Chips remaining: ${result.chipsRemaining}`);
  console.log(`Blocked moves: ${result.blockedMoves}`);
  const body = world.agents.get(DEFAULT_AGENT_ID);
  if (body) console.log(`Holding: ${body.holdings.join(", ") || "nothing"}`);
}

// ── Main ─────────────────────────────────────────────────────

function main(): void {
  const args = parseArgs();

  console.log("chip-planner");
  console.log(args.level ? `Level: ${args.level}` : `Seed: ${args.seed}`);
  console.log(`Max ticks: ${args.maxTicks}  Full map: ${args.fullMap}`);
  console.log("");

  const world = buildWorld(args);
  const agent = createAgent(DEFAULT_AGENT_ID, {
    seed: args.seed,
    logSink: args.verbose ? (entry) => console.log(formatLog(entry)) : undefined,
  });

  console.log(renderToString(world));
  const result = runEpisode(world, {
    agent,
    maxTicks: args.maxTicks,
    onTick: args.trace
      ? (tick, action, outcome) => {
          console.log(`\n-- tick ${tick}: ${action} (${outcome})`);
          console.log(renderToString(world, agent.knowledge));
        }
      : undefined,
  });

  console.log("");
  console.log(renderToString(world));
  printSummary(world, result);
  process.exitCode = result.victory ? 0 : 2;
}

try {
  main();
} catch (err) {
  console.error("Fatal error:", err);
  process.exit(1);
}
