#!/usr/bin/env node
import { loadConfig } from './config.js';
import { World } from './engine/world.js';
import { logger } from './logger.js';
import { envSeed } from './utils.js';
import * as path from 'path';
import * as dotenv from 'dotenv';

interface CliArgs {
  configFile: string;
  seed?: number;
  ui: boolean;
  tick: number;
  maxTicks: number;
}

function parseNumber(flag: string, raw: string | undefined): number {
  if (!raw) throw new Error(`Missing value for ${flag}`);
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new Error(`Invalid number "${raw}" for ${flag}`);
  return n;
}

function parseArgs(argv: string[]): CliArgs {
  let configFile: string | undefined;
  let seed: number | undefined;
  let ui = true;
  let tick = 0.5;
  let maxTicks = 20000;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    // Package managers often forward a literal `--`; skip it.
    if (arg === '--') continue;

    if (arg === '--no-ui' || arg === '--no-tui') {
      ui = false;
      continue;
    }

    if (arg === '--seed') {
      seed = parseNumber(arg, argv[++i]);
      continue;
    }

    if (arg === '--tick') {
      tick = parseNumber(arg, argv[++i]);
      if (tick <= 0) throw new Error('--tick must be positive');
      continue;
    }

    if (arg === '--max-ticks') {
      maxTicks = parseNumber(arg, argv[++i]);
      if (!Number.isInteger(maxTicks) || maxTicks <= 0) throw new Error('--max-ticks must be a positive integer');
      continue;
    }

    if (arg === '--config') {
      const next = argv[++i];
      if (!next) throw new Error('Missing value for --config');
      configFile = next;
      continue;
    }

    if (arg.startsWith('-')) {
      throw new Error(`Unknown argument: ${arg}`);
    }

    // First positional arg is the config file.
    if (!configFile) configFile = arg;
  }

  return { configFile: configFile ?? 'sim-config.yaml', seed, ui, tick, maxTicks };
}

function runHeadless(world: World, args: CliArgs) {
  for (let i = 0; i < args.maxTicks && !world.result; i++) {
    world.advance(args.tick);
  }
  if (!world.result) {
    logger.log({
      type: 'SYSTEM',
      simTime: world.elapsedTime,
      content: `Stopped after ${args.maxTicks} ticks without a winner.`,
      metadata: { visibility: 'public' },
    });
  }
}

async function runInteractive(world: World, args: CliArgs) {
  const { runUi } = await import('./ui/runUi.js');
  // Real time: one tick of `args.tick` time units per `args.tick` seconds.
  const tickMs = Math.round(args.tick * 1000);
  const ui = runUi(world, tickMs);
  const ticker = setInterval(() => {
    if (world.result) return;
    try {
      world.advance(args.tick);
    } catch (error) {
      clearInterval(ticker);
      ui.unmount();
      console.error('Simulation failed:', error);
      process.exitCode = 1;
    }
  }, tickMs);

  try {
    await ui.waitUntilExit();
  } finally {
    clearInterval(ticker);
    logger.setConsoleOutputEnabled(true);
  }
}

async function main() {
  // Load local environment variables from .env
  dotenv.config();

  const args = parseArgs(process.argv.slice(2));
  if (args.ui) {
    // The Ink view shows the log itself; structured logs still go to disk.
    logger.setConsoleOutputEnabled(false);
  }
  logger.setPersistenceEnabled(true);

  const configPath = path.resolve(process.cwd(), args.configFile);

  try {
    const loaded = loadConfig(configPath);
    const seed = args.seed ?? envSeed() ?? loaded.seed ?? Date.now();
    const world = new World({ ...loaded, seed });
    logger.log({ type: 'SYSTEM', content: `Seed: ${seed}`, metadata: { visibility: 'public' } });

    if (args.ui) {
      await runInteractive(world, args);
    } else {
      runHeadless(world, args);
    }

    console.log(`Result: ${world.result ?? 'none'} after ${world.turnCount} ticks (t=${world.elapsedTime.toFixed(1)})`);
  } catch (error) {
    console.error('Fatal Error:', error);
    process.exit(1);
  }
}

main().catch(error => {
  console.error('Fatal Error:', error);
  process.exit(1);
});
