import { logger } from './logger.js';
import { SimConfigSchema } from './types.js';
import type { Role, SimConfig, SimConfigInput } from './types.js';
import type { ActionIntent } from './actions/types.js';
import { createStatement } from './model/statement.js';
import type { Policy, PolicyOverrides } from './policies/index.js';
import { World } from './engine/world.js';
import type { WorldOptions } from './engine/world.js';

/** Keep test runs off the console and the filesystem. */
export function quietLogs() {
  logger.setConsoleOutputEnabled(false);
  logger.setPersistenceEnabled(false);
  logger.clear();
}

/**
 * Config for hand-driven scenarios: nobody acts on their own and no meeting
 * starts by itself unless a test asks for it.
 */
export function testConfig(overrides: SimConfigInput = {}): SimConfig {
  return SimConfigSchema.parse({
    initial_delay: [1000, 1000],
    kill_check_interval: 1000,
    meeting_interval: 10000,
    seed: 1,
    ...overrides,
  });
}

export interface StubOptions {
  votes?: Record<string, string | null>;
  silent?: boolean;
  action?: ActionIntent;
}

/** Deterministic policy: says "I did task", votes from a table, otherwise idles. */
export function stubPolicy(role: Role, opts: StubOptions = {}): Policy {
  return {
    role,
    chooseAction: () => opts.action ?? { kind: 'idle' },
    chooseKill: () => (opts.action?.kind === 'kill' ? opts.action.target : null),
    chooseStatement: (agent, ctx) =>
      opts.silent
        ? null
        : createStatement({ predicate: 'did', subject: agent.id, value: 'task', speaker: agent.id, timestamp: ctx.view.time }),
    chooseVote: agent => opts.votes?.[agent.id] ?? null,
  };
}

export function stubPolicies(opts: StubOptions = {}): PolicyOverrides {
  return { good: stubPolicy('good', opts), bad: stubPolicy('bad', opts) };
}

export function makeWorld(overrides: SimConfigInput, options: WorldOptions = {}): World {
  return new World(testConfig(overrides), options);
}

export function must<T>(value: T | null | undefined, what = 'value'): T {
  if (value === null || value === undefined) throw new Error(`expected ${what}`);
  return value;
}
