import type { Role } from '../types.js';

/** One complete hypothesis: the role of every agent id. */
export type WorldState = Readonly<Record<string, Role>>;

export type WorldConstraint = (world: WorldState) => boolean;

export type Elimination =
  | { kind: 'noop'; worlds: readonly WorldState[] }
  | { kind: 'narrowed'; worlds: readonly WorldState[]; removed: number }
  | { kind: 'contradiction'; worlds: readonly WorldState[] };

function combinations<T>(items: readonly T[], k: number): T[][] {
  if (k === 0) return [[]];
  if (items.length < k) return [];
  const [head, ...rest] = items;
  if (head === undefined) return [];
  const withHead = combinations(rest, k - 1).map(c => [head, ...c]);
  return [...withHead, ...combinations(rest, k)];
}

function worldFrom(ids: readonly string[], bad: ReadonlySet<string>): WorldState {
  const w: Record<string, Role> = {};
  for (const id of ids) w[id] = bad.has(id) ? 'bad' : 'good';
  return Object.freeze(w);
}

/** Every assignment of exactly `badCount` bad roles over `ids`, in lexicographic order of the bad sets. */
export function enumerateWorlds(ids: readonly string[], badCount: number): WorldState[] {
  return combinations(ids, badCount).map(bad => worldFrom(ids, new Set(bad)));
}

/**
 * Starting candidates for one agent. Bad agents know their team, so they hold
 * only the true world; good agents hold every world where they are good.
 */
export function initialWorldsFor(selfId: string, truth: WorldState): WorldState[] {
  const ids = Object.keys(truth);
  const selfRole = truth[selfId];
  if (selfRole === undefined) throw new Error(`Unknown agent "${selfId}"`);
  if (selfRole === 'bad') return [Object.freeze({ ...truth })];
  const badCount = ids.filter(id => truth[id] === 'bad').length;
  const others = ids.filter(id => id !== selfId);
  return combinations(others, badCount).map(bad => worldFrom(ids, new Set(bad)));
}

/** Throws unless `world` assigns a role to exactly the ids in `ids`. */
export function validateWorld(world: WorldState, ids: readonly string[]): void {
  const keys = Object.keys(world);
  const known = new Set(ids);
  const unknown = keys.filter(k => !known.has(k));
  if (unknown.length > 0) throw new Error(`World assigns roles to unknown agents: ${unknown.join(', ')}`);
  const missing = ids.filter(id => world[id] === undefined);
  if (missing.length > 0) throw new Error(`World has no role for: ${missing.join(', ')}`);
}

export function sameWorld(a: WorldState, b: WorldState): boolean {
  const keys = Object.keys(a);
  return keys.length === Object.keys(b).length && keys.every(k => a[k] === b[k]);
}

/**
 * Keep only worlds satisfying `constraint`. An empty input is left alone, and a
 * constraint that would remove every world is reported as a contradiction and
 * not applied.
 */
export function eliminate(worlds: readonly WorldState[], constraint: WorldConstraint): Elimination {
  if (worlds.length === 0) return { kind: 'noop', worlds };
  const kept = worlds.filter(constraint);
  if (kept.length === 0) return { kind: 'contradiction', worlds };
  if (kept.length === worlds.length) return { kind: 'noop', worlds };
  return { kind: 'narrowed', worlds: kept, removed: worlds.length - kept.length };
}

/** For each id, in how many of `worlds` it is bad. */
export function countBadByAgent(worlds: readonly WorldState[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const w of worlds) {
    for (const [id, role] of Object.entries(w)) {
      counts.set(id, (counts.get(id) ?? 0) + (role === 'bad' ? 1 : 0));
    }
  }
  return counts;
}
