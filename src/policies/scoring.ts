import type { ActionIntent } from '../actions/types.js';
import { countBadByAgent } from '../knowledge/worlds.js';
import { pickOne } from '../utils.js';
import type { BeliefView, PolicyContext, PublicAgent, WorldView } from './types.js';

export function livingOthers(agent: BeliefView, view: WorldView): PublicAgent[] {
  return view.agents.filter(a => a.alive && a.id !== agent.id);
}

export function othersInRoom(agent: BeliefView, view: WorldView): PublicAgent[] {
  if (agent.location === null) return [];
  return livingOthers(agent, view).filter(a => a.location === agent.location);
}

/** The single entry with the highest score, or null when the top score is shared. */
export function uniqueTop<T>(entries: ReadonlyArray<readonly [T, number]>): { key: T; score: number } | null {
  let best: { key: T; score: number } | null = null;
  let tied = false;
  for (const [key, score] of entries) {
    if (best === null || score > best.score) {
      best = { key, score };
      tied = false;
    } else if (score === best.score) {
      tied = true;
    }
  }
  return best !== null && !tied ? best : null;
}

/**
 * Vote heuristic: the living agent that is bad in the most remaining worlds,
 * ties broken by suspicion; null when nothing separates the candidates.
 */
export function mostLikelyBad(agent: BeliefView, view: WorldView): string | null {
  const counts = countBadByAgent(agent.worlds);
  const candidates = livingOthers(agent, view).map(a => [a.id, counts.get(a.id) ?? 0] as const);
  const maxCount = Math.max(0, ...candidates.map(([, c]) => c));
  if (maxCount === 0) return null;
  const leaders = candidates.filter(([, c]) => c === maxCount);
  if (leaders.length === 1) return leaders[0]?.[0] ?? null;
  const bySuspicion = uniqueTop(leaders.map(([id]) => [id, agent.suspicionOf(id)] as const));
  return bySuspicion !== null && bySuspicion.score > 0 ? bySuspicion.key : null;
}

export function mostSuspicious(agent: BeliefView, view: WorldView): { key: string; score: number } | null {
  return uniqueTop(livingOthers(agent, view).map(a => [a.id, agent.suspicionOf(a.id)] as const));
}

/** Move, work or stand still when nothing more pressing is going on. */
export function wander(agent: BeliefView, ctx: PolicyContext): ActionIntent {
  const roll = ctx.rng();
  if (roll < 0.4 && agent.location !== null) {
    const next = pickOne(ctx.view.rooms.neighbors(agent.location), ctx.rng);
    if (next !== undefined) return { kind: 'enter', room: next };
  }
  if (roll < 0.8) return { kind: 'task' };
  return { kind: 'idle' };
}
