import type { Role } from '../types.js';
import type { GameEvent, VoteOutcome } from '../model/event.js';
import type { MemoryItem } from '../model/memory.js';
import type { WorldConstraint, WorldState } from './worlds.js';

export interface NamedConstraint {
  label: string;
  constraint: WorldConstraint;
}

export interface SuspicionDelta {
  subject: string;
  delta: number;
}

export const ACCUSATION_DELTA = 0.1;
export const HEARD_SABOTAGE_DELTA = 0.2;

export interface Observer {
  id: string;
  role: Role;
  // Number of bad roles in the game; every agent is told this at setup.
  badCount: number;
}

function countAlive(world: WorldState, livingIds: readonly string[]) {
  let bad = 0;
  let good = 0;
  for (const id of livingIds) {
    if (world[id] === 'bad') bad++;
    else if (world[id] === 'good') good++;
  }
  return { bad, good };
}

function voteResultConstraints(outcome: VoteOutcome, observer: Observer): NamedConstraint[] {
  const out: NamedConstraint[] = [];

  if (outcome.gameContinues) {
    // The game only goes on while at least one bad agent lives and they are outnumbered.
    out.push({
      label: 'game continues',
      constraint: w => {
        const alive = countAlive(w, outcome.livingIds);
        return alive.bad > 0 && alive.bad < alive.good;
      },
    });

    if (outcome.deadIds.length >= observer.badCount) {
      out.push({
        label: 'not every dead agent was bad',
        constraint: w => !outcome.deadIds.every(id => w[id] === 'bad'),
      });
    }
  }

  if (outcome.ejectedId === observer.id && observer.role === 'good') {
    const voters = Object.entries(outcome.votes)
      .filter(([voter, target]) => target === observer.id && voter !== observer.id)
      .map(([voter]) => voter);
    if (voters.length > 0) {
      out.push({
        label: `one of ${voters.join(', ')} is bad`,
        constraint: w => voters.some(v => w[v] === 'bad'),
      });
    }
  }

  return out;
}

/**
 * World constraints licensed by directly perceiving `event`. Pure, so applying
 * the same constraints twice or in another order leaves the same worlds.
 */
export function factConstraints(event: GameEvent, observer: Observer): NamedConstraint[] {
  switch (event.action) {
    case 'kill':
      return [{ label: `${event.actor} is bad`, constraint: w => w[event.actor] === 'bad' }];
    case 'vote_result':
      return voteResultConstraints(event.payload, observer);
    case 'enter':
    case 'sabotage':
    case 'report':
    case 'say':
      return [];
  }
}

/** Suspicion changes from hearing about an event second hand. */
export function softDeltas(item: MemoryItem, observerId: string): SuspicionDelta[] {
  const event = item.event;
  switch (event.action) {
    case 'say': {
      const s = event.payload;
      if (s.predicate === 'role' && s.value === 'bad' && s.subject !== observerId) {
        return [{ subject: s.subject, delta: ACCUSATION_DELTA }];
      }
      return [];
    }
    case 'sabotage':
      return event.actor === observerId ? [] : [{ subject: event.actor, delta: HEARD_SABOTAGE_DELTA }];
    default:
      return [];
  }
}
