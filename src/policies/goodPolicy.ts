import type { ActionIntent } from '../actions/types.js';
import { countBadByAgent } from '../knowledge/worlds.js';
import { createStatement } from '../model/statement.js';
import type { Statement } from '../model/statement.js';
import type { BeliefView, Policy, PolicyContext } from './types.js';
import { livingOthers, mostLikelyBad, mostSuspicious, uniqueTop, wander } from './scoring.js';

const WORLD_ACCUSE_CHANCE = 0.7;
const SUSPICION_ACCUSE_CHANCE = 0.6;
const SUSPECT_THRESHOLD = 0.5;
const EMERGENCY_MAX_WORLDS = 2;

function accuse(agent: BeliefView, subject: string, time: number): Statement {
  return createStatement({ predicate: 'role', subject, value: 'bad', speaker: agent.id, timestamp: time });
}

/** Latest kill this agent saw with its own eyes whose killer is still walking around. */
function witnessedKiller(agent: BeliefView, ctx: PolicyContext): string | null {
  const alive = new Set(livingOthers(agent, ctx.view).map(a => a.id));
  for (let i = agent.memory.length - 1; i >= 0; i--) {
    const item = agent.memory[i];
    if (!item || item.certainty !== 'FACT' || item.event.action !== 'kill') continue;
    if (alive.has(item.event.actor)) return item.event.actor;
  }
  return null;
}

function worldLeader(agent: BeliefView, ctx: PolicyContext): string | null {
  const counts = countBadByAgent(agent.worlds);
  const top = uniqueTop(livingOthers(agent, ctx.view).map(a => [a.id, counts.get(a.id) ?? 0] as const));
  if (!top || top.score === 0) return null;
  return top.score >= agent.worlds.length / 2 ? top.key : null;
}

function lastSighting(agent: BeliefView, time: number): Statement | null {
  for (let i = agent.memory.length - 1; i >= 0; i--) {
    const item = agent.memory[i];
    if (!item || item.certainty !== 'FACT') continue;
    const e = item.event;
    if (e.action === 'enter' && e.actor !== agent.id && e.location !== null) {
      return createStatement({
        predicate: 'location',
        subject: e.actor,
        value: e.location,
        speaker: agent.id,
        timestamp: time,
      });
    }
  }
  return null;
}

export const goodPolicy: Policy = {
  role: 'good',

  chooseKill: () => null,

  chooseAction(agent, ctx): ActionIntent {
    const { view } = ctx;
    if (agent.location !== null && view.corpsesAt(agent.location).length > 0) {
      return { kind: 'report' };
    }

    const suspect = mostLikelyBad(agent, view);
    if (
      suspect !== null &&
      agent.worlds.length <= EMERGENCY_MAX_WORLDS &&
      view.timeSinceLastMeeting >= view.emergencyCooldown
    ) {
      return { kind: 'report' };
    }

    const watched = mostSuspicious(agent, view);
    if (watched && watched.score > SUSPECT_THRESHOLD && agent.location !== null) {
      const where = view.agents.find(a => a.id === watched.key)?.location;
      if (where && view.rooms.neighbors(agent.location).includes(where)) {
        return { kind: 'enter', room: where };
      }
    }

    return wander(agent, ctx);
  },

  chooseStatement(agent, ctx) {
    const time = ctx.view.time;

    const killer = witnessedKiller(agent, ctx);
    if (killer) return accuse(agent, killer, time);

    const leader = worldLeader(agent, ctx);
    if (leader) {
      if (ctx.rng() < WORLD_ACCUSE_CHANCE) return accuse(agent, leader, time);
    } else {
      const watched = mostSuspicious(agent, ctx.view);
      if (watched && watched.score > SUSPECT_THRESHOLD && ctx.rng() < SUSPICION_ACCUSE_CHANCE) {
        return accuse(agent, watched.key, time);
      }
    }

    const sighting = lastSighting(agent, time);
    if (sighting) return sighting;

    const before = ctx.view.meeting?.preMeetingLocations[agent.id];
    if (before) {
      return createStatement({ predicate: 'location', subject: agent.id, value: before, speaker: agent.id, timestamp: time });
    }
    return createStatement({ predicate: 'did', subject: agent.id, value: 'task', speaker: agent.id, timestamp: time });
  },

  chooseVote(agent, ctx) {
    return mostLikelyBad(agent, ctx.view);
  },
};
