import type { ActionIntent } from '../actions/types.js';
import { createStatement } from '../model/statement.js';
import type { Statement, StatementInput } from '../model/statement.js';
import { pickOne, weightedPick } from '../utils.js';
import type { DistributiveOmit } from '../utils.js';
import type { BeliefView, Policy, PolicyContext, WorldView } from './types.js';
import { livingOthers, othersInRoom, wander } from './scoring.js';

const SABOTAGE_CHANCE = 0.1;
const VOTE_GOOD_CHANCE = 0.8;

/** Teammates, read from the single world a bad agent holds. */
function partnersOf(agent: BeliefView): Set<string> {
  const partners = new Set<string>();
  const truth = agent.worlds[0];
  if (!truth) return partners;
  for (const [id, role] of Object.entries(truth)) {
    if (role === 'bad' && id !== agent.id) partners.add(id);
  }
  return partners;
}

/** The one other agent sharing this room, when it is not a partner. */
function killOpportunity(agent: BeliefView, view: WorldView): string | null {
  const nearby = othersInRoom(agent, view);
  const victim = nearby[0];
  if (nearby.length !== 1 || !victim || partnersOf(agent).has(victim.id)) return null;
  return victim.id;
}

type Lie = DistributiveOmit<StatementInput, 'speaker' | 'timestamp'>;

function fakeAlibi(agent: BeliefView, ctx: PolicyContext): Lie | null {
  const meeting = ctx.view.meeting;
  const before = meeting?.preMeetingLocations[agent.id];
  if (!meeting || !before || !meeting.bodyLocations.includes(before)) return null;
  const rooms = ctx.view.rooms;
  const elsewhere = rooms.neighbors(before);
  const pool = elsewhere.length > 0 ? elsewhere : rooms.playableRooms().filter(r => r !== before);
  const claim = pickOne(pool, ctx.rng);
  return claim === undefined ? null : { predicate: 'location', subject: agent.id, value: claim };
}

function scheme(agent: BeliefView, ctx: PolicyContext): Lie | undefined {
  const partners = partnersOf(agent);
  const others = livingOthers(agent, ctx.view);
  const goods = others.filter(a => !partners.has(a.id));
  const livingPartners = others.filter(a => partners.has(a.id));

  const framed = pickOne(goods, ctx.rng);
  const confused = pickOne(others, ctx.rng);
  const room = pickOne(ctx.view.rooms.playableRooms(), ctx.rng);
  const vouched = pickOne(livingPartners, ctx.rng);

  return weightedPick<Lie>(
    [
      {
        weight: framed ? 3 : 0,
        value: { predicate: 'role', subject: framed?.id ?? agent.id, value: 'bad' },
      },
      {
        weight: confused && room ? 2 : 0,
        value: { predicate: 'location', subject: confused?.id ?? agent.id, value: room ?? '' },
      },
      {
        weight: vouched ? 1 : 0,
        value: { predicate: 'role', subject: vouched?.id ?? agent.id, value: 'good' },
      },
    ],
    ctx.rng
  );
}

export const badPolicy: Policy = {
  role: 'bad',

  chooseAction(agent, ctx): ActionIntent {
    const target = killOpportunity(agent, ctx.view);
    if (target) return { kind: 'kill', target };
    if (ctx.rng() < SABOTAGE_CHANCE) return { kind: 'sabotage' };
    return wander(agent, ctx);
  },

  chooseKill(agent, ctx) {
    return killOpportunity(agent, ctx.view);
  },

  chooseStatement(agent, ctx): Statement {
    const fallback: Lie = { predicate: 'did', subject: agent.id, value: 'task' };
    const lie = fakeAlibi(agent, ctx) ?? scheme(agent, ctx) ?? fallback;
    return createStatement({ ...lie, speaker: agent.id, timestamp: ctx.view.time });
  },

  chooseVote(agent, ctx) {
    const partners = partnersOf(agent);
    const others = livingOthers(agent, ctx.view);
    const pool = ctx.rng() < VOTE_GOOD_CHANCE ? others.filter(a => !partners.has(a.id)) : others;
    return (pickOne(pool, ctx.rng) ?? pickOne(others, ctx.rng))?.id ?? null;
  },
};
