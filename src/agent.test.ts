import test from 'node:test';
import assert from 'node:assert/strict';
import { Agent } from './agent.js';
import { logger } from './logger.js';
import { initialWorldsFor } from './knowledge/worlds.js';
import type { WorldState } from './knowledge/worlds.js';
import { createEvent, SYSTEM_ACTOR } from './model/event.js';
import type { GameEvent, VoteOutcome } from './model/event.js';
import { createMemoryItem, reviseCertainty } from './model/memory.js';
import { createStatement } from './model/statement.js';
import type { StatementInput } from './model/statement.js';
import { quietLogs } from './testUtils.js';
import type { DistributiveOmit } from './utils.js';

quietLogs();

const ids = ['a', 'b', 'c', 'd', 'e', 'f', 'g'];
const truth: WorldState = { a: 'good', b: 'good', c: 'good', d: 'good', e: 'good', f: 'bad', g: 'bad' };

function agent(id: string, worlds: readonly WorldState[] = initialWorldsFor(id, truth)): Agent {
  const role = truth[id];
  if (!role) throw new Error(`no role for ${id}`);
  return new Agent({ id, role, location: 'Reactor', agentIds: ids, badCount: 2, worlds });
}

let seq = 0;

function killBy(actor: string, target: string, witnesses: string[]): GameEvent {
  return createEvent({
    seq: seq++,
    action: 'kill',
    actor,
    location: 'Reactor',
    witnesses,
    timestamp: 5,
    visibility: 'witnessed',
    payload: { target },
  });
}

function say(statement: DistributiveOmit<StatementInput, 'timestamp'>): GameEvent {
  return createEvent({
    seq: seq++,
    action: 'say',
    actor: statement.speaker,
    location: 'Cafeteria',
    witnesses: [],
    timestamp: 9,
    visibility: 'public',
    payload: createStatement({ ...statement, timestamp: 9 }),
  });
}

function voteResult(payload: VoteOutcome): GameEvent {
  return createEvent({
    seq: seq++,
    action: 'vote_result',
    actor: SYSTEM_ACTOR,
    location: 'Cafeteria',
    witnesses: [],
    timestamp: 12,
    visibility: 'public',
    payload,
  });
}

test('Agent: starts with its candidate worlds and zero suspicion for everyone else', () => {
  const a = agent('a');
  assert.equal(a.worlds.length, 15);
  assert.equal(a.suspicionEntries().length, 6);
  assert.ok(a.suspicionEntries().every(([, score]) => score === 0));
  assert.equal(agent('f').worlds.length, 1);
});

test('Agent: rejects worlds that doubt its own role or name strangers', () => {
  assert.throws(() => agent('a', [{ ...truth, a: 'bad', f: 'good' }]), /not good/);
  assert.throws(() => agent('a', [{ ...truth, z: 'good' }]), /unknown agents: z/);
});

test('updateBelief: witnessing a kill keeps only worlds where the killer is bad', () => {
  const a = agent('a');
  a.updateKnowledge(createMemoryItem(killBy('f', 'b', ['a']), 'observation'));
  assert.equal(a.worlds.length, 5);
  assert.ok(a.worlds.every(w => w.f === 'bad' && w.a === 'good'));
  assert.equal(a.memory.length, 1);
});

test('updateBelief: re-applying the same fact changes nothing', () => {
  const a = agent('a');
  const item = createMemoryItem(killBy('f', 'b', ['a']), 'observation');
  a.updateBelief(item);
  const once = a.worlds;
  a.updateBelief(item);
  assert.deepEqual(a.worlds, once);
});

test('updateBelief: facts give the same worlds in either order', () => {
  const kill = createMemoryItem(killBy('f', 'e', ['a']), 'observation');
  const ejected = createMemoryItem(
    voteResult({
      ejectedId: 'a',
      votes: { b: 'a', c: 'a', d: null },
      gameContinues: true,
      deadIds: ['a'],
      livingIds: ['b', 'c', 'd', 'e', 'f', 'g'],
    }),
    'observation'
  );

  const first = agent('a');
  first.updateBelief(kill);
  first.updateBelief(ejected);

  const second = agent('a');
  second.updateBelief(ejected);
  assert.equal(second.worlds.length, 9);
  second.updateBelief(kill);

  assert.equal(first.worlds.length, 2);
  assert.deepEqual(first.worlds, second.worlds);
});

test('updateBelief: hearing an accusation raises suspicion without removing worlds', () => {
  const a = agent('a');
  const heard = say({ predicate: 'role', subject: 'd', value: 'bad', speaker: 'c' });
  a.updateKnowledge(createMemoryItem(heard, 'hearsay', 'c'));
  a.updateKnowledge(createMemoryItem(heard, 'hearsay', 'c'));
  assert.equal(a.suspicionOf('d'), 0.2);
  assert.equal(a.worlds.length, 15);
});

test('updateBelief: other statements leave beliefs alone', () => {
  const a = agent('a');
  a.updateBelief(createMemoryItem(say({ predicate: 'role', subject: 'd', value: 'good', speaker: 'c' }), 'hearsay', 'c'));
  a.updateBelief(createMemoryItem(say({ predicate: 'location', subject: 'd', value: 'Medbay', speaker: 'c' }), 'hearsay', 'c'));
  a.updateBelief(createMemoryItem(say({ predicate: 'role', subject: 'a', value: 'bad', speaker: 'c' }), 'hearsay', 'c'));
  assert.ok(a.suspicionEntries().every(([, score]) => score === 0));
  assert.equal(a.worlds.length, 15);
});

test('updateBelief: sabotage heard second hand raises suspicion of the saboteur', () => {
  const a = agent('a');
  const sabotage = createEvent({
    seq: seq++,
    action: 'sabotage',
    actor: 'g',
    location: 'Storage',
    witnesses: [],
    timestamp: 3,
    visibility: 'public',
  });
  a.updateKnowledge(createMemoryItem(sabotage, 'hearsay', 'g'));
  assert.equal(a.suspicionOf('g'), 0.2);

  const b = agent('b');
  b.updateKnowledge(createMemoryItem(sabotage, 'observation'));
  assert.equal(b.suspicionOf('g'), 0);
});

test('updateBelief: revised certainties are not acted on', () => {
  const a = agent('a');
  const heard = createMemoryItem(say({ predicate: 'role', subject: 'd', value: 'bad', speaker: 'c' }), 'hearsay', 'c');
  a.updateBelief(reviseCertainty(heard, 'corroborated'));
  a.updateBelief(reviseCertainty(heard, 'contradicted'));
  assert.equal(a.suspicionOf('d'), 0);
  assert.equal(a.worlds.length, 15);
});

test('updateBelief: a continuing game after two deaths rules out both dead being bad', () => {
  const a = agent('a');
  a.updateBelief(
    createMemoryItem(
      voteResult({
        ejectedId: 'd',
        votes: {},
        gameContinues: true,
        deadIds: ['c', 'd'],
        livingIds: ['a', 'b', 'e', 'f', 'g'],
      }),
      'observation'
    )
  );
  assert.equal(a.worlds.length, 14);
  assert.ok(!a.worlds.some(w => w.c === 'bad' && w.d === 'bad'));
});

test('updateBelief: a fact that would empty the set is skipped and logged', () => {
  logger.clear();
  const a = agent('a', [truth]);
  a.updateBelief(createMemoryItem(killBy('b', 'c', ['a']), 'observation'));

  assert.deepEqual(a.worlds, [truth]);
  const beliefs = logger.getLogs().filter(e => e.type === 'BELIEF' && e.player === 'a');
  assert.equal(beliefs.length, 1);
  assert.equal(beliefs[0]?.content, 'contradiction: "b is bad" would rule out every remaining world; ignored');
});

test('updateBelief: an agent with no worlds left stays that way', () => {
  const a = agent('a', []);
  a.updateBelief(createMemoryItem(killBy('f', 'c', ['a']), 'observation'));
  assert.equal(a.worlds.length, 0);
});

test('markDead: an agent dies once', () => {
  const a = agent('a');
  a.markDead();
  assert.equal(a.isAlive(), false);
  assert.throws(() => a.markDead(), /already dead/);
});
