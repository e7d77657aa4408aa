import test from 'node:test';
import assert from 'node:assert/strict';
import { factConstraints, softDeltas } from './rules.js';
import { createEvent, SYSTEM_ACTOR } from '../model/event.js';
import type { VoteOutcome } from '../model/event.js';
import { createMemoryItem } from '../model/memory.js';
import { createStatement } from '../model/statement.js';

function voteResult(payload: VoteOutcome) {
  return createEvent({
    seq: 1,
    action: 'vote_result',
    actor: SYSTEM_ACTOR,
    location: 'Cafeteria',
    witnesses: [],
    timestamp: 10,
    visibility: 'public',
    payload,
  });
}

test('factConstraints: a kill makes its actor bad', () => {
  const kill = createEvent({
    seq: 0,
    action: 'kill',
    actor: 'x',
    location: 'Reactor',
    witnesses: ['y'],
    timestamp: 2,
    visibility: 'witnessed',
    payload: { target: 'z' },
  });
  const [rule] = factConstraints(kill, { id: 'y', role: 'good', badCount: 1 });
  assert.ok(rule);
  assert.equal(rule.constraint({ x: 'bad', y: 'good', z: 'good' }), true);
  assert.equal(rule.constraint({ x: 'good', y: 'good', z: 'bad' }), false);
});

test('factConstraints: movement carries no hard information', () => {
  const enter = createEvent({
    seq: 0,
    action: 'enter',
    actor: 'x',
    location: 'Reactor',
    witnesses: [],
    timestamp: 2,
    visibility: 'private',
  });
  assert.deepEqual(factConstraints(enter, { id: 'x', role: 'good', badCount: 1 }), []);
});

test('factConstraints: only a good ejected observer learns about its voters', () => {
  const e = voteResult({
    ejectedId: 'a',
    votes: { a: 'b', b: 'a', c: 'a', d: null },
    gameContinues: false,
    deadIds: ['a'],
    livingIds: ['b', 'c', 'd'],
  });

  const [rule, ...rest] = factConstraints(e, { id: 'a', role: 'good', badCount: 1 });
  assert.ok(rule);
  assert.equal(rest.length, 0);
  assert.equal(rule.label, 'one of b, c is bad');
  assert.equal(rule.constraint({ a: 'good', b: 'good', c: 'good', d: 'bad' }), false);
  assert.equal(rule.constraint({ a: 'good', b: 'good', c: 'bad', d: 'good' }), true);

  assert.deepEqual(factConstraints(e, { id: 'a', role: 'bad', badCount: 1 }), []);
  assert.deepEqual(factConstraints(e, { id: 'b', role: 'good', badCount: 1 }), []);
});

test('factConstraints: a continuing game rules out worlds with every dead agent bad', () => {
  const e = voteResult({
    ejectedId: 'b',
    votes: {},
    gameContinues: true,
    deadIds: ['a', 'b'],
    livingIds: ['c', 'd', 'e', 'f', 'g'],
  });
  const rules = factConstraints(e, { id: 'c', role: 'good', badCount: 2 });
  assert.deepEqual(
    rules.map(r => r.label),
    ['game continues', 'not every dead agent was bad']
  );
  const deadBad = { a: 'bad', b: 'bad', c: 'good', d: 'good', e: 'good', f: 'good', g: 'good' } as const;
  assert.ok(rules.every(r => !r.constraint(deadBad)));
});

test('softDeltas: accusations and heard sabotage raise suspicion', () => {
  const accuse = createEvent({
    seq: 3,
    action: 'say',
    actor: 'b',
    location: 'Cafeteria',
    witnesses: [],
    timestamp: 4,
    visibility: 'public',
    payload: createStatement({ predicate: 'role', subject: 'c', value: 'bad', speaker: 'b', timestamp: 4 }),
  });
  assert.deepEqual(softDeltas(createMemoryItem(accuse, 'hearsay', 'b'), 'a'), [{ subject: 'c', delta: 0.1 }]);
  // Being accused yourself does not make you suspect yourself.
  assert.deepEqual(softDeltas(createMemoryItem(accuse, 'hearsay', 'b'), 'c'), []);

  const sabotage = createEvent({
    seq: 4,
    action: 'sabotage',
    actor: 'd',
    location: 'Storage',
    witnesses: [],
    timestamp: 5,
    visibility: 'public',
  });
  assert.deepEqual(softDeltas(createMemoryItem(sabotage, 'hearsay', 'd'), 'a'), [{ subject: 'd', delta: 0.2 }]);
});
