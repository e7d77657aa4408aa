import test from 'node:test';
import assert from 'node:assert/strict';
import type { SimConfigInput } from '../types.js';
import { makeWorld, must, quietLogs, stubPolicies } from '../testUtils.js';
import { badPolicy } from './badPolicy.js';

quietLogs();

const six: SimConfigInput = {
  agents: ['a', 'b', 'c', 'd', 'e', 'f'],
  bad_count: 2,
  roles: { a: 'good', b: 'good', c: 'good', d: 'good', e: 'bad', f: 'bad' },
  start_locations: { a: 'Reactor', b: 'Medbay', c: 'Navigation', d: 'Medbay', e: 'Reactor', f: 'Storage' },
};

const zero = () => 0;

function setup(overrides: SimConfigInput = {}) {
  const world = makeWorld({ ...six, ...overrides }, { policies: stubPolicies() });
  return { world, get: (id: string) => must(world.agentById(id), id), ctx: () => ({ view: world.view(), rng: zero }) };
}

test('badPolicy: kills when alone with one crewmate', () => {
  const { get, ctx } = setup();
  assert.deepEqual(badPolicy.chooseAction(get('e'), ctx()), { kind: 'kill', target: 'a' });
});

test('badPolicy: never attacks a partner', () => {
  const { get, ctx } = setup({
    start_locations: { a: 'Reactor', b: 'Medbay', c: 'Navigation', d: 'Medbay', e: 'Storage', f: 'Storage' },
  });
  // rng 0 is under the sabotage chance.
  assert.deepEqual(badPolicy.chooseAction(get('e'), ctx()), { kind: 'sabotage' });
});

test('badPolicy: leaves witnesses alone', () => {
  const { get, ctx } = setup({
    start_locations: { a: 'Medbay', b: 'Medbay', c: 'Navigation', d: 'Storage', e: 'Medbay', f: 'Storage' },
  });
  assert.deepEqual(badPolicy.chooseAction(get('e'), { ...ctx(), rng: () => 0.5 }), { kind: 'task' });
});

test('badPolicy: spots a kill between actions without touching the random sequence', () => {
  const { get, world } = setup();
  let draws = 0;
  const counting = () => {
    draws++;
    return 0.5;
  };
  assert.equal(badPolicy.chooseKill(get('e'), { view: world.view(), rng: counting }), 'a');
  assert.equal(badPolicy.chooseKill(get('f'), { view: world.view(), rng: counting }), null);
  assert.equal(draws, 0);
});

test('badPolicy: votes against a crewmate, not a partner', () => {
  const { get, ctx } = setup();
  assert.equal(badPolicy.chooseVote(get('e'), ctx()), 'a');
  assert.equal(badPolicy.chooseVote(get('f'), ctx()), 'a');
});

test('badPolicy: frames a crewmate when nothing points at itself', () => {
  const { get, ctx } = setup();
  assert.deepEqual(badPolicy.chooseStatement(get('e'), ctx()), {
    predicate: 'role',
    subject: 'a',
    value: 'bad',
    speaker: 'e',
    timestamp: 0,
  });
});

test('badPolicy: claims a neighbouring room when its room had the body', () => {
  const { world, get, ctx } = setup();
  world.startMeeting('a', ['Reactor']);
  assert.deepEqual(badPolicy.chooseStatement(get('e'), ctx()), {
    predicate: 'location',
    subject: 'e',
    value: 'Medbay',
    speaker: 'e',
    timestamp: 0,
  });
});

test('badPolicy: vouches for its partner when the weights say so', () => {
  const { get, ctx } = setup();
  // Total weight 3 + 2 + 1; a roll of 0.9 lands in the last slot.
  let calls = 0;
  const rng = () => (calls++ < 4 ? 0 : 0.9);
  assert.deepEqual(badPolicy.chooseStatement(get('e'), { ...ctx(), rng }), {
    predicate: 'role',
    subject: 'f',
    value: 'good',
    speaker: 'e',
    timestamp: 0,
  });
});
