import test from 'node:test';
import assert from 'node:assert/strict';
import { countBadByAgent, eliminate, enumerateWorlds, initialWorldsFor, validateWorld } from './worlds.js';
import type { WorldState } from './worlds.js';
import type { Role } from '../types.js';

function truthOf(ids: string[], bad: string[]): WorldState {
  const w: Record<string, Role> = {};
  for (const id of ids) w[id] = bad.includes(id) ? 'bad' : 'good';
  return w;
}

const seven = ['a', 'b', 'c', 'd', 'e', 'f', 'g'];

test('enumerateWorlds: every way to pick the bad agents', () => {
  const worlds = enumerateWorlds(['a', 'b', 'c', 'd'], 2);
  assert.equal(worlds.length, 6);
  assert.deepEqual(worlds[0], { a: 'bad', b: 'bad', c: 'good', d: 'good' });
  assert.deepEqual(worlds[5], { a: 'good', b: 'good', c: 'bad', d: 'bad' });
});

test('initialWorldsFor: good agent with six others and two bad roles holds 15 worlds', () => {
  const truth = truthOf(seven, ['f', 'g']);
  const worlds = initialWorldsFor('a', truth);
  assert.equal(worlds.length, 15);
  assert.ok(worlds.every(w => w.a === 'good'));
});

test('initialWorldsFor: eight agents with two bad roles gives 21 worlds to a good agent', () => {
  const ids = [...seven, 'h'];
  assert.equal(initialWorldsFor('a', truthOf(ids, ['g', 'h'])).length, 21);
});

test('initialWorldsFor: a bad agent knows the true world', () => {
  const truth = truthOf(seven, ['f', 'g']);
  const worlds = initialWorldsFor('f', truth);
  assert.equal(worlds.length, 1);
  assert.deepEqual(worlds[0], truth);
});

test('initialWorldsFor: unknown agent throws', () => {
  assert.throws(() => initialWorldsFor('zed', truthOf(seven, ['f'])), /Unknown agent "zed"/);
});

test('validateWorld: rejects missing and unknown ids', () => {
  assert.throws(() => validateWorld({ a: 'good', b: 'bad' }, ['a', 'b', 'c']), /World has no role for: c/);
  assert.throws(() => validateWorld({ a: 'good', b: 'bad', x: 'good' }, ['a', 'b']), /unknown agents: x/);
  validateWorld({ a: 'good', b: 'bad' }, ['a', 'b']);
});

test('eliminate: narrows, reports contradictions and leaves an empty set alone', () => {
  const worlds = enumerateWorlds(['a', 'b', 'c'], 1);

  const narrowed = eliminate(worlds, w => w.a === 'good');
  assert.equal(narrowed.kind, 'narrowed');
  assert.equal(narrowed.worlds.length, 2);

  const same = eliminate(narrowed.worlds, w => w.a === 'good');
  assert.equal(same.kind, 'noop');
  assert.equal(same.worlds, narrowed.worlds);

  const impossible = eliminate(worlds, () => false);
  assert.equal(impossible.kind, 'contradiction');
  assert.equal(impossible.worlds, worlds);

  const empty = eliminate([], () => false);
  assert.equal(empty.kind, 'noop');
  assert.equal(empty.worlds.length, 0);
});

test('countBadByAgent: counts the worlds each agent is bad in', () => {
  const counts = countBadByAgent(enumerateWorlds(['a', 'b', 'c'], 1));
  assert.deepEqual(Object.fromEntries(counts), { a: 1, b: 1, c: 1 });
});
