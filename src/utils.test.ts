import test from 'node:test';
import assert from 'node:assert/strict';
import { byId, mulberry32, pickOne, shuffleInPlace, uniform, weightedPick } from './utils.js';

test('mulberry32: same seed, same sequence', () => {
  const a = mulberry32(42);
  const b = mulberry32(42);
  const xs = [a(), a(), a()];
  assert.deepEqual(xs, [b(), b(), b()]);
  assert.ok(xs.every(x => x >= 0 && x < 1));
});

test('shuffleInPlace: permutes without losing items', () => {
  const items = ['a', 'b', 'c', 'd', 'e'];
  shuffleInPlace(items, mulberry32(7));
  assert.deepEqual([...items].sort(), ['a', 'b', 'c', 'd', 'e']);
});

test('pickOne and uniform map the random roll onto their range', () => {
  assert.equal(pickOne(['x', 'y', 'z'], () => 0), 'x');
  assert.equal(pickOne(['x', 'y', 'z'], () => 0.99), 'z');
  assert.equal(pickOne([], () => 0), undefined);
  assert.equal(uniform(() => 0.5, [2, 8]), 5);
});

test('weightedPick: skips zero weights and follows the weights', () => {
  const options = [
    { weight: 0, value: 'never' },
    { weight: 3, value: 'frame' },
    { weight: 1, value: 'vouch' },
  ];
  assert.equal(weightedPick(options, () => 0), 'frame');
  assert.equal(weightedPick(options, () => 0.74), 'frame');
  assert.equal(weightedPick(options, () => 0.75), 'vouch');
  assert.equal(weightedPick([{ weight: 0, value: 'never' }], () => 0), undefined);
});

test('byId: orders ids by code point whatever the locale', () => {
  assert.deepEqual(['b', 'B', 'a', 'A', 'npc10', 'npc2'].sort(byId), ['A', 'B', 'a', 'b', 'npc10', 'npc2']);
  assert.equal(byId('x', 'x'), 0);
});
