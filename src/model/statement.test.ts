import test from 'node:test';
import assert from 'node:assert/strict';
import { createStatement, formatStatement } from './statement.js';

test('createStatement: builds a frozen statement', () => {
  const s = createStatement({ predicate: 'role', subject: 'dan', value: 'bad', speaker: 'cy', timestamp: 4 });
  assert.deepEqual(s, { predicate: 'role', subject: 'dan', value: 'bad', speaker: 'cy', timestamp: 4 });
  assert.ok(Object.isFrozen(s));
});

test('createStatement: rejects an empty subject', () => {
  assert.throws(
    () => createStatement({ predicate: 'location', subject: '', value: 'Medbay', speaker: 'cy', timestamp: 0 }),
    /^Error: Invalid statement: subject:/
  );
});

test('createStatement: rejects a negative timestamp', () => {
  assert.throws(
    () => createStatement({ predicate: 'did', subject: 'cy', value: 'task', speaker: 'cy', timestamp: -1 }),
    /Invalid statement: timestamp/
  );
});

test('formatStatement: renders each predicate', () => {
  const at = { speaker: 'bo', timestamp: 0 };
  assert.equal(formatStatement(createStatement({ ...at, predicate: 'role', subject: 'dan', value: 'bad' })), "bo says: dan's role is bad");
  assert.equal(formatStatement(createStatement({ ...at, predicate: 'location', subject: 'bo', value: 'Medbay' })), 'bo says: I was in Medbay');
  assert.equal(formatStatement(createStatement({ ...at, predicate: 'location', subject: 'cy', value: 'Medbay' })), 'bo says: I saw cy in Medbay');
  assert.equal(formatStatement(createStatement({ ...at, predicate: 'did', subject: 'bo', value: 'task' })), 'bo says: I did task');
});
