import { test } from 'node:test';
import assert from 'node:assert/strict';
import { errorDocument, formatJson, sortKeys } from '../src/reporters/json.js';

test('formatJson indents by two spaces and ends with a newline', () => {
  assert.equal(
    formatJson({ b: 1, a: [true, null] }),
    '{\n  "b": 1,\n  "a": [\n    true,\n    null\n  ]\n}\n'
  );
});

test('sortKeys orders keys at every level, including inside arrays', () => {
  const sorted = sortKeys({ z: 1, a: { y: 2, b: [{ d: 3, c: 4 }] } });
  assert.equal(formatJson(sorted), formatJson({ a: { b: [{ c: 4, d: 3 }], y: 2 }, z: 1 }));
  assert.deepEqual(Object.keys(sorted), ['a', 'z']);
});

test('errorDocument carries the schema version and a failure flag', () => {
  assert.equal(
    formatJson(sortKeys(errorDocument('Path does not exist: /nowhere'))),
    '{\n  "error": "Path does not exist: /nowhere",\n  "schema_version": "1.0",\n  "success": false\n}\n'
  );
});
