import { test } from 'node:test';
import assert from 'node:assert/strict';
import { injectHealthBlock, DEFAULT_MARKERS } from '../src/reporters/readme-inject.js';

const README = [
  '# Widgets',
  '',
  DEFAULT_MARKERS.start,
  'stale content',
  DEFAULT_MARKERS.end,
  '',
  'Footer',
  '',
].join('\n');

test('replaces the content between the markers', () => {
  const result = injectHealthBlock(README, 'NEW BLOCK');
  assert.equal(result.status, 'updated');
  assert.equal(result.content, [
    '# Widgets',
    '',
    DEFAULT_MARKERS.start,
    'NEW BLOCK',
    DEFAULT_MARKERS.end,
    '',
    'Footer',
    '',
  ].join('\n'));
});

test('injecting the same block twice is a no-op', () => {
  const first = injectHealthBlock(README, 'NEW BLOCK\n');
  const second = injectHealthBlock(first.content, 'NEW BLOCK\n');
  assert.equal(second.status, 'unchanged');
  assert.equal(second.content, first.content);
});

test('adjacent markers gain a block on its own line', () => {
  const content = 'intro <!-- S --><!-- E --> outro';
  const result = injectHealthBlock(content, 'B', { start: '<!-- S -->', end: '<!-- E -->' });
  assert.equal(result.status, 'updated');
  assert.equal(result.content, 'intro <!-- S -->\nB\n<!-- E --> outro');
});

test('missing markers leave the content untouched', () => {
  const result = injectHealthBlock('# No markers here\n', 'B');
  assert.deepEqual(result, { status: 'missing-markers', content: '# No markers here\n' });

  const onlyStart = `${DEFAULT_MARKERS.start}\n`;
  assert.equal(injectHealthBlock(onlyStart, 'B').status, 'missing-markers');
});

test('an end marker before the start marker is rejected', () => {
  const content = `${DEFAULT_MARKERS.end}\n${DEFAULT_MARKERS.start}\n`;
  assert.deepEqual(injectHealthBlock(content, 'B'), { status: 'invalid-markers', content });
});
