import { test } from 'node:test';
import assert from 'node:assert/strict';
import {
  countLines,
  extensionOf,
  filterFiles,
  gitignoreToGlobs,
  hasBinaryExtension,
  isBinaryContent,
} from '../src/filters/file-filter.js';

test('filterFiles drops hidden, dependency and build paths', () => {
  const files = [
    'src/app.ts',
    '.github/workflows/ci.yml',
    'node_modules/x/index.js',
    'pkg.egg-info/PKG-INFO',
    'src/.hidden.ts',
    'web/dist/bundle.js',
    'build.gradle',
    'lib/__pycache__/mod.pyc',
  ];
  assert.deepEqual(filterFiles(files), ['src/app.ts', 'build.gradle']);
});

test('gitignoreToGlobs translates common patterns', () => {
  const content = [
    '# build output',
    '',
    'node_modules/',
    '/build',
    '*.log',
    'docs/generated/',
    '!keep.log',
    '**/temp',
  ].join('\n');

  assert.deepEqual(gitignoreToGlobs(content), [
    '**/node_modules/**',
    'build', 'build/**',
    '**/*.log', '**/*.log/**',
    'docs/generated/**',
    '**/temp', '**/temp/**',
  ]);
});

test('gitignoreToGlobs handles CRLF line endings', () => {
  assert.deepEqual(gitignoreToGlobs('coverage/\r\n*.tmp\r\n'), ['**/coverage/**', '**/*.tmp', '**/*.tmp/**']);
});

test('countLines counts a trailing unterminated line', () => {
  assert.equal(countLines(Buffer.from('a\nb\n')), 2);
  assert.equal(countLines(Buffer.from('a\nb')), 2);
  assert.equal(countLines(Buffer.from('\n')), 1);
  assert.equal(countLines(Buffer.from('')), 0);
});

test('isBinaryContent detects NUL bytes', () => {
  assert.equal(isBinaryContent(Uint8Array.from([0x48, 0x00, 0x49])), true);
  assert.equal(isBinaryContent(Buffer.from('plain text\n\twith tabs\r\n')), false);
  assert.equal(isBinaryContent(new Uint8Array(0)), false);
});

test('isBinaryContent flags more than 30% control bytes', () => {
  const text = [0x61, 0x62, 0x63, 0x64, 0x65, 0x66, 0x67];
  assert.equal(isBinaryContent(Uint8Array.from([...text, 0x01, 0x02, 0x03])), false);
  assert.equal(isBinaryContent(Uint8Array.from([...text.slice(1), 0x01, 0x02, 0x03, 0x04])), true);
});

test('extensionOf returns the lower-cased last extension', () => {
  assert.equal(extensionOf('src/App.TSX'), '.tsx');
  assert.equal(extensionOf('a/b.tar.gz'), '.gz');
  assert.equal(extensionOf('.gitignore'), '');
  assert.equal(extensionOf('Makefile'), '');
  assert.equal(extensionOf('dir.v1/file'), '');
});

test('hasBinaryExtension knows images and archives', () => {
  assert.ok(hasBinaryExtension('assets/logo.PNG'));
  assert.ok(hasBinaryExtension('release.zip'));
  assert.ok(!hasBinaryExtension('src/app.ts'));
});
