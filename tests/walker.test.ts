import { test } from 'node:test';
import assert from 'node:assert/strict';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { walkCodebase, rankDirectories } from '../src/scan/walker.js';
import { MetadataCache } from '../src/scan/cache.js';

function makeTree(files: Record<string, string | Uint8Array>): string {
  const root = mkdtempSync(join(tmpdir(), 'codevitals-walk-'));
  for (const [rel, content] of Object.entries(files)) {
    const abs = join(root, rel);
    mkdirSync(dirname(abs), { recursive: true });
    writeFileSync(abs, content);
  }
  return root;
}

const TREE = {
  'src/app.ts':             'a\nb\nc\n',
  'src/util.ts':            'x',
  'README.md':              'hello\n',
  'bin.dat':                Uint8Array.from([0x00, 0x01, 0x02, 0x0a]),
  'node_modules/dep/a.js':  'module.exports = 1;\n',
  '.hidden/secret.ts':      'const s = 1;\n',
  'logs/app.log':           'line\n',
  '.gitignore':             '*.log\n',
};

test('walkCodebase lists analyzable files relative to the root', async () => {
  const root = makeTree(TREE);
  try {
    const walk = await walkCodebase(root);

    assert.deepEqual(walk.files, ['README.md', 'bin.dat', 'src/app.ts', 'src/util.ts']);
    assert.equal(walk.totalFiles, 4);
    assert.equal(walk.totalLines, 5);
    assert.deepEqual([...walk.lineCounts.entries()], [['README.md', 1], ['src/app.ts', 3], ['src/util.ts', 1]]);
    assert.deepEqual([...walk.binaryFiles], ['bin.dat']);
    assert.equal(walk.sizes.get('bin.dat'), 4);
  } finally {
    rmSync(root, { recursive: true, force: true });
  }
});

test('walkCodebase reports language shares and directory counts', async () => {
  const root = makeTree(TREE);
  try {
    const walk = await walkCodebase(root);

    assert.deepEqual(walk.languages, { 'Markdown': 25, '*.dat': 25, 'TypeScript': 50 });
    assert.deepEqual(walk.largestDirs, [
      { directory: '(root)', fileCount: 2 },
      { directory: 'src', fileCount: 2 },
    ]);
  } finally {
    rmSync(root, { recursive: true, force: true });
  }
});

test('walkCodebase reuses cached measurements on the second run', async () => {
  const root = makeTree(TREE);
  try {
    const first = MetadataCache.forRoot(root, true);
    await walkCodebase(root, { cache: first });
    first.save();
    assert.equal(first.stats().hits, 0);
    assert.equal(first.stats().misses, 4);

    const second = MetadataCache.forRoot(root, true);
    const walk = await walkCodebase(root, { cache: second });
    assert.equal(second.stats().hits, 4);
    assert.equal(second.stats().hitRate, 100);
    assert.equal(walk.totalLines, 5);
    assert.deepEqual([...walk.binaryFiles], ['bin.dat']);
  } finally {
    rmSync(root, { recursive: true, force: true });
  }
});

test('a subdirectory scan applies the repository .gitignore', async () => {
  const repo = makeTree({
    '.gitignore':               '*.log\n/pkg/private.ts\n',
    'other/a.ts':               'a\n',
    'pkg/index.ts':             'a\n',
    'pkg/debug.log':            'a\n',
    'pkg/private.ts':           'a\n',
    'pkg/lib/util.ts':          'a\n',
    'pkg/node_modules/dep/a.js': 'a\n',
  });
  try {
    const scanRoot = join(repo, 'pkg');

    const fromRepo = await walkCodebase(scanRoot, { ignoreRoot: repo });
    assert.deepEqual(fromRepo.files, ['index.ts', 'lib/util.ts']);

    const standalone = await walkCodebase(scanRoot);
    assert.deepEqual(standalone.files, ['debug.log', 'index.ts', 'lib/util.ts', 'private.ts']);
  } finally {
    rmSync(repo, { recursive: true, force: true });
  }
});

test('an empty directory yields an empty walk', async () => {
  const root = makeTree({});
  try {
    const walk = await walkCodebase(root);
    assert.deepEqual(walk.files, []);
    assert.equal(walk.totalLines, 0);
    assert.deepEqual(walk.languages, {});
    assert.deepEqual(walk.largestDirs, []);
  } finally {
    rmSync(root, { recursive: true, force: true });
  }
});

test('rankDirectories orders by count, then name', () => {
  const ranked = rankDirectories(new Map([['lib', 3], ['src', 5], ['app', 3]]));
  assert.deepEqual(ranked.map(d => d.directory), ['src', 'app', 'lib']);
});
