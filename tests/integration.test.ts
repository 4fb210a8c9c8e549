/**
 * codevitals — Integration Tests
 *
 * Builds a small project tree under the OS temp directory and runs the full
 * analysis pipeline over it. Git detection is off, so no repository or
 * network access is needed.
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { basename, dirname, join } from 'path';
import type { ScanConfig } from '../src/types.js';
import type { JsonObject, JsonValue } from '../src/reporters/json.js';

// ── Fixture tree ───────────────────────────────────────────────────────────────

const FILES: Record<string, string> = {
  'README.md':         '# Demo\n\ntext\n',
  'package.json':      JSON.stringify({ dependencies: { zod: '^3.0.0' } }),
  'src/app.ts':        'const x = 1;\n'.repeat(600),
  'src/util.ts':       'export {};\n'.repeat(10),
  'tests/app.test.ts': 'test\n'.repeat(20),
};

function makeProject(): string {
  const root = mkdtempSync(join(tmpdir(), 'codevitals-it-'));
  for (const [rel, content] of Object.entries(FILES)) {
    const abs = join(root, rel);
    mkdirSync(dirname(abs), { recursive: true });
    writeFileSync(abs, content);
  }
  return root;
}

function config(root: string, overrides: Partial<ScanConfig> = {}): ScanConfig {
  return {
    root,
    detectGit:    false,
    intelligence: true,
    useCache:     false,
    clearCache:   false,
    maxHotspots:  10,
    ...overrides,
  };
}

function objectAt(value: JsonValue | undefined): JsonObject {
  assert.ok(value !== undefined && value !== null && typeof value === 'object' && !Array.isArray(value));
  return value;
}

// ── Pipeline ───────────────────────────────────────────────────────────────────

test('analyzeCodebase scores a small project end to end', async () => {
  const { analyzeCodebase } = await import('../src/scan/analyzer.js');
  const root = makeProject();
  try {
    const result = await analyzeCodebase(config(root));

    assert.equal(result.repoName, basename(root));
    assert.equal(result.totalFiles, 5);
    assert.equal(result.totalLines, 634);
    assert.deepEqual(result.largestDirs.map(d => d.directory), ['(root)', 'src', 'tests']);

    assert.deepEqual(result.testMetrics, { hasTests: true, testFileCount: 1, sourceFileCount: 2, testRatio: 0.5 });
    assert.deepEqual(result.gitMetrics, { commitCount: 0, contributorCount: 0, daysSinceLastCommit: null, isGitRepo: false });

    // Root-level files have no directory to hold a sibling tests/ folder.
    assert.deepEqual(
      result.hotspots.map(h => [h.filePath, h.riskScore, h.hasNearbyTests]),
      [
        ['src/app.ts', 47.5, true],
        ['README.md', 30.3, false],
        ['package.json', 30.1, false],
      ]
    );

    assert.deepEqual(result.dependencies, [
      { ecosystem: 'JavaScript/Node.js', manifestFile: 'package.json', dependencyCount: 1, dependencies: ['zod'] },
    ]);

    assert.deepEqual(result.healthScore, {
      maintainabilityGrade: 'B',
      riskLevel:            'Low',
      onboardingDifficulty: 'Easy',
      scoreBreakdown: {
        complexity:  100,
        tests:       100,
        gitActivity: 50,
        hotspots:    60,
        structure:   100,
        overall:     84.5,
      },
    });
    assert.equal(result.cacheStats?.enabled, false);
  } finally {
    rmSync(root, { recursive: true, force: true });
  }
});

test('basic mode reports totals without scoring', async () => {
  const { analyzeCodebase } = await import('../src/scan/analyzer.js');
  const root = makeProject();
  try {
    const result = await analyzeCodebase(config(root, { intelligence: false }));

    assert.equal(result.totalFiles, 5);
    assert.equal(result.healthScore, null);
    assert.equal(result.complexity, null);
    assert.equal(result.testMetrics, null);
    assert.deepEqual(result.hotspots, []);
  } finally {
    rmSync(root, { recursive: true, force: true });
  }
});

test('a second cached run hits for every file', async () => {
  const { analyzeCodebase } = await import('../src/scan/analyzer.js');
  const root = makeProject();
  try {
    const first = await analyzeCodebase(config(root, { useCache: true }));
    assert.equal(first.cacheStats?.hitRate, 0);

    const second = await analyzeCodebase(config(root, { useCache: true }));
    assert.equal(second.cacheStats?.hits, 5);
    assert.equal(second.cacheStats?.hitRate, 100);
    assert.deepEqual(second.healthScore, first.healthScore);

    const cleared = await analyzeCodebase(config(root, { useCache: true, clearCache: true }));
    assert.equal(cleared.cacheStats?.hits, 0);
  } finally {
    rmSync(root, { recursive: true, force: true });
  }
});

test('analysis is deterministic apart from timing', async () => {
  const { analyzeCodebase } = await import('../src/scan/analyzer.js');
  const root = makeProject();
  try {
    const a = await analyzeCodebase(config(root));
    const b = await analyzeCodebase(config(root));
    assert.deepEqual({ ...a, scanTime: 0 }, { ...b, scanTime: 0 });
  } finally {
    rmSync(root, { recursive: true, force: true });
  }
});

// ── Output documents ───────────────────────────────────────────────────────────

test('toJsonDocument produces a sorted, schema-versioned document', async () => {
  const { analyzeCodebase } = await import('../src/scan/analyzer.js');
  const { toJsonDocument } = await import('../src/reporters/json.js');
  const { VERSION } = await import('../src/version.js');
  const root = makeProject();
  try {
    const doc = toJsonDocument(await analyzeCodebase(config(root)));

    assert.deepEqual(Object.keys(doc), ['analysis', 'codevitals_version', 'schema_version']);
    assert.equal(doc.schema_version, '1.0');
    assert.equal(doc.codevitals_version, VERSION);

    const analysis = objectAt(doc.analysis);
    assert.deepEqual(Object.keys(analysis), [
      'cache_stats',
      'complexity',
      'dependencies',
      'git_metrics',
      'health_score',
      'hotspots',
      'languages',
      'largest_dirs',
      'repo_name',
      'scan_time',
      'test_metrics',
      'total_files',
      'total_lines',
    ]);

    const health = objectAt(analysis.health_score);
    assert.deepEqual(Object.keys(health), [
      'maintainability_grade',
      'onboarding_difficulty',
      'risk_level',
      'score_breakdown',
    ]);
    assert.deepEqual(health.score_breakdown, {
      complexity:   100,
      git_activity: 50,
      hotspots:     60,
      overall:      84.5,
      structure:    100,
      tests:        100,
    });
    assert.equal(health.maintainability_grade, 'B');

    const dirs = analysis.largest_dirs;
    assert.ok(Array.isArray(dirs));
    assert.deepEqual(dirs[0], { directory: '(root)', file_count: 2 });
    assert.deepEqual(analysis.git_metrics, {
      commit_count: 0, contributor_count: 0, days_since_last_commit: null, is_git_repo: false,
    });
  } finally {
    rmSync(root, { recursive: true, force: true });
  }
});

test('CI gate and README block work from a real analysis', async () => {
  const { analyzeCodebase } = await import('../src/scan/analyzer.js');
  const { evaluateThresholds, parseThresholds } = await import('../src/scoring/ci-thresholds.js');
  const { healthBlock } = await import('../src/reporters/markdown.js');
  const { injectHealthBlock, DEFAULT_MARKERS } = await import('../src/reporters/readme-inject.js');
  const root = makeProject();
  try {
    const result = await analyzeCodebase(config(root));

    const strict = evaluateThresholds(result.healthScore, parseThresholds({ failUnder: 'a' }));
    assert.deepEqual(strict.failures, ['Grade B is below minimum A']);

    const lenient = evaluateThresholds(result.healthScore, parseThresholds({ failUnder: 'c', maxRisk: 'low' }));
    assert.equal(lenient.passed, true);

    const readme = `# Demo\n\n${DEFAULT_MARKERS.start}\n${DEFAULT_MARKERS.end}\n`;
    const updated = injectHealthBlock(readme, healthBlock(result));
    assert.equal(updated.status, 'updated');

    const again = injectHealthBlock(updated.content, healthBlock(await analyzeCodebase(config(root))));
    assert.equal(again.status, 'unchanged');
  } finally {
    rmSync(root, { recursive: true, force: true });
  }
});
