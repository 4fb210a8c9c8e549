import { existsSync } from 'fs';
import { join } from 'path';
import { analyzeComplexity } from '../analyzers/complexity.js';
import { detectDependencies } from '../analyzers/dependencies.js';
import { detectTests, findTestFiles } from '../analyzers/test-detector.js';
import { collectGitMetrics, NOT_A_REPOSITORY } from '../git/git-metrics.js';
import { findGitRoot, resolveRepoName } from '../git/log-parser.js';
import { detectHotspots } from '../scoring/hotspot-detector.js';
import { scoreHealth } from '../scoring/health-scorer.js';
import { MetadataCache } from './cache.js';
import { walkCodebase } from './walker.js';
import type { AnalysisResult, ScanConfig } from '../types.js';

export interface AnalyzeHooks {
  /** Called as each stage starts, for progress display. */
  onStep?: (message: string) => void;
  now?: Date;
}

/**
 * Full pipeline: walk → complexity, tests, hotspots, dependencies, git →
 * health score. With `intelligence` off, only the walker's totals are
 * reported.
 */
export async function analyzeCodebase(config: ScanConfig, hooks: AnalyzeHooks = {}): Promise<AnalysisResult> {
  const step = hooks.onStep ?? (() => {});
  const started = Date.now();
  const { root } = config;

  const gitRoot = config.detectGit ? findGitRoot(root) : null;
  const cache = MetadataCache.forRoot(root, config.useCache);
  if (config.clearCache) cache.clear();

  step('Walking source tree...');
  const walk = await walkCodebase(root, { cache, ignoreRoot: gitRoot ?? root });
  cache.save();

  const result: AnalysisResult = {
    repoName:     resolveRepoName(root, gitRoot),
    totalFiles:   walk.totalFiles,
    totalLines:   walk.totalLines,
    languages:    walk.languages,
    largestDirs:  walk.largestDirs,
    scanTime:     0,
    complexity:   null,
    hotspots:     [],
    dependencies: [],
    testMetrics:  null,
    gitMetrics:   null,
    healthScore:  null,
    cacheStats:   cache.stats(),
  };

  if (config.intelligence) {
    step('Measuring complexity...');
    const complexity = analyzeComplexity(walk.files, walk.sizes, walk.binaryFiles);

    step('Detecting tests...');
    const testMetrics = detectTests(walk.files);
    const testFiles = findTestFiles(walk.files);

    step('Ranking hotspots...');
    const hotspots = detectHotspots(walk.lineCounts, testFiles, {
      maxResults: config.maxHotspots,
      directoryExists: dir => existsSync(join(root, dir)),
    });

    step('Reading dependency manifests...');
    const dependencies = detectDependencies(root);

    step('Reading git history...');
    const gitMetrics = config.detectGit ? collectGitMetrics(gitRoot, hooks.now) : NOT_A_REPOSITORY;

    step('Scoring health...');
    const healthScore = scoreHealth({
      complexity,
      tests: testMetrics,
      git: gitMetrics,
      hotspots,
      totalFiles: walk.totalFiles,
      totalLines: walk.totalLines,
    });

    Object.assign(result, { complexity, testMetrics, hotspots, dependencies, gitMetrics, healthScore });
  }

  result.scanTime = (Date.now() - started) / 1000;
  return result;
}
