import { breakdownToRecord } from '../scoring/health-scorer.js';
import { VERSION } from '../version.js';
import type { AnalysisResult, CacheStats, CodeHealthScore, RiskHotspot } from '../types.js';

export const SCHEMA_VERSION = '1.0';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Schema-versioned document for `scan --json`. Keys are snake_case and
 * sorted at every level so identical results serialize identically.
 */
export function toJsonDocument(result: AnalysisResult): JsonObject {
  const { complexity, testMetrics, gitMetrics } = result;

  const analysis: JsonObject = {
    repo_name:    result.repoName,
    total_files:  result.totalFiles,
    total_lines:  result.totalLines,
    languages:    { ...result.languages },
    largest_dirs: result.largestDirs.map(d => ({ directory: d.directory, file_count: d.fileCount })),
    scan_time:    result.scanTime,
    complexity:   complexity && {
      avg_file_size:        complexity.avgFileSize,
      max_directory_depth:  complexity.maxDirectoryDepth,
      largest_files:        complexity.largestFiles.map(f => ({ file_path: f.filePath, size_bytes: f.sizeBytes })),
      deep_nesting_warning: complexity.deepNestingWarning,
    },
    hotspots:     result.hotspots.map(hotspotToJson),
    dependencies: result.dependencies.map(d => ({
      ecosystem:        d.ecosystem,
      manifest_file:    d.manifestFile,
      dependency_count: d.dependencyCount,
      dependencies:     [...d.dependencies],
    })),
    test_metrics: testMetrics && {
      has_tests:         testMetrics.hasTests,
      test_file_count:   testMetrics.testFileCount,
      source_file_count: testMetrics.sourceFileCount,
      test_ratio:        testMetrics.testRatio,
    },
    git_metrics:  gitMetrics && {
      commit_count:           gitMetrics.commitCount,
      contributor_count:      gitMetrics.contributorCount,
      days_since_last_commit: gitMetrics.daysSinceLastCommit,
      is_git_repo:            gitMetrics.isGitRepo,
    },
    health_score: result.healthScore && healthToJson(result.healthScore),
    cache_stats:  result.cacheStats && cacheStatsToJson(result.cacheStats),
  };

  return sortKeys({
    schema_version:     SCHEMA_VERSION,
    codevitals_version: VERSION,
    analysis,
  });
}

export function errorDocument(message: string): JsonObject {
  return { schema_version: SCHEMA_VERSION, error: message, success: false };
}

export function hotspotToJson(hotspot: RiskHotspot): JsonObject {
  return {
    file_path:        hotspot.filePath,
    risk_score:       hotspot.riskScore,
    lines_of_code:    hotspot.linesOfCode,
    depth:            hotspot.depth,
    has_nearby_tests: hotspot.hasNearbyTests,
    reason:           hotspot.reason,
  };
}

export function healthToJson(health: CodeHealthScore): JsonObject {
  return {
    maintainability_grade: health.maintainabilityGrade,
    risk_level:            health.riskLevel,
    onboarding_difficulty: health.onboardingDifficulty,
    score_breakdown:       breakdownToRecord(health.scoreBreakdown),
  };
}

export function cacheStatsToJson(stats: CacheStats): JsonObject {
  return {
    enabled:             stats.enabled,
    hits:                stats.hits,
    misses:              stats.misses,
    total_files:         stats.totalFiles,
    time_saved_estimate: stats.timeSavedEstimate,
    hit_rate:            stats.hitRate,
  };
}

export function sortKeys(value: JsonObject): JsonObject;
export function sortKeys(value: JsonValue): JsonValue;
export function sortKeys(value: JsonValue): JsonValue {
  if (Array.isArray(value)) return value.map(item => sortKeys(item));
  if (value === null || typeof value !== 'object') return value;

  const sorted: JsonObject = {};
  for (const key of Object.keys(value).sort()) {
    const child = value[key];
    if (child !== undefined) sorted[key] = sortKeys(child);
  }
  return sorted;
}

/** Two-space indented JSON with a trailing newline. */
export function formatJson(document: JsonValue): string {
  return JSON.stringify(document, null, 2) + '\n';
}

export function reportJson(document: JsonValue): void {
  process.stdout.write(formatJson(document));
}
