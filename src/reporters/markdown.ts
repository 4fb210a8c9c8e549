import { cacheStatsToJson, type JsonObject } from './json.js';
import type { AnalysisResult, OnboardingDifficulty, RiskLevel } from '../types.js';

// ─── Badges ───────────────────────────────────────────────────────────────────

export const CI_ENV_VARS = [
  'CI',
  'GITHUB_ACTIONS',
  'GITLAB_CI',
  'CIRCLECI',
  'TRAVIS',
  'JENKINS_HOME',
  'BUILDKITE',
] as const;

/** True when any of the usual CI markers is set to a non-empty value. */
export function isCiEnvironment(env: NodeJS.ProcessEnv = process.env): boolean {
  return CI_ENV_VARS.some(name => Boolean(env[name]));
}

const GRADE_COLORS: Record<string, string> = {
  A: 'brightgreen',
  B: 'green',
  C: 'yellowgreen',
  D: 'yellow',
  E: 'orange',
  F: 'red',
};

const RISK_COLORS: Record<RiskLevel, string> = {
  Low:    'green',
  Medium: 'orange',
  High:   'red',
};

const ONBOARDING_COLORS: Record<OnboardingDifficulty, string> = {
  Easy:     'blue',
  Moderate: 'yellow',
  Hard:     'red',
};

export function gradeColor(grade: string): string {
  return GRADE_COLORS[grade.toUpperCase()] ?? 'lightgrey';
}

export function riskColor(risk: RiskLevel): string {
  return RISK_COLORS[risk];
}

export function onboardingColor(difficulty: OnboardingDifficulty): string {
  return ONBOARDING_COLORS[difficulty];
}

export function cacheColor(hitRate: number): string {
  if (hitRate >= 90) return 'success';
  if (hitRate >= 70) return 'green';
  if (hitRate >= 50) return 'yellow';
  return 'orange';
}

export function badgeUrl(label: string, message: string, color: string): string {
  return `https://img.shields.io/badge/${encodeURIComponent(label)}-${encodeURIComponent(message)}-${color}`;
}

export interface Badges {
  maintainability?: string;
  risk?: string;
  onboarding?: string;
  cache?: string;
}

export interface FormatOptions {
  /** Running under CI; a cold cache is then shown as such instead of 0%. */
  isCi?: boolean;
}

export function generateBadges(result: AnalysisResult, options: FormatOptions = {}): Badges {
  const badges: Badges = {};
  const health = result.healthScore;

  if (health) {
    const grade = health.maintainabilityGrade;
    badges.maintainability = badgeUrl('maintainability', grade, gradeColor(grade));
    badges.risk            = badgeUrl('risk', health.riskLevel, riskColor(health.riskLevel));
    badges.onboarding      = badgeUrl('onboarding', health.onboardingDifficulty, onboardingColor(health.onboardingDifficulty));
  }

  const cache = result.cacheStats;
  if (cache?.enabled) {
    badges.cache = options.isCi && cache.hitRate < 10
      ? badgeUrl('cache', 'cold', 'lightgrey')
      : badgeUrl('cache', `${cache.hitRate.toFixed(0)}%`, cacheColor(cache.hitRate));
  }

  return badges;
}

// ─── Fragments ────────────────────────────────────────────────────────────────

/** `TypeScript (45%) · Python (33%) · Go (12%)`, highest share first. */
export function formatLanguages(languages: Record<string, number>, maxLanguages = 3): string {
  return Object.entries(languages)
    .sort((a, b) => b[1] - a[1])
    .slice(0, maxLanguages)
    .map(([name, pct]) => `${name} (${pct.toFixed(0)}%)`)
    .join(' · ');
}

/** Distinct ecosystems, alphabetical, or `None`. */
export function formatEcosystems(result: AnalysisResult): string {
  if (result.dependencies.length === 0) return 'None';
  return [...new Set(result.dependencies.map(d => d.ecosystem))].sort().join(' · ');
}

export function formatDaysSinceCommit(days: number | null): string {
  if (days === null) return 'N/A';
  if (days === 0) return 'today';
  if (days === 1) return '1 day ago';
  return `${days} days ago`;
}

function formatCount(n: number): string {
  return n.toLocaleString('en-US');
}

// ─── Summaries ────────────────────────────────────────────────────────────────

const REPORT_HEADING = '## 🔍 Codevitals Report\n';

export interface MarkdownOptions extends FormatOptions {
  includeBadges?: boolean;
}

export function markdownSummary(result: AnalysisResult, options: MarkdownOptions = {}): string {
  const lines = [REPORT_HEADING];

  if (options.includeBadges) {
    for (const url of Object.values(generateBadges(result, options))) {
      if (url) lines.push(`![Badge](${url})`);
    }
    lines.push('');
  }

  lines.push(`**Repo:** ${result.repoName || 'unknown'}  `);
  lines.push(`**Files:** ${formatCount(result.totalFiles)}  `);
  lines.push(`**Lines:** ${formatCount(result.totalLines)}  `);
  pushLanguages(lines, result);
  pushHealth(lines, result);

  if (result.testMetrics) {
    lines.push(`**Tests:** ${result.testMetrics.testRatio.toFixed(2)} ratio  `);
  }
  if (result.dependencies.length > 0) {
    lines.push(`**Dependencies:** ${formatEcosystems(result)}  `);
  }

  pushLastCommit(lines, result);
  pushTopHotspot(lines, result);

  let cacheInfo = '';
  if (result.cacheStats?.enabled && result.cacheStats.hitRate > 0) {
    cacheInfo = ` (cache: ${result.cacheStats.hitRate.toFixed(0)}% hit rate)`;
  }
  lines.push(`⚡ Scan time: ${result.scanTime.toFixed(2)}s${cacheInfo}`);

  return lines.join('\n');
}

/** `Codevitals: B · Low risk · Easy onboarding · 0.35 tests · 1.20s ⚡` */
export function compactSummary(result: AnalysisResult): string {
  const parts = ['Codevitals:'];
  const health = result.healthScore;

  if (health) {
    parts.push(`${health.maintainabilityGrade} · ${health.riskLevel} risk · ${health.onboardingDifficulty} onboarding`);
  }
  if (result.testMetrics) {
    parts.push(`· ${result.testMetrics.testRatio.toFixed(2)} tests`);
  }
  parts.push(`· ${result.scanTime.toFixed(2)}s ⚡`);

  return parts.join(' ');
}

/**
 * Markdown block for README injection. Repeated runs over an unchanged
 * tree produce identical text: no cache badge and, unless asked for, no
 * timing.
 */
export function healthBlock(result: AnalysisResult, options: { includeTiming?: boolean } = {}): string {
  const lines = [REPORT_HEADING];

  const badges = generateBadges(result);
  for (const url of [badges.maintainability, badges.risk, badges.onboarding]) {
    if (url) lines.push(`![Badge](${url})`);
  }
  lines.push('');

  lines.push(`**Repo:** ${result.repoName || 'Unknown'}  `);
  lines.push(`**Files:** ${result.totalFiles}  `);
  lines.push(`**Lines:** ${result.totalLines}  `);
  pushLanguages(lines, result);
  pushHealth(lines, result);

  if (result.testMetrics) {
    lines.push(`**Tests:** ${result.testMetrics.testRatio.toFixed(2)} ratio  `);
  }

  pushLastCommit(lines, result);
  pushTopHotspot(lines, result);

  if (options.includeTiming) {
    lines.push(`⚡ Scan time: ${result.scanTime.toFixed(2)}s\n`);
  }

  return lines.join('\n');
}

/** Flat summary for bots and integrations (`summary --json`). */
export function jsonSummary(result: AnalysisResult, options: FormatOptions = {}): JsonObject {
  const summary: JsonObject = {
    repo:        result.repoName,
    total_files: result.totalFiles,
    total_lines: result.totalLines,
    languages:   { ...result.languages },
    scan_time:   result.scanTime,
  };

  const health = result.healthScore;
  if (health) {
    summary.health = {
      grade:      health.maintainabilityGrade,
      score:      health.scoreBreakdown.overall,
      risk:       health.riskLevel,
      onboarding: health.onboardingDifficulty,
    };
  }

  if (result.testMetrics) summary.test_ratio = result.testMetrics.testRatio;

  const top = result.hotspots[0];
  if (top) {
    summary.top_hotspot = {
      file_path:     top.filePath,
      lines_of_code: top.linesOfCode,
      reason:        top.reason,
      risk_score:    top.riskScore,
    };
  }

  if (result.dependencies.length > 0) {
    summary.dependencies = result.dependencies.map(d => d.ecosystem);
  }

  if (result.gitMetrics) {
    summary.git = {
      is_repo:           result.gitMetrics.isGitRepo,
      days_since_commit: result.gitMetrics.daysSinceLastCommit,
    };
  }

  if (result.cacheStats) summary.cache = cacheStatsToJson(result.cacheStats);

  const badges: JsonObject = {};
  for (const [name, url] of Object.entries(generateBadges(result, options))) {
    if (url !== undefined) badges[name] = url;
  }
  summary.badges = badges;

  return summary;
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

function pushLanguages(lines: string[], result: AnalysisResult): void {
  if (Object.keys(result.languages).length > 0) {
    lines.push(`**Languages:** ${formatLanguages(result.languages)}\n`);
  } else {
    lines.push('');
  }
}

function pushHealth(lines: string[], result: AnalysisResult): void {
  const health = result.healthScore;
  if (!health) return;
  lines.push(`**Health:** ${health.maintainabilityGrade} (${health.scoreBreakdown.overall.toFixed(1)})  `);
  lines.push(`**Risk:** ${health.riskLevel}  `);
  lines.push(`**Onboarding:** ${health.onboardingDifficulty}  \n`);
}

function pushLastCommit(lines: string[], result: AnalysisResult): void {
  if (result.gitMetrics?.isGitRepo) {
    lines.push(`**Last commit:** ${formatDaysSinceCommit(result.gitMetrics.daysSinceLastCommit)}  \n`);
  } else {
    lines.push('');
  }
}

function pushTopHotspot(lines: string[], result: AnalysisResult): void {
  const top = result.hotspots[0];
  if (top) {
    lines.push(`**Top hotspot:** ${top.filePath} (${top.linesOfCode} LOC, ${top.reason})\n`);
  }
}
