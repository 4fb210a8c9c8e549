import { clampScore, roundOneDecimal } from './math.js';
import type {
  CodeHealthScore,
  ComplexityMetrics,
  GitMetrics,
  Grade,
  HealthInput,
  OnboardingDifficulty,
  RiskHotspot,
  RiskLevel,
  ScoreBreakdown,
  TestMetrics,
} from '../types.js';

export const COMPONENT_WEIGHTS = {
  complexity:  0.25,
  tests:       0.30,
  gitActivity: 0.15,
  hotspots:    0.20,
  structure:   0.10,
} as const;

// Only A–D and F are reachable; E exists on the grade scale for thresholds.
const GRADE_FLOORS: ReadonlyArray<readonly [number, Grade]> = [
  [90, 'A'],
  [80, 'B'],
  [70, 'C'],
  [60, 'D'],
];

/**
 * Combines the collaborators' signals into a weighted health score with a
 * letter grade. Risk level and onboarding difficulty are separate
 * heuristics, not derived from the overall score.
 *
 * Pure and deterministic: identical input yields an identical result.
 */
export function scoreHealth(input: HealthInput): CodeHealthScore {
  const { complexity, tests, git, hotspots, totalFiles, totalLines } = input;

  const components = {
    complexity:  scoreComplexity(complexity),
    tests:       scoreTests(tests),
    gitActivity: scoreGitActivity(git),
    hotspots:    scoreHotspots(hotspots, totalFiles),
    structure:   scoreStructure(totalFiles, totalLines),
  };

  const overall =
    components.complexity  * COMPONENT_WEIGHTS.complexity  +
    components.tests       * COMPONENT_WEIGHTS.tests       +
    components.gitActivity * COMPONENT_WEIGHTS.gitActivity +
    components.hotspots    * COMPONENT_WEIGHTS.hotspots    +
    components.structure   * COMPONENT_WEIGHTS.structure;

  const scoreBreakdown: ScoreBreakdown = {
    complexity:  roundOneDecimal(components.complexity),
    tests:       roundOneDecimal(components.tests),
    gitActivity: roundOneDecimal(components.gitActivity),
    hotspots:    roundOneDecimal(components.hotspots),
    structure:   roundOneDecimal(components.structure),
    overall:     roundOneDecimal(overall),
  };

  return {
    maintainabilityGrade: scoreToGrade(overall),
    riskLevel:            classifyRisk(hotspots, tests),
    onboardingDifficulty: classifyOnboarding(complexity, totalFiles, tests, git),
    scoreBreakdown,
  };
}

export function scoreToGrade(score: number): Grade {
  for (const [floor, grade] of GRADE_FLOORS) {
    if (score >= floor) return grade;
  }
  return 'F';
}

/** Serialized form of the breakdown, keyed the way reports expect. */
export function breakdownToRecord(breakdown: ScoreBreakdown): Record<string, number> {
  return {
    complexity:   breakdown.complexity,
    tests:        breakdown.tests,
    git_activity: breakdown.gitActivity,
    hotspots:     breakdown.hotspots,
    structure:    breakdown.structure,
    overall:      breakdown.overall,
  };
}

// ─── Components (0–100, higher is healthier) ─────────────────────────────────

export function scoreComplexity(complexity: ComplexityMetrics): number {
  let score = 100;

  if (complexity.avgFileSize > 50_000) score -= 20;
  else if (complexity.avgFileSize > 25_000) score -= 10;

  if (complexity.deepNestingWarning) score -= 15;

  const depth = complexity.maxDirectoryDepth;
  if (depth > 8) score -= 15;
  else if (depth > 6) score -= 10;

  if (depth >= 2 && depth <= 4) score += 5;

  return clampScore(score);
}

export function scoreTests(tests: TestMetrics): number {
  if (!tests.hasTests) return 0;

  const ratio = tests.testRatio;
  let score = 40;

  if (ratio >= 0.5) score += 60;
  else if (ratio >= 0.3) score += 45;
  else if (ratio >= 0.2) score += 30;
  else if (ratio >= 0.1) score += 15;
  else score += 5;

  return clampScore(score);
}

export function scoreGitActivity(git: GitMetrics): number {
  if (!git.isGitRepo) return 50;

  let score = 100;

  if (git.commitCount < 10) score -= 30;
  else if (git.commitCount < 50) score -= 15;

  if (git.contributorCount === 1) score -= 20;
  else if (git.contributorCount === 2) score -= 10;

  const days = git.daysSinceLastCommit;
  if (days !== null) {
    if (days > 365) score -= 30;
    else if (days > 180) score -= 20;
    else if (days > 90) score -= 10;
  }

  return clampScore(score);
}

export function scoreHotspots(hotspots: readonly RiskHotspot[], totalFiles: number): number {
  if (totalFiles === 0) return 100;

  let score = 100;

  const ratio = hotspots.length / totalFiles;
  if (ratio > 0.2) score -= 40;
  else if (ratio > 0.1) score -= 25;
  else if (ratio > 0.05) score -= 15;

  if (hotspots.length > 0) {
    const meanRisk = hotspots.reduce((sum, h) => sum + h.riskScore, 0) / hotspots.length;
    if (meanRisk > 70) score -= 20;
    else if (meanRisk > 50) score -= 10;
  }

  return clampScore(score);
}

export function scoreStructure(totalFiles: number, totalLines: number): number {
  let score = 100;

  if (totalFiles > 0) {
    const linesPerFile = totalLines / totalFiles;
    // Both extremes are penalized, with asymmetric thresholds.
    if (linesPerFile > 1000) score -= 20;
    else if (linesPerFile > 500) score -= 10;
    else if (linesPerFile < 50) score -= 10;
  }

  if (totalFiles >= 10 && totalFiles <= 1000) score += 5;

  return clampScore(score);
}

// ─── Classifications ──────────────────────────────────────────────────────────

export function classifyRisk(hotspots: readonly RiskHotspot[], tests: TestMetrics): RiskLevel {
  let risk = 0;

  if (hotspots.length > 0) {
    const severe = hotspots.filter(h => h.riskScore > 70).length;
    if (severe >= 3) risk += 30;
    else if (severe >= 1) risk += 20;
    else if (hotspots.length >= 5) risk += 10;
  }

  if (!tests.hasTests) risk += 40;
  else if (tests.testRatio < 0.1) risk += 20;

  if (risk >= 50) return 'High';
  if (risk >= 25) return 'Medium';
  return 'Low';
}

export function classifyOnboarding(
  complexity: ComplexityMetrics,
  totalFiles: number,
  tests: TestMetrics,
  git: GitMetrics
): OnboardingDifficulty {
  let difficulty = 0;

  if (totalFiles > 500) difficulty += 30;
  else if (totalFiles > 200) difficulty += 15;

  if (complexity.deepNestingWarning) difficulty += 20;

  if (!tests.hasTests) difficulty += 25;
  else if (tests.testRatio < 0.1) difficulty += 10;

  if (git.isGitRepo && git.daysSinceLastCommit !== null && git.daysSinceLastCommit > 365) {
    difficulty += 15;
  }

  if (difficulty >= 50) return 'Hard';
  if (difficulty >= 25) return 'Moderate';
  return 'Easy';
}
