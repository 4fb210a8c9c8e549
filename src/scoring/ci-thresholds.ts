import { Grades, OnboardingDifficulties, RiskLevels } from './classifications.js';
import type { CIResult, CIThresholds, CodeHealthScore } from '../types.js';

export const EXIT_CODES = {
  PASSED:    0,
  ERROR:     1,
  VIOLATION: 2,
} as const;

export interface RawThresholds {
  failUnder?: string;
  maxRisk?: string;
  maxOnboarding?: string;
}

/**
 * Parses threshold strings as typed on the command line. Matching is
 * case-insensitive; anything that is not a scale member throws
 * {@link InvalidClassificationError}.
 */
export function parseThresholds(raw: RawThresholds): CIThresholds {
  const thresholds: CIThresholds = {};
  if (raw.failUnder !== undefined)     thresholds.minGrade      = Grades.parse(raw.failUnder);
  if (raw.maxRisk !== undefined)       thresholds.maxRisk       = RiskLevels.parse(raw.maxRisk);
  if (raw.maxOnboarding !== undefined) thresholds.maxOnboarding = OnboardingDifficulties.parse(raw.maxOnboarding);
  return thresholds;
}

export function hasThresholds(thresholds: CIThresholds): boolean {
  return thresholds.minGrade !== undefined
    || thresholds.maxRisk !== undefined
    || thresholds.maxOnboarding !== undefined;
}

/**
 * Compares a health score against the supplied bounds. An absent bound is
 * not checked. Without a health score, evaluation passes only when no
 * bound was requested.
 */
export function evaluateThresholds(
  health: CodeHealthScore | null,
  thresholds: CIThresholds
): CIResult {
  if (!health) {
    const requested = hasThresholds(thresholds);
    return {
      passed:           !requested,
      thresholds,
      actualGrade:      null,
      actualRisk:       null,
      actualOnboarding: null,
      failures:         requested
        ? ['Health score not available (run with intelligence enabled)']
        : [],
    };
  }

  const { maintainabilityGrade: grade, riskLevel: risk, onboardingDifficulty: onboarding } = health;
  const failures: string[] = [];

  if (thresholds.minGrade !== undefined && Grades.isWorse(grade, thresholds.minGrade)) {
    failures.push(`Grade ${grade} is below minimum ${thresholds.minGrade}`);
  }

  if (thresholds.maxRisk !== undefined && RiskLevels.isWorse(risk, thresholds.maxRisk)) {
    failures.push(`Risk level ${risk} exceeds maximum ${thresholds.maxRisk}`);
  }

  if (thresholds.maxOnboarding !== undefined
      && OnboardingDifficulties.isWorse(onboarding, thresholds.maxOnboarding)) {
    failures.push(`Onboarding difficulty ${onboarding} exceeds maximum ${thresholds.maxOnboarding}`);
  }

  return {
    passed:           failures.length === 0,
    thresholds,
    actualGrade:      grade,
    actualRisk:       risk,
    actualOnboarding: onboarding,
    failures,
  };
}

export function ciExitCode(result: CIResult): number {
  return result.passed ? EXIT_CODES.PASSED : EXIT_CODES.VIOLATION;
}

/** Only the bounds that were requested and the values that were measured appear. */
export type CIResultJson = {
  passed: boolean;
  thresholds: Record<string, string>;
  actual: Record<string, string>;
  failures: string[];
};

export function ciResultToJson(result: CIResult): CIResultJson {
  const { thresholds } = result;
  const json: CIResultJson = { passed: result.passed, thresholds: {}, actual: {}, failures: [...result.failures] };

  if (thresholds.minGrade)      json.thresholds.min_grade      = thresholds.minGrade;
  if (thresholds.maxRisk)       json.thresholds.max_risk       = thresholds.maxRisk;
  if (thresholds.maxOnboarding) json.thresholds.max_onboarding = thresholds.maxOnboarding;

  if (result.actualGrade)      json.actual.grade                 = result.actualGrade;
  if (result.actualRisk)       json.actual.risk_level            = result.actualRisk;
  if (result.actualOnboarding) json.actual.onboarding_difficulty = result.actualOnboarding;

  return json;
}
