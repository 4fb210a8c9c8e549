import { InvalidClassificationError } from '../errors.js';

// ─── Ordered Scales ───────────────────────────────────────────────────────────
//
// Each scale is listed best → worst. The ordinal table below is the only
// source of ordering; every comparison is derived from it.

export const GRADES = ['A', 'B', 'C', 'D', 'E', 'F'] as const;
export const RISK_LEVELS = ['Low', 'Medium', 'High'] as const;
export const ONBOARDING_DIFFICULTIES = ['Easy', 'Moderate', 'Hard'] as const;

export type Grade = typeof GRADES[number];
export type RiskLevel = typeof RISK_LEVELS[number];
export type OnboardingDifficulty = typeof ONBOARDING_DIFFICULTIES[number];

export interface OrderedScale<T extends string> {
  readonly kind: string;
  readonly values: readonly T[];
  ordinal(value: T): number;
  /** Negative when `a` is better than `b`, positive when worse, 0 when equal. */
  compare(a: T, b: T): number;
  isBetter(a: T, b: T): boolean;
  isBetterOrEqual(a: T, b: T): boolean;
  isWorse(a: T, b: T): boolean;
  isWorseOrEqual(a: T, b: T): boolean;
  /** Case-insensitive parse of a display string. Throws on anything else. */
  parse(input: string): T;
}

function createScale<T extends string>(kind: string, values: readonly T[]): OrderedScale<T> {
  const ordinals = new Map<T, number>(values.map((value, index) => [value, index]));
  const byLowerCase = new Map<string, T>(values.map(value => [value.toLowerCase(), value]));

  const ordinal = (value: T): number => ordinals.get(value) ?? -1;
  const compare = (a: T, b: T): number => ordinal(a) - ordinal(b);

  return {
    kind,
    values,
    ordinal,
    compare,
    isBetter:        (a, b) => compare(a, b) < 0,
    isBetterOrEqual: (a, b) => compare(a, b) <= 0,
    isWorse:         (a, b) => compare(a, b) > 0,
    isWorseOrEqual:  (a, b) => compare(a, b) >= 0,
    parse(input: string): T {
      const match = byLowerCase.get(input.toLowerCase());
      if (match === undefined) throw new InvalidClassificationError(kind, input, values);
      return match;
    },
  };
}

export const Grades: OrderedScale<Grade> = createScale('grade', GRADES);
export const RiskLevels: OrderedScale<RiskLevel> = createScale('risk level', RISK_LEVELS);
export const OnboardingDifficulties: OrderedScale<OnboardingDifficulty> =
  createScale('onboarding difficulty', ONBOARDING_DIFFICULTIES);
