import { test } from 'node:test';
import assert from 'node:assert/strict';
import {
  Grades,
  RiskLevels,
  OnboardingDifficulties,
  GRADES,
} from '../src/scoring/classifications.js';
import { InvalidClassificationError } from '../src/errors.js';

test('grades are ordered A best through F worst', () => {
  assert.deepEqual([...GRADES], ['A', 'B', 'C', 'D', 'E', 'F']);
  assert.equal(Grades.ordinal('A'), 0);
  assert.equal(Grades.ordinal('F'), 5);
  assert.ok(Grades.isBetter('A', 'B'));
  assert.ok(Grades.isWorse('F', 'D'));
  assert.ok(Grades.isBetterOrEqual('C', 'C'));
  assert.ok(Grades.isWorseOrEqual('C', 'C'));
  assert.ok(!Grades.isBetter('C', 'C'));
  assert.ok(!Grades.isWorse('C', 'C'));
});

test('E sits between D and F', () => {
  assert.ok(Grades.isWorse('E', 'D'));
  assert.ok(Grades.isBetter('E', 'F'));
});

test('compare is antisymmetric and zero only for equal values', () => {
  for (const a of Grades.values) {
    for (const b of Grades.values) {
      const ab = Grades.compare(a, b);
      const ba = Grades.compare(b, a);
      assert.equal(Math.sign(ab) + Math.sign(ba), 0);
      assert.equal(ab === 0, a === b);
    }
  }
});

test('risk and onboarding scales run from least to most severe', () => {
  assert.ok(RiskLevels.isBetter('Low', 'Medium'));
  assert.ok(RiskLevels.isWorse('High', 'Medium'));
  assert.ok(OnboardingDifficulties.isBetter('Easy', 'Moderate'));
  assert.ok(OnboardingDifficulties.isWorse('Hard', 'Easy'));
});

test('parse is case-insensitive', () => {
  assert.equal(Grades.parse('b'), 'B');
  assert.equal(RiskLevels.parse('MEDIUM'), 'Medium');
  assert.equal(RiskLevels.parse('low'), 'Low');
  assert.equal(OnboardingDifficulties.parse('mOdErAtE'), 'Moderate');
});

test('parse rejects unknown values, including padded ones', () => {
  assert.throws(() => Grades.parse('G'), InvalidClassificationError);
  assert.throws(() => Grades.parse(''), InvalidClassificationError);
  assert.throws(() => RiskLevels.parse(' low'), InvalidClassificationError);
  assert.throws(() => OnboardingDifficulties.parse('Trivial'), InvalidClassificationError);
});

test('parse error names the input and the accepted values', () => {
  assert.throws(
    () => RiskLevels.parse('Extreme'),
    (err: unknown) => {
      assert.ok(err instanceof InvalidClassificationError);
      assert.equal(err.kind, 'risk level');
      assert.equal(err.input, 'Extreme');
      assert.equal(err.message, 'Invalid risk level: "Extreme" (expected one of Low, Medium, High)');
      return true;
    }
  );
});
