import { test } from 'node:test';
import assert from 'node:assert/strict';
import { clampScore, roundOneDecimal } from '../src/scoring/math.js';

test('roundOneDecimal sends exact ties to the even digit', () => {
  assert.equal(roundOneDecimal(96.25), 96.2);
  assert.equal(roundOneDecimal(58.75), 58.8);
  assert.equal(roundOneDecimal(0.25), 0.2);
  assert.equal(roundOneDecimal(-2.25), -2.2);
});

test('roundOneDecimal rounds everything else to the nearest tenth', () => {
  assert.equal(roundOneDecimal(47.5), 47.5);
  assert.equal(roundOneDecimal(30.26), 30.3);
  assert.equal(roundOneDecimal(30.14), 30.1);
  assert.equal(roundOneDecimal(100), 100);
  assert.equal(roundOneDecimal(0), 0);
});

test('clampScore keeps scores within 0–100', () => {
  assert.equal(clampScore(-5), 0);
  assert.equal(clampScore(105), 100);
  assert.equal(clampScore(42.5), 42.5);
});
