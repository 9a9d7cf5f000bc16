/**
 * Tests for equivalence rule evaluation.
 */

import { describe, it, expect } from 'vitest';
import { evaluateRule } from './equivalence.js';
import { BUNDLED_REGISTRY_PATH, loadParameterRegistry } from '../registry/ParameterRegistry.js';
import type { EquivalenceRule, ParameterValue } from '../types/parameter.js';

const registry = loadParameterRegistry(BUNDLED_REGISTRY_PATH);

const num = (value: number): ParameterValue => ({ kind: 'number', value });
const str = (value: string): ParameterValue => ({ kind: 'string', value });
const sym = (value: string): ParameterValue => ({ kind: 'enum', value });
const vec = (...value: number[]): ParameterValue => ({ kind: 'vector', value });
const raw = (value: string | null): ParameterValue => ({ kind: 'raw', value, reason: 'test' });

function symmetric(rule: EquivalenceRule, a: ParameterValue, b: ParameterValue): boolean {
  const forward = evaluateRule(rule, a, b);
  expect(evaluateRule(rule, b, a)).toBe(forward);
  return forward;
}

describe('evaluateRule', () => {
  describe('exact', () => {
    const exact: EquivalenceRule = { type: 'exact' };

    it('ignores case and whitespace differences', () => {
      expect(symmetric(exact, str('T1 MPRAGE'), str('t1  mprage'))).toBe(true);
      expect(symmetric(exact, str('T1 MPRAGE'), str('T2 SPACE'))).toBe(false);
    });

    it('compares numbers and vectors exactly', () => {
      expect(symmetric(exact, num(3), num(3))).toBe(true);
      expect(symmetric(exact, num(3), num(3.0001))).toBe(false);
      expect(symmetric(exact, vec(1, 2), vec(1, 2))).toBe(true);
      expect(symmetric(exact, vec(1, 2), vec(1, 2, 3))).toBe(false);
    });
  });

  describe('tolerance', () => {
    const rule = registry.ruleFor('RepetitionTime');

    it('is equal within the tolerance and unequal beyond it', () => {
      expect(symmetric(rule, num(2000), num(2000.005))).toBe(true);
      expect(symmetric(rule, num(2000), num(2000.5))).toBe(false);
    });

    it('never treats NaN as equal', () => {
      expect(symmetric(rule, num(Number.NaN), num(Number.NaN))).toBe(false);
      expect(symmetric(rule, num(Number.NaN), num(2000))).toBe(false);
    });

    it('treats non-numeric values as a mismatch', () => {
      expect(symmetric(rule, str('2000'), num(2000))).toBe(false);
      expect(symmetric(rule, raw('abc'), raw('abc'))).toBe(false);
    });

    it('compares vectors element-wise', () => {
      const spacing = registry.ruleFor('PixelSpacing');
      expect(symmetric(spacing, vec(0.8, 0.8), vec(0.8005, 0.8))).toBe(true);
      expect(symmetric(spacing, vec(0.8, 0.8), vec(0.8, 0.9))).toBe(false);
      expect(symmetric(spacing, vec(0.8, 0.8), vec(0.8))).toBe(false);
    });
  });

  describe('axis', () => {
    const rule = registry.ruleFor('PhaseEncodingDirection');

    it('treats encodings of one axis as equal', () => {
      expect(symmetric(rule, sym('COL'), sym('J-'))).toBe(true);
      expect(symmetric(rule, sym('A >> P'), sym('COL'))).toBe(true);
      expect(symmetric(rule, sym('R >> L'), sym('I'))).toBe(true);
    });

    it('separates different axes', () => {
      expect(symmetric(rule, sym('ROW'), sym('COL'))).toBe(false);
      expect(symmetric(rule, sym('J'), sym('K'))).toBe(false);
    });

    it('falls back to identity outside the table', () => {
      expect(symmetric(rule, sym('OBLIQUE'), sym('oblique'))).toBe(true);
      expect(symmetric(rule, sym('OBLIQUE'), sym('COL'))).toBe(false);
    });
  });

  describe('set', () => {
    const rule = registry.ruleFor('ParallelAcquisitionTechnique');

    it('treats members of one class as equal', () => {
      expect(symmetric(rule, sym('NONE'), sym('OFF'))).toBe(true);
      expect(symmetric(rule, sym('MSENSE'), sym('SENSE'))).toBe(true);
    });

    it('separates classes', () => {
      expect(symmetric(rule, sym('GRAPPA'), sym('SENSE'))).toBe(false);
    });
  });

  describe('raw values', () => {
    const exact: EquivalenceRule = { type: 'exact' };

    it('equals only an identical raw value', () => {
      expect(symmetric(exact, raw('blob'), raw('blob'))).toBe(true);
      expect(symmetric(exact, raw('blob'), raw('BLOB'))).toBe(false);
      expect(symmetric(exact, raw(null), raw(null))).toBe(true);
    });

    it('never equals a coerced value', () => {
      expect(symmetric(exact, raw('blob'), str('blob'))).toBe(false);
    });
  });
});
