/**
 * Equivalence rule evaluation.
 *
 * Decides whether two values of the same parameter mean the same setting.
 * Every rule is symmetric: evaluateRule(r, a, b) === evaluateRule(r, b, a).
 */

import { normalizeName } from '../registry/ParameterRegistry.js';
import type {
  AxisRule,
  EquivalenceRule,
  ExactRule,
  ParameterValue,
  RawParameterValue,
  SetRule,
  ToleranceRule,
} from '../types/parameter.js';

/**
 * Type guard for exact rule.
 */
function isExactRule(rule: EquivalenceRule): rule is ExactRule {
  return rule.type === 'exact';
}

/**
 * Type guard for tolerance rule.
 */
function isToleranceRule(rule: EquivalenceRule): rule is ToleranceRule {
  return rule.type === 'tolerance';
}

/**
 * Type guard for axis rule.
 */
function isAxisRule(rule: EquivalenceRule): rule is AxisRule {
  return rule.type === 'axis';
}

/**
 * Type guard for set rule.
 */
function isSetRule(rule: EquivalenceRule): rule is SetRule {
  return rule.type === 'set';
}

function isRaw(value: ParameterValue): value is RawParameterValue {
  return value.kind === 'raw';
}

// ============================================================================
// Value helpers
// ============================================================================

/**
 * Text form of a coerced value, folded for comparison.
 */
function foldedText(value: Exclude<ParameterValue, RawParameterValue>): string {
  if (value.kind === 'vector') return value.value.join('\\');
  return normalizeName(String(value.value));
}

function numbersOf(value: Exclude<ParameterValue, RawParameterValue>): readonly number[] | undefined {
  if (value.kind === 'number') return [value.value];
  if (value.kind === 'vector') return value.value;
  return undefined;
}

/**
 * Raw values are equal only when they are the same source value.
 */
export function rawEqual(a: RawParameterValue, b: RawParameterValue): boolean {
  const x = a.value;
  const y = b.value;
  if (x === null || y === null) return x === y;
  if (typeof x === 'object' && typeof y === 'object') {
    return x.length === y.length && x.every((item, i) => item === y[i]);
  }
  return x === y;
}

// ============================================================================
// Rules
// ============================================================================

function exactEqual(
  a: Exclude<ParameterValue, RawParameterValue>,
  b: Exclude<ParameterValue, RawParameterValue>
): boolean {
  if (a.kind === 'number' && b.kind === 'number') return a.value === b.value;
  if (a.kind === 'vector' && b.kind === 'vector') {
    return a.value.length === b.value.length && a.value.every((n, i) => n === b.value[i]);
  }
  return foldedText(a) === foldedText(b);
}

function withinTolerance(
  rule: ToleranceRule,
  a: Exclude<ParameterValue, RawParameterValue>,
  b: Exclude<ParameterValue, RawParameterValue>
): boolean {
  const xs = numbersOf(a);
  const ys = numbersOf(b);
  if (xs === undefined || ys === undefined || xs.length !== ys.length || xs.length === 0) {
    return false;
  }
  return xs.every((x, i) => {
    const y = ys[i];
    if (y === undefined || Number.isNaN(x) || Number.isNaN(y)) return false;
    return Math.abs(x - y) <= rule.tolerance;
  });
}

// Lookup tables are built once per rule object; rules come from the frozen registry.
const classTables = new WeakMap<object, Map<string, string>>();

function classTable(rule: AxisRule | SetRule): Map<string, string> {
  const cached = classTables.get(rule);
  if (cached) return cached;

  const table = new Map<string, string>();
  if (isAxisRule(rule)) {
    for (const [axis, encodings] of Object.entries(rule.axes)) {
      table.set(normalizeName(axis), axis);
      for (const encoding of encodings) table.set(normalizeName(encoding), axis);
    }
  } else {
    rule.classes.forEach((members, index) => {
      for (const member of members) table.set(normalizeName(member), `class:${index}`);
    });
  }
  classTables.set(rule, table);
  return table;
}

/**
 * Same class (axis or partition member), or identical when either value is
 * outside the table.
 */
function sameClass(
  rule: AxisRule | SetRule,
  a: Exclude<ParameterValue, RawParameterValue>,
  b: Exclude<ParameterValue, RawParameterValue>
): boolean {
  const x = foldedText(a);
  const y = foldedText(b);
  if (x === y) return true;
  const table = classTable(rule);
  const classA = table.get(x);
  const classB = table.get(y);
  return classA !== undefined && classA === classB;
}

// ============================================================================
// Evaluation
// ============================================================================

/**
 * Whether two values are equivalent under a rule.
 *
 * A raw value on either side is equal only to an identical raw value, and
 * never under a tolerance rule: a number that failed to parse matches nothing.
 */
export function evaluateRule(rule: EquivalenceRule, a: ParameterValue, b: ParameterValue): boolean {
  if (isRaw(a) || isRaw(b)) {
    return !isToleranceRule(rule) && isRaw(a) && isRaw(b) && rawEqual(a, b);
  }
  if (isExactRule(rule)) return exactEqual(a, b);
  if (isToleranceRule(rule)) return withinTolerance(rule, a, b);
  if (isAxisRule(rule) || isSetRule(rule)) return sameClass(rule, a, b);
  return false;
}
