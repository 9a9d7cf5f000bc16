/**
 * Parameter construction and display helpers.
 */

import type { ParameterDefinition } from '../registry/ParameterRegistry.js';
import type {
  AbsentValue,
  EquivalenceRule,
  Parameter,
  ParameterValue,
  RawValue,
} from '../types/parameter.js';
import { coerceValue, toRaw } from './coercion.js';

/** Unrecognized parameters compare by raw equality when a caller asks for them. */
export const RAW_EQUALITY_RULE: EquivalenceRule = Object.freeze({ type: 'exact' });

export interface ParameterInit {
  name: string;
  value: ParameterValue;
  rule: EquivalenceRule;
  recognized: boolean;
  unit?: string | undefined;
  acronym?: string | undefined;
}

export function createParameter(init: ParameterInit): Parameter {
  return Object.freeze({
    name: init.name,
    value: init.value,
    rule: init.rule,
    recognized: init.recognized,
    ...(init.unit !== undefined ? { unit: init.unit } : {}),
    ...(init.acronym !== undefined ? { acronym: init.acronym } : {}),
  });
}

/**
 * Build a recognized parameter by coercing a source value to its declared kind.
 *
 * `unit` is the unit the source reported separately (XML ValueAndUnit);
 * a unit embedded in the value string is picked up by coercion.
 */
export function parameterFromDefinition(
  definition: ParameterDefinition,
  raw: RawValue,
  unit?: string
): Parameter {
  const coerced = coerceValue(definition, raw, unit);
  return createParameter({
    name: definition.name,
    value: coerced.value,
    rule: definition.rule,
    recognized: true,
    unit: coerced.unit ?? unit,
    acronym: definition.acronym,
  });
}

export function unrecognizedParameter(name: string, raw: RawValue, unit?: string): Parameter {
  return createParameter({
    name,
    value: toRaw(raw, 'unrecognized parameter'),
    rule: RAW_EQUALITY_RULE,
    recognized: false,
    unit,
  });
}

/**
 * Plain JavaScript form of a value (what a caller would have put in a dict).
 */
export function plainValue(value: ParameterValue): RawValue {
  switch (value.kind) {
    case 'number':
    case 'string':
    case 'enum':
      return value.value;
    case 'vector':
      return [...value.value];
    case 'raw':
      return value.value;
  }
}

export function formatValue(value: ParameterValue | AbsentValue): string {
  switch (value.kind) {
    case 'absent':
      return '<absent>';
    case 'vector':
      return `[${value.value.join(', ')}]`;
    case 'raw': {
      const inner = value.value;
      if (inner === null) return '<empty>';
      if (typeof inner === 'object') return `[${inner.join(', ')}]`;
      return String(inner);
    }
    default:
      return String(value.value);
  }
}
