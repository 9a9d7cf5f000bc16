/**
 * Coercion of source values into the declared parameter kind.
 *
 * Coercion never throws: a value that does not fit its declared kind comes
 * back as a `raw` variant carrying the reason.
 */

import type { ParameterDefinition } from '../registry/ParameterRegistry.js';
import type { ParameterValue, RawParameterValue, RawValue } from '../types/parameter.js';

/** Unit suffixes found in vendor exports, longest first. */
const UNIT_SUFFIXES = ['Hz/Px', 'deg', 'ms', 'mm', 'us', '%', 'T', 's'] as const;

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export interface CoercedValue {
  value: ParameterValue;
  unit?: string;
}

export function parseNumber(text: string): number | undefined {
  const trimmed = text.trim();
  if (!NUMBER_PATTERN.test(trimmed)) return undefined;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Split "2000 ms" into value and unit. The suffix is only taken as a unit
 * when what precedes it is numeric, so "GRAPPA" or "3D" pass through whole.
 */
export function splitValueAndUnit(text: string): { value: string; unit?: string } {
  const trimmed = text.trim();
  for (const suffix of UNIT_SUFFIXES) {
    if (!trimmed.endsWith(suffix)) continue;
    const head = trimmed.slice(0, -suffix.length).trim();
    if (head.length > 0 && parseNumberList(head) !== undefined) {
      return { value: head, unit: suffix };
    }
  }
  return { value: trimmed };
}

/**
 * Parse "1\2\3", "1, 2, 3" or "[1, 2, 3]" into numbers.
 */
export function parseNumberList(text: string): number[] | undefined {
  const inner = text.trim().replace(/^\[(.*)\]$/s, '$1');
  const parts = inner.split(/[\\,;]|\s+/).filter((p) => p.length > 0);
  if (parts.length === 0) return undefined;
  const values: number[] = [];
  for (const part of parts) {
    const n = parseNumber(part);
    if (n === undefined) return undefined;
    values.push(n);
  }
  return values;
}

function isList(value: RawValue): value is ReadonlyArray<string | number> {
  return Array.isArray(value);
}

export function toRaw(value: RawValue, reason: string): RawParameterValue {
  if (value === undefined) return { kind: 'raw', value: null, reason };
  if (isList(value)) return { kind: 'raw', value: Object.freeze([...value]), reason };
  return { kind: 'raw', value, reason };
}

function isEmpty(value: RawValue): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'string') return value.trim().length === 0;
  if (isList(value)) return value.length === 0;
  return false;
}

/**
 * A raw value carrying nothing: null, undefined, blank text or an empty list.
 */
export function isEmptyValue(value: ParameterValue): boolean {
  return value.kind === 'raw' && isEmpty(value.value);
}

function numbersFrom(value: RawValue): { values: number[]; unit?: string } | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? { values: [value] } : undefined;
  }
  if (typeof value === 'string') {
    const split = splitValueAndUnit(value);
    const values = parseNumberList(split.value);
    if (values === undefined) return undefined;
    return split.unit !== undefined ? { values, unit: split.unit } : { values };
  }
  if (isList(value)) {
    const values: number[] = [];
    for (const item of value) {
      const n = typeof item === 'number' ? item : parseNumber(item);
      if (n === undefined || !Number.isFinite(n)) return undefined;
      values.push(n);
    }
    return { values };
  }
  return undefined;
}

function textFrom(value: RawValue): string | undefined {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number') return Number.isFinite(value) ? String(value) : undefined;
  if (isList(value)) return value.map((v) => String(v).trim()).join('\\');
  return undefined;
}

function coerceNumeric(
  definition: ParameterDefinition,
  raw: RawValue,
  allowScalar: boolean,
  sourceUnit: string | undefined
): CoercedValue {
  const parsed = numbersFrom(raw);
  if (parsed === undefined) {
    return { value: toRaw(raw, `expected ${definition.kind} for ${definition.name}`) };
  }
  const reported = parsed.unit ?? sourceUnit;
  if (reported !== undefined && definition.unit !== undefined && reported !== definition.unit) {
    return { value: toRaw(raw, `unit '${reported}' does not match declared '${definition.unit}'`) };
  }
  const unit = reported ?? definition.unit;
  const [first] = parsed.values;
  const value: ParameterValue =
    allowScalar && parsed.values.length === 1 && first !== undefined
      ? { kind: 'number', value: first }
      : { kind: 'vector', value: Object.freeze(parsed.values) };
  return unit !== undefined ? { value, unit } : { value };
}

/**
 * Coerce a source value to the kind the registry declares. Without a
 * definition the value is kept raw as an unrecognized parameter.
 *
 * `sourceUnit` is a unit the source reported beside the value.
 */
export function coerceValue(
  definition: ParameterDefinition | undefined,
  raw: RawValue,
  sourceUnit?: string
): CoercedValue {
  if (definition === undefined) {
    return { value: toRaw(raw, 'unrecognized parameter') };
  }
  if (isEmpty(raw)) {
    return { value: toRaw(raw, 'empty value') };
  }
  if (typeof raw === 'boolean') {
    return { value: toRaw(raw, `boolean is not a valid ${definition.kind}`) };
  }

  switch (definition.kind) {
    case 'number':
      return coerceNumeric(definition, raw, true, sourceUnit);
    case 'vector':
      return coerceNumeric(definition, raw, false, sourceUnit);
    case 'enum': {
      const text = textFrom(raw);
      if (text === undefined || text.length === 0) {
        return { value: toRaw(raw, `expected enum for ${definition.name}`) };
      }
      const symbol = text.toUpperCase();
      if (definition.allowedValues !== undefined && !definition.allowedValues.includes(symbol)) {
        return {
          value: toRaw(raw, `'${text}' is not one of ${definition.allowedValues.join(', ')}`),
        };
      }
      return { value: { kind: 'enum', value: symbol } };
    }
    case 'string': {
      const text = textFrom(raw);
      if (text === undefined || text.length === 0) {
        return { value: toRaw(raw, `expected string for ${definition.name}`) };
      }
      return { value: { kind: 'string', value: text } };
    }
  }
}
