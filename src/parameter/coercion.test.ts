/**
 * Tests for value coercion.
 */

import { describe, it, expect } from 'vitest';
import { coerceValue, parseNumberList, splitValueAndUnit } from './coercion.js';
import { BUNDLED_REGISTRY_PATH, loadParameterRegistry } from '../registry/ParameterRegistry.js';

const registry = loadParameterRegistry(BUNDLED_REGISTRY_PATH);

function def(name: string) {
  const definition = registry.definition(name);
  if (!definition) throw new Error(`missing ${name} in registry`);
  return definition;
}

describe('splitValueAndUnit', () => {
  it('splits a numeric value from its unit', () => {
    expect(splitValueAndUnit('2000 ms')).toEqual({ value: '2000', unit: 'ms' });
    expect(splitValueAndUnit('490 Hz/Px')).toEqual({ value: '490', unit: 'Hz/Px' });
    expect(splitValueAndUnit('1.5T')).toEqual({ value: '1.5', unit: 'T' });
  });

  it('leaves non-numeric text whole', () => {
    expect(splitValueAndUnit('3D')).toEqual({ value: '3D' });
    expect(splitValueAndUnit(' Single shot ')).toEqual({ value: 'Single shot' });
  });
});

describe('parseNumberList', () => {
  it('accepts backslash, comma and bracketed lists', () => {
    expect(parseNumberList('0.8\\0.8')).toEqual([0.8, 0.8]);
    expect(parseNumberList('1, 0, 0')).toEqual([1, 0, 0]);
    expect(parseNumberList('[1, 2, 3]')).toEqual([1, 2, 3]);
  });

  it('rejects lists with non-numeric items', () => {
    expect(parseNumberList('1\\abc')).toBeUndefined();
    expect(parseNumberList('')).toBeUndefined();
  });
});

describe('coerceValue', () => {
  it('parses numbers with and without a unit suffix', () => {
    expect(coerceValue(def('RepetitionTime'), ' 2000 ')).toEqual({
      value: { kind: 'number', value: 2000 },
      unit: 'ms',
    });
    expect(coerceValue(def('FlipAngle'), '90 deg')).toEqual({
      value: { kind: 'number', value: 90 },
      unit: 'deg',
    });
    expect(coerceValue(def('RepetitionTime'), 2300)).toEqual({
      value: { kind: 'number', value: 2300 },
      unit: 'ms',
    });
  });

  it('turns multiple values of a number parameter into a vector', () => {
    expect(coerceValue(def('EchoTime'), [1.5, 3.2])).toEqual({
      value: { kind: 'vector', value: [1.5, 3.2] },
      unit: 'ms',
    });
    expect(coerceValue(def('EchoTime'), [2.5])).toEqual({
      value: { kind: 'number', value: 2.5 },
      unit: 'ms',
    });
  });

  it('parses vectors', () => {
    expect(coerceValue(def('PixelSpacing'), '0.8\\0.8')).toEqual({
      value: { kind: 'vector', value: [0.8, 0.8] },
      unit: 'mm',
    });
    expect(coerceValue(def('AcquisitionMatrix'), 256)).toEqual({
      value: { kind: 'vector', value: [256] },
    });
  });

  it('keeps a value with a conflicting unit raw', () => {
    expect(coerceValue(def('RepetitionTime'), '2 s')).toEqual({
      value: { kind: 'raw', value: '2 s', reason: "unit 's' does not match declared 'ms'" },
    });
    expect(coerceValue(def('RepetitionTime'), '2000', 'us')).toEqual({
      value: { kind: 'raw', value: '2000', reason: "unit 'us' does not match declared 'ms'" },
    });
  });

  it('accepts a unit reported beside the value', () => {
    expect(coerceValue(def('RepetitionTime'), '2000', 'ms')).toEqual({
      value: { kind: 'number', value: 2000 },
      unit: 'ms',
    });
  });

  it('keeps unparseable and empty values raw', () => {
    expect(coerceValue(def('RepetitionTime'), 'abc')).toEqual({
      value: { kind: 'raw', value: 'abc', reason: 'expected number for RepetitionTime' },
    });
    expect(coerceValue(def('RepetitionTime'), null)).toEqual({
      value: { kind: 'raw', value: null, reason: 'empty value' },
    });
    expect(coerceValue(def('RepetitionTime'), true)).toEqual({
      value: { kind: 'raw', value: true, reason: 'boolean is not a valid number' },
    });
  });

  it('upper-cases enums and checks allowed values', () => {
    expect(coerceValue(def('MRAcquisitionType'), ' 3d ')).toEqual({
      value: { kind: 'enum', value: '3D' },
    });
    expect(coerceValue(def('MRAcquisitionType'), '4D')).toEqual({
      value: { kind: 'raw', value: '4D', reason: "'4D' is not one of 2D, 3D" },
    });
    expect(coerceValue(def('ScanningSequence'), ['GR', 'IR'])).toEqual({
      value: { kind: 'enum', value: 'GR\\IR' },
    });
  });

  it('trims strings', () => {
    expect(coerceValue(def('ProtocolName'), '  t1_mprage ')).toEqual({
      value: { kind: 'string', value: 't1_mprage' },
    });
  });

  it('keeps values of unrecognized parameters raw', () => {
    expect(coerceValue(undefined, 'blob')).toEqual({
      value: { kind: 'raw', value: 'blob', reason: 'unrecognized parameter' },
    });
  });
});
