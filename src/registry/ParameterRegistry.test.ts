/**
 * Tests for ParameterRegistry.
 */

import { describe, it, expect } from 'vitest';
import {
  BUNDLED_REGISTRY_PATH,
  ParameterRegistry,
  loadParameterRegistry,
  normalizeName,
  parseParameterRegistry,
  tagKey,
  type ParameterRegistryInput,
} from './ParameterRegistry.js';
import { isProtocolError } from '../errors.js';

function smallTable(): ParameterRegistryInput {
  return {
    registryVersion: 1,
    parameters: [
      {
        name: 'RepetitionTime',
        acronym: 'TR',
        kind: 'number',
        unit: 'ms',
        dicomTag: '0018,0080',
        required: true,
        rule: { type: 'tolerance', tolerance: 0.01 },
        aliases: ['TR'],
      },
      {
        name: 'ProtocolName',
        kind: 'string',
        identifying: 1,
        rule: { type: 'exact' },
      },
    ],
  };
}

describe('ParameterRegistry', () => {
  const registry = loadParameterRegistry(BUNDLED_REGISTRY_PATH);

  describe('name normalization', () => {
    it('folds case and removes whitespace', () => {
      expect(normalizeName(' Repetition  Time ')).toBe('repetitiontime');
    });

    it('recognizes DICOM tag spellings', () => {
      expect(tagKey('(0018,0080)')).toBe('tag:00180080');
      expect(tagKey('0018,0080')).toBe('tag:00180080');
      expect(tagKey('00180080')).toBe('tag:00180080');
      expect(tagKey('0x00180080')).toBe('tag:00180080');
      expect(tagKey(0x00180080)).toBe('tag:00180080');
      expect(tagKey('RepetitionTime')).toBeUndefined();
    });
  });

  describe('bundled table', () => {
    it('resolves canonical names and aliases', () => {
      expect(registry.resolve('RepetitionTime')).toEqual({ recognized: true, name: 'RepetitionTime' });
      expect(registry.resolve('TR')).toEqual({ recognized: true, name: 'RepetitionTime' });
      expect(registry.resolve(' repetition  time ')).toEqual({ recognized: true, name: 'RepetitionTime' });
      expect(registry.resolve('Phase enc. dir.')).toEqual({
        recognized: true,
        name: 'PhaseEncodingDirection',
      });
    });

    it('resolves DICOM tags', () => {
      expect(registry.resolve('(0018,0081)')).toEqual({ recognized: true, name: 'EchoTime' });
      expect(registry.resolve(0x00180080)).toEqual({ recognized: true, name: 'RepetitionTime' });
    });

    it('reports unknown names as unrecognized', () => {
      expect(registry.resolve(' VendorSpecificBlob123 ')).toEqual({
        recognized: false,
        rawName: 'VendorSpecificBlob123',
      });
      expect(registry.resolve(0x00191010)).toEqual({ recognized: false, rawName: '(0019,1010)' });
    });

    it('lists required parameters in table order', () => {
      expect(registry.required).toEqual([
        'RepetitionTime',
        'EchoTime',
        'FlipAngle',
        'PixelBandwidth',
        'ScanningSequence',
        'SequenceVariant',
        'MRAcquisitionType',
        'MultiSliceMode',
        'PhaseEncodingDirection',
        'ParallelAcquisitionTechnique',
        'MagneticFieldStrength',
      ]);
    });

    it('orders identifying parameters by priority', () => {
      expect(registry.identifyingParameters).toEqual(['SeriesDescription', 'SequenceName', 'ProtocolName']);
    });

    it('exposes rules and flags', () => {
      expect(registry.ruleFor('EchoTime')).toEqual({ type: 'tolerance', tolerance: 0.01 });
      expect(registry.isRequired('EchoTime')).toBe(true);
      expect(registry.isRequired('InversionTime')).toBe(false);
      expect(registry.isOptionalForComparison('MultiSliceMode')).toBe(true);
      expect(registry.isOptionalForComparison('EchoTime')).toBe(false);
      expect(registry.definition('MRAcquisitionType')?.allowedValues).toEqual(['2D', '3D']);
    });

    it('throws for a rule lookup on a non-canonical name', () => {
      try {
        registry.ruleFor('TR');
        expect.fail('expected ruleFor to throw');
      } catch (err) {
        expect(isProtocolError(err, 'UNKNOWN_PARAMETER')).toBe(true);
      }
    });

    it('is frozen', () => {
      expect(Object.isFrozen(registry)).toBe(true);
      expect(Object.isFrozen(registry.definition('EchoTime'))).toBe(true);
    });
  });

  describe('table validation', () => {
    it('builds from a fixed table', () => {
      const small = new ParameterRegistry(smallTable());
      expect(small.size).toBe(2);
      expect(small.names).toEqual(['RepetitionTime', 'ProtocolName']);
      expect(small.required).toEqual(['RepetitionTime']);
      expect(small.position('ProtocolName')).toBe(1);
    });

    it('throws on duplicate names', () => {
      const table = smallTable();
      table.parameters.push({ name: 'ProtocolName', kind: 'string', rule: { type: 'exact' } });
      expect(() => new ParameterRegistry(table)).toThrow(/Duplicate parameter name/);
    });

    it('throws when an alias maps to two parameters', () => {
      const table = smallTable();
      table.parameters.push({ name: 'EchoTime', kind: 'number', rule: { type: 'exact' }, aliases: ['tr'] });
      expect(() => new ParameterRegistry(table)).toThrow(/maps to both RepetitionTime and EchoTime/);
    });

    it('rejects a malformed YAML table', () => {
      const yaml = 'registryVersion: 1\nparameters:\n  - name: TR\n    kind: float\n    rule: { type: exact }\n';
      expect(() => parseParameterRegistry(yaml, 'bad.yaml')).toThrow(/Invalid parameter registry bad.yaml/);
    });
  });
});
