/**
 * Tests for configuration loading.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import {
  applyConfig,
  compareOptionsFromConfig,
  ConfigValidationError,
  loadConfig,
  parseOptionsFromConfig,
  substituteEnvVars,
  validateConfig,
} from './loader.js';
import { DEFAULT_CONFIG } from './types.js';
import { getLogLevel } from '../logging/logger.js';
import { getParameterRegistry } from '../registry/ParameterRegistry.js';

describe('config loader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'mri-qa-config-'));
  });

  afterEach(async () => {
    delete process.env['MRI_QA_TEST_PROGRAM'];
    await rm(dir, { recursive: true, force: true });
  });

  async function writeConfig(content: string): Promise<string> {
    const path = join(dir, 'mri-qa.config.yaml');
    await writeFile(path, content, 'utf-8');
    return path;
  }

  describe('loadConfig', () => {
    it('returns defaults when the file is missing', async () => {
      const config = await loadConfig({ configPath: join(dir, 'absent.yaml') });
      expect(config).toEqual(DEFAULT_CONFIG);
    });

    it('merges settings over defaults', async () => {
      const configPath = await writeConfig(`
logging:
  level: warn
comparison:
  extraParameters: [SliceThickness, PercentPhaseFOV]
`);
      const config = await loadConfig({ configPath });
      expect(config.logging.level).toBe('warn');
      expect(config.comparison.extraParameters).toEqual(['SliceThickness', 'PercentPhaseFOV']);
      expect(config.xml).toEqual({ convertPhaseEncoding: true });
      expect(config.registry).toEqual({});
    });

    it('treats an empty file as an empty config', async () => {
      const configPath = await writeConfig('');
      expect(await loadConfig({ configPath })).toEqual(DEFAULT_CONFIG);
    });

    it('substitutes environment variables with defaults', async () => {
      process.env['MRI_QA_TEST_PROGRAM'] = 'Head';
      const configPath = await writeConfig(`
xml:
  programName: \${MRI_QA_TEST_PROGRAM}
  convertPhaseEncoding: false
logging:
  level: \${MRI_QA_TEST_LEVEL:-error}
`);
      const config = await loadConfig({ configPath });
      expect(config.xml).toEqual({ programName: 'Head', convertPhaseEncoding: false });
      expect(config.logging.level).toBe('error');
    });

    it('resolves the registry path against the config directory', async () => {
      const configPath = await writeConfig(`
registry:
  path: tables/site.registry.yaml
`);
      const config = await loadConfig({ configPath });
      expect(config.registry.path).toBe(join(dir, 'tables', 'site.registry.yaml'));
    });

    it('rejects an unknown log level with its path', async () => {
      const configPath = await writeConfig(`
logging:
  level: verbose
`);
      await expect(loadConfig({ configPath })).rejects.toThrow(
        "Config validation error at 'logging.level': level must be one of debug, info, warn, error, silent"
      );
    });

    it('reports YAML syntax errors', async () => {
      const configPath = await writeConfig('logging: [unclosed\n');
      await expect(loadConfig({ configPath })).rejects.toThrow(/^Failed to parse config file/);
    });
  });

  describe('validateConfig', () => {
    it('rejects a non-object document', () => {
      expect(() => validateConfig(['logging'])).toThrow(ConfigValidationError);
    });

    it('rejects a section that is not an object', () => {
      try {
        validateConfig({ xml: 'Head' });
        expect.fail('expected ConfigValidationError');
      } catch (err) {
        expect(err).toBeInstanceOf(ConfigValidationError);
        if (err instanceof ConfigValidationError) {
          expect(err.path).toBe('xml');
          expect(err.value).toBe('Head');
        }
      }
    });

    it('rejects a non-boolean convertPhaseEncoding', () => {
      expect(() => validateConfig({ xml: { convertPhaseEncoding: 'yes' } })).toThrow(
        "Config validation error at 'xml.convertPhaseEncoding': convertPhaseEncoding must be a boolean"
      );
    });

    it('points at the bad extra parameter', () => {
      expect(() => validateConfig({ comparison: { extraParameters: ['SliceThickness', 7] } })).toThrow(
        "Config validation error at 'comparison.extraParameters[1]': must be a non-empty string"
      );
    });

    it('keeps only the settings present', () => {
      expect(validateConfig({ xml: { programName: 'Spine' } })).toEqual({ xml: { programName: 'Spine' } });
    });
  });

  describe('substituteEnvVars', () => {
    it('replaces unset variables without default by an empty string', () => {
      delete process.env['MRI_QA_TEST_UNSET'];
      expect(substituteEnvVars('a${MRI_QA_TEST_UNSET}b')).toBe('ab');
    });
  });

  describe('applying', () => {
    const config = {
      ...DEFAULT_CONFIG,
      logging: { level: 'silent' as const },
      xml: { programName: 'Head', convertPhaseEncoding: false },
      comparison: { extraParameters: ['SliceThickness'] },
    };

    it('sets the log level and returns the process registry', () => {
      const registry = applyConfig(config);
      expect(getLogLevel()).toBe('silent');
      expect(registry).toBe(getParameterRegistry());
    });

    it('builds comparison options', () => {
      const registry = getParameterRegistry();
      expect(compareOptionsFromConfig(config, registry)).toEqual({
        extraParameters: ['SliceThickness'],
        registry,
      });
      expect(compareOptionsFromConfig(DEFAULT_CONFIG)).toEqual({ extraParameters: [] });
    });

    it('builds parse options', () => {
      expect(parseOptionsFromConfig(config)).toEqual({
        convertPhaseEncoding: false,
        programName: 'Head',
      });
    });
  });
});
