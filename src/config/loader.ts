/**
 * Configuration loader for the protocol QA library.
 *
 * Loads config from a YAML file with support for:
 * - Environment variable substitution (${VAR_NAME})
 * - Default values
 * - Validation
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { CompareOptions } from '../compliance/ComplianceComparator.js';
import { getLogger, LOG_LEVELS, setLogLevel, type LogLevel } from '../logging/logger.js';
import {
  getParameterRegistry,
  initializeParameterRegistry,
  type ParameterRegistry,
} from '../registry/ParameterRegistry.js';
import type { ProtocolParseOptions } from '../xml/types.js';
import type {
  AppConfig,
  ComparisonConfig,
  LoggingConfig,
  PartialAppConfig,
  RegistryConfig,
  XmlConfig,
} from './types.js';
import { DEFAULT_CONFIG } from './types.js';

const log = getLogger('config');

export const DEFAULT_CONFIG_PATH = './mri-qa.config.yaml';

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.MRI_QA_CONFIG or './mri-qa.config.yaml') */
  configPath?: string;
}

/**
 * Config validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly value: unknown
  ) {
    super(`Config validation error at '${path}': ${message}`);
    this.name = 'ConfigValidationError';
  }
}

// ============================================================================
// Environment substitution
// ============================================================================

/**
 * Environment variable substitution pattern.
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

/**
 * Substitute environment variables in a string.
 */
export function substituteEnvVars(value: string): string {
  return value.replace(ENV_VAR_PATTERN, (_match, varName: string, defaultValue: string | undefined) => {
    const envValue = process.env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    log.warn({ variable: varName }, 'environment variable is not set and has no default');
    return '';
  });
}

function substituteEnvVarsRecursive(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return substituteEnvVars(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(substituteEnvVarsRecursive);
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsRecursive(value);
    }
    return result;
  }
  return obj;
}

// ============================================================================
// Validation
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function section(config: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
  const value = config[key];
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) {
    throw new ConfigValidationError('must be an object', key, value);
  }
  return value;
}

function optionalString(c: Record<string, unknown>, key: string, path: string): string | undefined {
  const value = c[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ConfigValidationError(`${key} must be a non-empty string`, `${path}.${key}`, value);
  }
  return value;
}

function validateLoggingConfig(c: Record<string, unknown>, path = 'logging'): Partial<LoggingConfig> {
  const level = c['level'];
  if (level === undefined) return {};
  if (!isLogLevel(level)) {
    throw new ConfigValidationError(`level must be one of ${LOG_LEVELS.join(', ')}`, `${path}.level`, level);
  }
  return { level };
}

function validateRegistryConfig(c: Record<string, unknown>, path = 'registry'): RegistryConfig {
  const registryPath = optionalString(c, 'path', path);
  return registryPath !== undefined ? { path: registryPath } : {};
}

function validateXmlConfig(c: Record<string, unknown>, path = 'xml'): Partial<XmlConfig> {
  const programName = optionalString(c, 'programName', path);
  const convert = c['convertPhaseEncoding'];
  if (convert !== undefined && typeof convert !== 'boolean') {
    throw new ConfigValidationError('convertPhaseEncoding must be a boolean', `${path}.convertPhaseEncoding`, convert);
  }
  return {
    ...(programName !== undefined ? { programName } : {}),
    ...(convert !== undefined ? { convertPhaseEncoding: convert } : {}),
  };
}

function validateComparisonConfig(c: Record<string, unknown>, path = 'comparison'): Partial<ComparisonConfig> {
  const extras = c['extraParameters'];
  if (extras === undefined || extras === null) return {};
  if (!Array.isArray(extras)) {
    throw new ConfigValidationError('extraParameters must be an array', `${path}.extraParameters`, extras);
  }
  const extraParameters: string[] = [];
  extras.forEach((name: unknown, i) => {
    if (typeof name !== 'string' || name.trim().length === 0) {
      throw new ConfigValidationError('must be a non-empty string', `${path}.extraParameters[${i}]`, name);
    }
    extraParameters.push(name);
  });
  return { extraParameters };
}

/**
 * Validate a parsed config document and return its typed settings.
 * An empty document is an empty config.
 */
export function validateConfig(config: unknown): PartialAppConfig {
  if (config === null || config === undefined) return {};
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', '<root>', config);
  }

  const logging = section(config, 'logging');
  const registry = section(config, 'registry');
  const xml = section(config, 'xml');
  const comparison = section(config, 'comparison');

  return {
    ...(logging ? { logging: validateLoggingConfig(logging) } : {}),
    ...(registry ? { registry: validateRegistryConfig(registry) } : {}),
    ...(xml ? { xml: validateXmlConfig(xml) } : {}),
    ...(comparison ? { comparison: validateComparisonConfig(comparison) } : {}),
  };
}

function withDefaults(partial: PartialAppConfig): AppConfig {
  return {
    logging: { ...DEFAULT_CONFIG.logging, ...partial.logging },
    registry: { ...DEFAULT_CONFIG.registry, ...partial.registry },
    xml: { ...DEFAULT_CONFIG.xml, ...partial.xml },
    comparison: {
      extraParameters: [...(partial.comparison?.extraParameters ?? DEFAULT_CONFIG.comparison.extraParameters)],
    },
  };
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Load configuration from a YAML file.
 *
 * A missing file is not an error: the defaults are returned and a warning
 * is logged.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const configPath = options.configPath ?? process.env['MRI_QA_CONFIG'] ?? DEFAULT_CONFIG_PATH;
  const absolutePath = resolve(configPath);

  if (!existsSync(absolutePath)) {
    log.warn({ path: absolutePath }, 'config file not found, using defaults');
    return withDefaults({});
  }

  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new Error(`Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`);
  }

  const config = withDefaults(validateConfig(substituteEnvVarsRecursive(parsed)));
  if (config.registry.path !== undefined) {
    config.registry.path = resolve(dirname(absolutePath), config.registry.path);
  }
  log.debug({ path: absolutePath }, 'config loaded');
  return config;
}

// ============================================================================
// Applying
// ============================================================================

/**
 * Apply the process-wide settings: log level and parameter registry.
 * Returns the registry now in use.
 */
export function applyConfig(config: AppConfig): ParameterRegistry {
  setLogLevel(config.logging.level);
  if (config.registry.path !== undefined) {
    return initializeParameterRegistry(config.registry.path);
  }
  return getParameterRegistry();
}

export function compareOptionsFromConfig(config: AppConfig, registry?: ParameterRegistry): CompareOptions {
  return {
    extraParameters: [...config.comparison.extraParameters],
    ...(registry !== undefined ? { registry } : {}),
  };
}

export function parseOptionsFromConfig(config: AppConfig, registry?: ParameterRegistry): ProtocolParseOptions {
  return {
    convertPhaseEncoding: config.xml.convertPhaseEncoding,
    ...(config.xml.programName !== undefined ? { programName: config.xml.programName } : {}),
    ...(registry !== undefined ? { registry } : {}),
  };
}
