/**
 * Configuration types for the protocol QA library.
 *
 * These types define the structure of mri-qa.config.yaml.
 */

import type { LogLevel } from '../logging/logger.js';

/**
 * Top-level configuration.
 */
export interface AppConfig {
  logging: LoggingConfig;
  registry: RegistryConfig;
  xml: XmlConfig;
  comparison: ComparisonConfig;
}

export interface LoggingConfig {
  /** Log level (default: 'info') */
  level: LogLevel;
}

export interface RegistryConfig {
  /**
   * Replacement parameter registry file. Relative paths resolve against the
   * directory of the config file. The bundled table is used when omitted.
   */
  path?: string;
}

/**
 * Vendor XML import settings.
 */
export interface XmlConfig {
  /** Program to import when the caller names none (default: first in document) */
  programName?: string;
  /** Map scanner phase directions ("A >> P") to header axes ("COL") (default: true) */
  convertPhaseEncoding: boolean;
}

export interface ComparisonConfig {
  /** Parameters evaluated on top of the registry's required set */
  extraParameters: string[];
}

/**
 * A config file as written: every section and setting may be left out.
 */
export interface PartialAppConfig {
  logging?: Partial<LoggingConfig>;
  registry?: RegistryConfig;
  xml?: Partial<XmlConfig>;
  comparison?: Partial<ComparisonConfig>;
}

export const DEFAULT_CONFIG: AppConfig = {
  logging: {
    level: 'info',
  },
  registry: {},
  xml: {
    convertPhaseEncoding: true,
  },
  comparison: {
    extraParameters: [],
  },
};
