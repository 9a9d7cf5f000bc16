/**
 * mri-protocol-qa: MRI protocol data model and compliance checking.
 *
 * This is the main entry point for the library.
 */

// Types
export * from './types/parameter.js';

// Errors
export * from './errors.js';

// Logging
export { logger, getLogger, setLogLevel, getLogLevel, LOG_LEVELS } from './logging/logger.js';
export type { LogLevel } from './logging/logger.js';

// Configuration
export * from './config/loader.js';
export * from './config/types.js';

// Parameter registry
export * from './registry/ParameterRegistry.js';

// Parameters, coercion and equivalence
export * from './parameter/Parameter.js';
export { coerceValue, splitValueAndUnit, parseNumber, parseNumberList } from './parameter/coercion.js';
export { evaluateRule, rawEqual } from './parameter/equivalence.js';

// Sequences and protocols
export * from './sequence/ImagingSequence.js';
export * from './protocol/ImagingProtocol.js';
export * from './protocol/records.js';

// Compliance
export * from './compliance/ComplianceComparator.js';

// Vendor XML
export * from './xml/siemensProtocolParser.js';
export type { ProtocolParser, ProtocolParseOptions } from './xml/types.js';
