/**
 * Protocol records: conversion between ImagingProtocol and plain data.
 *
 * A record holds only strings, numbers, booleans, null, arrays and objects,
 * so any generic store can persist it. `serializeProtocol` / `parseProtocol`
 * give the YAML text form of the same record.
 */

import yaml from 'yaml';
import { z } from 'zod';
import { ProtocolError } from '../errors.js';
import { getLogger } from '../logging/logger.js';
import { createParameter, RAW_EQUALITY_RULE } from '../parameter/Parameter.js';
import { getParameterRegistry, type ParameterRegistry } from '../registry/ParameterRegistry.js';
import { ImagingSequence, type SequenceSource } from '../sequence/ImagingSequence.js';
import type { Parameter, ParameterValue } from '../types/parameter.js';
import { ImagingProtocol } from './ImagingProtocol.js';

const log = getLogger('records');

export const RECORD_VERSION = 1;

// ============================================================================
// Schema
// ============================================================================

const rawItemSchema = z.union([z.string(), z.number()]);

const valueSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('number'), value: z.number() }),
  z.object({ kind: z.literal('string'), value: z.string() }),
  z.object({ kind: z.literal('enum'), value: z.string() }),
  z.object({ kind: z.literal('vector'), value: z.array(z.number()) }),
  z.object({
    kind: z.literal('raw'),
    value: z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(rawItemSchema)]),
    reason: z.string(),
  }),
]);

const sourceSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('header'), digest: z.string() }),
  z.object({ type: z.literal('manual') }),
  z.object({
    type: z.literal('xml'),
    program: z.string(),
    block: z.number().int(),
    headerProperty: z.string().optional(),
  }),
  z.object({ type: z.literal('path'), path: z.string() }),
  z.object({ type: z.literal('record') }),
]);

const parameterSchema = z.object({
  name: z.string().min(1),
  value: valueSchema,
  unit: z.string().optional(),
  recognized: z.boolean(),
});

const sequenceSchema = z.object({
  name: z.string().min(1),
  source: sourceSchema.optional(),
  parameters: z.array(parameterSchema),
});

export const protocolRecordSchema = z.object({
  recordVersion: z.literal(RECORD_VERSION),
  name: z.string().min(1),
  category: z.string().default('MR'),
  metadata: z.record(z.string()).default({}),
  sequences: z.array(sequenceSchema),
});

export type ProtocolRecord = z.input<typeof protocolRecordSchema>;

type ParsedSource = z.infer<typeof sourceSchema>;
type ParsedParameter = z.infer<typeof parameterSchema>;

/**
 * A record that does not describe a protocol.
 */
export class ProtocolRecordError extends ProtocolError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super('BAD_RECORD', message);
    this.name = 'ProtocolRecordError';
  }
}

export interface SerializeOptions {
  /** YAML indent (default: 2) */
  indent?: number;
  /** Line width for wrapping (default: 80) */
  lineWidth?: number;
}

// ============================================================================
// To record
// ============================================================================

function valueRecord(value: ParameterValue): z.infer<typeof valueSchema> {
  switch (value.kind) {
    case 'vector':
      return { kind: 'vector', value: [...value.value] };
    case 'raw': {
      const inner = value.value;
      return {
        kind: 'raw',
        value: typeof inner === 'object' && inner !== null ? [...inner] : inner,
        reason: value.reason,
      };
    }
    default:
      return { ...value };
  }
}

function parameterRecord(parameter: Parameter): ParsedParameter {
  return {
    name: parameter.name,
    value: valueRecord(parameter.value),
    ...(parameter.unit !== undefined ? { unit: parameter.unit } : {}),
    recognized: parameter.recognized,
  };
}

function sourceRecord(source: SequenceSource): ParsedSource {
  return { ...source };
}

export function protocolToRecord(protocol: ImagingProtocol): ProtocolRecord {
  return {
    recordVersion: RECORD_VERSION,
    name: protocol.name,
    category: protocol.category,
    metadata: { ...protocol.metadata },
    sequences: [...protocol].map((sequence) => ({
      name: sequence.name,
      source: sourceRecord(sequence.source),
      parameters: [...sequence.parameters.values(), ...sequence.unrecognized.values()].map(parameterRecord),
    })),
  };
}

// ============================================================================
// From record
// ============================================================================

function toSource(source: ParsedSource | undefined): SequenceSource {
  if (source === undefined) return { type: 'record' };
  if (source.type === 'xml') {
    return {
      type: 'xml',
      program: source.program,
      block: source.block,
      ...(source.headerProperty !== undefined ? { headerProperty: source.headerProperty } : {}),
    };
  }
  return source;
}

function toParameter(entry: ParsedParameter, registry: ParameterRegistry, sequence: string): Parameter {
  const definition = entry.recognized ? registry.definition(entry.name) : undefined;
  if (entry.recognized && definition === undefined) {
    log.warn({ sequence, parameter: entry.name }, 'recorded parameter is not in the registry; kept unrecognized');
  }
  if (definition === undefined) {
    return createParameter({
      name: entry.name,
      value:
        entry.value.kind === 'raw'
          ? entry.value
          : { kind: 'raw', value: entry.value.value, reason: 'unrecognized parameter' },
      rule: RAW_EQUALITY_RULE,
      recognized: false,
      unit: entry.unit,
    });
  }
  return createParameter({
    name: definition.name,
    value: entry.value,
    rule: definition.rule,
    recognized: true,
    unit: entry.unit,
    acronym: definition.acronym,
  });
}

/**
 * Rebuild a protocol from its record.
 * @throws ProtocolRecordError when the record does not match the schema
 */
export function protocolFromRecord(
  record: unknown,
  registry: ParameterRegistry = getParameterRegistry()
): ImagingProtocol {
  const result = protocolRecordSchema.safeParse(record);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new ProtocolRecordError(`Invalid protocol record: ${issues.join('; ')}`, issues);
  }

  const data = result.data;
  const protocol = new ImagingProtocol(data.name, {
    category: data.category,
    metadata: data.metadata,
    registry,
  });
  for (const entry of data.sequences) {
    const parameters = entry.parameters.map((p) => toParameter(p, registry, entry.name));
    const sequence = ImagingSequence.fromParameters(parameters, {
      name: entry.name,
      registry,
      source: toSource(entry.source),
    });
    protocol.addSequence(entry.name, sequence);
  }
  return protocol;
}

// ============================================================================
// YAML text
// ============================================================================

export function serializeProtocol(protocol: ImagingProtocol, options: SerializeOptions = {}): string {
  const { indent = 2, lineWidth = 80 } = options;
  return yaml.stringify(protocolToRecord(protocol), { indent, lineWidth });
}

/**
 * Parse the YAML text form of a protocol record.
 * @throws ProtocolRecordError for invalid YAML or a record that fails validation
 */
export function parseProtocol(
  content: string,
  registry: ParameterRegistry = getParameterRegistry()
): ImagingProtocol {
  let payload: unknown;
  try {
    payload = yaml.parse(content);
  } catch (err) {
    throw new ProtocolRecordError(`Invalid YAML: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (payload === null || payload === undefined) {
    throw new ProtocolRecordError('Empty or null YAML content');
  }
  return protocolFromRecord(payload, registry);
}
