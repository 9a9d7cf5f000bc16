/**
 * ParameterRegistry: Canonical catalog of acquisition parameters.
 *
 * Loads parameters.registry.yaml and provides:
 *   - Resolution of vendor spellings and DICOM tags to canonical names
 *   - The declared value kind and equivalence rule per parameter
 *   - The required subset and the sequence-identifying fields
 *
 * The table is static data: a registry is frozen once built and the
 * process-wide instance is loaded a single time.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ProtocolError } from '../errors.js';
import { getLogger } from '../logging/logger.js';
import type { EquivalenceRule, ParameterKind } from '../types/parameter.js';

const log = getLogger('registry');

// ============================================================================
// Types
// ============================================================================

export interface ParameterDefinition {
  name: string;
  kind: ParameterKind;
  rule: EquivalenceRule;
  required: boolean;
  optionalForComparison: boolean;
  aliases: readonly string[];
  acronym?: string;
  unit?: string;
  /** DICOM tag as "gggg,eeee" */
  dicomTag?: string;
  /** Priority when deriving a sequence name (lower wins) */
  identifying?: number;
  allowedValues?: readonly string[];
}

export type ResolvedName =
  | { recognized: true; name: string }
  | { recognized: false; rawName: string };

export type HeaderKey = string | number;

// ============================================================================
// File schema
// ============================================================================

const ruleSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('exact') }),
  z.object({ type: z.literal('tolerance'), tolerance: z.number().nonnegative() }),
  z.object({ type: z.literal('axis'), axes: z.record(z.array(z.string().min(1)).min(1)) }),
  z.object({ type: z.literal('set'), classes: z.array(z.array(z.string().min(1)).min(1)).min(1) }),
]);

const entrySchema = z.object({
  name: z.string().regex(/^[A-Za-z][A-Za-z0-9]*$/, 'name must be alphanumeric'),
  kind: z.enum(['number', 'string', 'enum', 'vector']),
  rule: ruleSchema,
  required: z.boolean().default(false),
  optionalForComparison: z.boolean().default(false),
  aliases: z.array(z.string().min(1)).default([]),
  acronym: z.string().min(1).optional(),
  unit: z.string().min(1).optional(),
  dicomTag: z.string().regex(/^[0-9A-Fa-f]{4},[0-9A-Fa-f]{4}$/, 'dicomTag must look like 0018,0080').optional(),
  identifying: z.number().int().positive().optional(),
  allowedValues: z.array(z.union([z.string(), z.number()]).transform(String)).optional(),
});

export const parameterRegistrySchema = z.object({
  registryVersion: z.number().int().positive(),
  parameters: z.array(entrySchema).min(1),
});

export type ParameterRegistryInput = z.input<typeof parameterRegistrySchema>;

// ============================================================================
// Name normalization
// ============================================================================

/**
 * Case- and whitespace-folded lookup key.
 */
export function normalizeName(raw: string): string {
  return raw.toLowerCase().replace(/\s+/g, '');
}

/**
 * Lookup key for a DICOM tag spelling, or undefined when the input is not one.
 *
 * Accepts (0018,0080), 0018,0080, 00180080, 0x00180080 and the number 0x00180080.
 */
export function tagKey(raw: HeaderKey): string | undefined {
  if (typeof raw === 'number') {
    if (!Number.isInteger(raw) || raw < 0 || raw > 0xffffffff) return undefined;
    return `tag:${raw.toString(16).padStart(8, '0')}`;
  }
  const compact = raw.toLowerCase().replace(/[\s(),]/g, '').replace(/^0x/, '');
  return /^[0-9a-f]{8}$/.test(compact) ? `tag:${compact}` : undefined;
}

// ============================================================================
// Registry class
// ============================================================================

export class ParameterRegistry {
  private readonly byName: Map<string, ParameterDefinition>;
  private readonly byKey: Map<string, string>;
  private readonly order: Map<string, number>;
  private readonly entries: readonly ParameterDefinition[];
  private readonly requiredNames: readonly string[];
  private readonly identifyingNames: readonly string[];

  constructor(input: ParameterRegistryInput) {
    const data = parameterRegistrySchema.parse(input);
    this.byName = new Map();
    this.byKey = new Map();
    this.order = new Map();

    const entries: ParameterDefinition[] = [];
    for (const entry of data.parameters) {
      if (this.byName.has(entry.name)) {
        throw new Error(`Duplicate parameter name in registry: ${entry.name}`);
      }
      const definition: ParameterDefinition = Object.freeze({
        name: entry.name,
        kind: entry.kind,
        rule: entry.rule,
        required: entry.required,
        optionalForComparison: entry.optionalForComparison,
        aliases: Object.freeze([...entry.aliases]),
        ...(entry.acronym !== undefined ? { acronym: entry.acronym } : {}),
        ...(entry.unit !== undefined ? { unit: entry.unit } : {}),
        ...(entry.dicomTag !== undefined ? { dicomTag: entry.dicomTag.toUpperCase() } : {}),
        ...(entry.identifying !== undefined ? { identifying: entry.identifying } : {}),
        ...(entry.allowedValues !== undefined
          ? { allowedValues: Object.freeze(entry.allowedValues.map((v) => v.trim().toUpperCase())) }
          : {}),
      });

      this.order.set(definition.name, entries.length);
      this.byName.set(definition.name, definition);
      entries.push(definition);

      this.index(normalizeName(definition.name), definition.name);
      for (const alias of definition.aliases) {
        this.index(normalizeName(alias), definition.name);
      }
      if (definition.dicomTag !== undefined) {
        const key = tagKey(definition.dicomTag);
        if (key !== undefined) this.index(key, definition.name);
      }
    }

    this.entries = Object.freeze(entries);
    this.requiredNames = Object.freeze(entries.filter((e) => e.required).map((e) => e.name));
    this.identifyingNames = Object.freeze(
      entries
        .filter((e) => e.identifying !== undefined)
        .sort((a, b) => (a.identifying ?? 0) - (b.identifying ?? 0))
        .map((e) => e.name)
    );
    Object.freeze(this);
  }

  private index(key: string, name: string): void {
    const existing = this.byKey.get(key);
    if (existing !== undefined && existing !== name) {
      throw new Error(`Registry alias '${key}' maps to both ${existing} and ${name}`);
    }
    this.byKey.set(key, name);
  }

  /**
   * Resolve a header key, alias or tag to its canonical name.
   */
  resolve(rawName: HeaderKey): ResolvedName {
    const tag = tagKey(rawName);
    if (tag !== undefined) {
      const byTag = this.byKey.get(tag);
      if (byTag !== undefined) return { recognized: true, name: byTag };
    }
    if (typeof rawName === 'string') {
      const byName = this.byKey.get(normalizeName(rawName));
      if (byName !== undefined) return { recognized: true, name: byName };
      return { recognized: false, rawName: rawName.trim() };
    }
    return { recognized: false, rawName: formatTag(rawName) };
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  definition(name: string): ParameterDefinition | undefined {
    return this.byName.get(name);
  }

  /** Equivalence rule of a canonical parameter. */
  ruleFor(name: string): EquivalenceRule {
    return this.require(name).rule;
  }

  isRequired(name: string): boolean {
    return this.byName.get(name)?.required ?? false;
  }

  isOptionalForComparison(name: string): boolean {
    return this.byName.get(name)?.optionalForComparison ?? false;
  }

  /** Position in canonical iteration order; unknown names sort last. */
  position(name: string): number {
    return this.order.get(name) ?? Number.MAX_SAFE_INTEGER;
  }

  /** Required parameter names in canonical order. */
  get required(): readonly string[] {
    return this.requiredNames;
  }

  /** Sequence-identifying parameter names by priority. */
  get identifyingParameters(): readonly string[] {
    return this.identifyingNames;
  }

  /** All canonical names in canonical order. */
  get names(): readonly string[] {
    return this.entries.map((e) => e.name);
  }

  get size(): number {
    return this.entries.length;
  }

  private require(name: string): ParameterDefinition {
    const definition = this.byName.get(name);
    if (!definition) {
      throw new ProtocolError('UNKNOWN_PARAMETER', `Not a canonical parameter name: ${name}`);
    }
    return definition;
  }
}

function formatTag(tag: number): string {
  const hex = tag.toString(16).toUpperCase().padStart(8, '0');
  return `(${hex.slice(0, 4)},${hex.slice(4)})`;
}

// ============================================================================
// Factory
// ============================================================================

export const BUNDLED_REGISTRY_PATH = fileURLToPath(
  new URL('../../registry/parameters.registry.yaml', import.meta.url)
);

/**
 * Build a registry from YAML text.
 */
export function parseParameterRegistry(content: string, source = '<inline>'): ParameterRegistry {
  const data: unknown = parseYaml(content);
  const result = parameterRegistrySchema.safeParse(data);
  if (!result.success) {
    throw new Error(`Invalid parameter registry ${source}: ${result.error.message}`);
  }
  return new ParameterRegistry(result.data);
}

/**
 * Load a registry from a YAML file on disk.
 */
export function loadParameterRegistry(filePath: string): ParameterRegistry {
  const content = readFileSync(filePath, 'utf-8');
  return parseParameterRegistry(content, filePath);
}

let processRegistry: ParameterRegistry | undefined;
let processRegistryPath: string | undefined;

/**
 * Choose the registry file for this process. Must run before the registry is
 * first used; the table never changes once loaded.
 */
export function initializeParameterRegistry(filePath: string): ParameterRegistry {
  if (processRegistry !== undefined) {
    if (processRegistryPath === filePath) return processRegistry;
    throw new Error(
      `Parameter registry already loaded from ${processRegistryPath ?? 'unknown'}; cannot switch to ${filePath}`
    );
  }
  processRegistry = loadParameterRegistry(filePath);
  processRegistryPath = filePath;
  log.info({ path: filePath, parameters: processRegistry.size }, 'parameter registry loaded');
  return processRegistry;
}

/**
 * The process-wide registry, loaded from the bundled table on first use.
 */
export function getParameterRegistry(): ParameterRegistry {
  return processRegistry ?? initializeParameterRegistry(BUNDLED_REGISTRY_PATH);
}
