/**
 * ImagingSequence: the parameter set of one scan.
 *
 * Sequences are built from a header mapping, a plain dictionary or a list of
 * entries. Every path runs the same registry pipeline: resolve the key,
 * coerce the value to its declared kind, keep failures raw. Instances are
 * immutable; renaming returns a copy.
 */

import { createHash } from 'node:crypto';
import { ProtocolError } from '../errors.js';
import { getLogger } from '../logging/logger.js';
import {
  formatValue,
  parameterFromDefinition,
  plainValue,
  unrecognizedParameter,
} from '../parameter/Parameter.js';
import {
  getParameterRegistry,
  type HeaderKey,
  type ParameterRegistry,
} from '../registry/ParameterRegistry.js';
import type { Parameter, RawValue } from '../types/parameter.js';

const log = getLogger('sequence');

export const UNNAMED_SEQUENCE = 'Unnamed';

// ============================================================================
// Types
// ============================================================================

/**
 * Where a sequence came from.
 */
export type SequenceSource =
  | { type: 'header'; digest: string }
  | { type: 'manual' }
  | { type: 'xml'; program: string; block: number; headerProperty?: string }
  /** Set by callers that read the source from a file */
  | { type: 'path'; path: string }
  | { type: 'record' };

/**
 * One source field. `unit` is set when the source reports it apart from the value.
 */
export interface HeaderEntry {
  key: HeaderKey;
  value: RawValue;
  unit?: string | undefined;
}

/**
 * Anything that can be walked as key/value pairs: a Map, an array of pairs,
 * or a plain object.
 */
export type HeaderMapping =
  | Iterable<readonly [HeaderKey, RawValue]>
  | Readonly<Record<string, RawValue>>;

export interface SequenceOptions {
  /** Explicit sequence name; derived from identifying fields when omitted */
  name?: string | undefined;
  registry?: ParameterRegistry | undefined;
  source?: SequenceSource | undefined;
  /** Keep every entry as an unrecognized parameter (malformed source blocks) */
  recognize?: boolean | undefined;
}

interface SequenceInit {
  name: string;
  unnamed: boolean;
  source: SequenceSource;
  registry: ParameterRegistry;
  parameters: ReadonlyMap<string, Parameter>;
  unrecognized: ReadonlyMap<string, Parameter>;
}

function isEntryIterable(header: HeaderMapping): header is Iterable<readonly [HeaderKey, RawValue]> {
  return typeof Reflect.get(header, Symbol.iterator) === 'function';
}

function pairsOf(header: HeaderMapping): Array<readonly [HeaderKey, RawValue]> {
  if (isEntryIterable(header)) return Array.from(header);
  return Object.entries(header);
}

/**
 * Stable digest of a header's entries, used as provenance.
 */
export function headerDigest(pairs: ReadonlyArray<readonly [HeaderKey, RawValue]>): string {
  const canonical = JSON.stringify(pairs.map(([key, value]) => [String(key), value ?? null]));
  return createHash('sha256').update(canonical).digest('hex').slice(0, 40);
}

// ============================================================================
// Sequence class
// ============================================================================

export class ImagingSequence implements Iterable<Parameter> {
  readonly name: string;
  /** True when no name was supplied and none could be derived */
  readonly unnamed: boolean;
  readonly source: SequenceSource;
  private readonly registry: ParameterRegistry;
  private readonly params: ReadonlyMap<string, Parameter>;
  private readonly extras: ReadonlyMap<string, Parameter>;

  private constructor(init: SequenceInit) {
    this.name = init.name;
    this.unnamed = init.unnamed;
    this.source = init.source;
    this.registry = init.registry;
    this.params = init.parameters;
    this.extras = init.unrecognized;
    Object.freeze(this);
  }

  // --------------------------------------------------------------------------
  // Builders
  // --------------------------------------------------------------------------

  /**
   * Build from source entries. When two keys resolve to the same parameter
   * the first one wins.
   */
  static fromEntries(entries: Iterable<HeaderEntry>, options: SequenceOptions = {}): ImagingSequence {
    const registry = options.registry ?? getParameterRegistry();
    const recognize = options.recognize ?? true;
    const parameters: Parameter[] = [];
    const unrecognized = new Map<string, Parameter>();
    const seen = new Set<string>();

    for (const entry of entries) {
      const resolved = registry.resolve(entry.key);
      const definition = resolved.recognized ? registry.definition(resolved.name) : undefined;

      if (!recognize || definition === undefined) {
        const rawName = resolved.recognized ? String(entry.key).trim() : resolved.rawName;
        if (unrecognized.has(rawName)) {
          log.warn({ key: rawName }, 'duplicate unrecognized key ignored');
          continue;
        }
        if (recognize) log.debug({ key: rawName }, 'unrecognized parameter retained');
        unrecognized.set(rawName, unrecognizedParameter(rawName, entry.value, entry.unit));
        continue;
      }

      if (seen.has(definition.name)) {
        log.warn(
          { key: String(entry.key), parameter: definition.name },
          'parameter already set by an earlier key; ignoring'
        );
        continue;
      }
      seen.add(definition.name);

      const parameter = parameterFromDefinition(definition, entry.value, entry.unit);
      if (parameter.value.kind === 'raw') {
        log.warn({ parameter: definition.name, reason: parameter.value.reason }, 'value kept raw');
      }
      parameters.push(parameter);
    }

    return ImagingSequence.fromParameters([...parameters, ...unrecognized.values()], {
      ...options,
      registry,
    });
  }

  /**
   * Build from a header mapping; provenance is a digest of its entries.
   */
  static fromHeader(header: HeaderMapping, options: SequenceOptions = {}): ImagingSequence {
    const pairs = pairsOf(header);
    return ImagingSequence.fromEntries(
      pairs.map(([key, value]) => ({ key, value })),
      { ...options, source: options.source ?? { type: 'header', digest: headerDigest(pairs) } }
    );
  }

  /**
   * Build from a plain dictionary of (usually pre-typed) values.
   */
  static fromDict(dict: HeaderMapping, options: SequenceOptions = {}): ImagingSequence {
    return ImagingSequence.fromEntries(
      pairsOf(dict).map(([key, value]) => ({ key, value })),
      { ...options, source: options.source ?? { type: 'manual' } }
    );
  }

  /**
   * Assemble already-built parameters. Recognized parameters are keyed by
   * canonical name in registry order; the rest by their raw name.
   */
  static fromParameters(parameters: Iterable<Parameter>, options: SequenceOptions = {}): ImagingSequence {
    const registry = options.registry ?? getParameterRegistry();
    const recognized: Parameter[] = [];
    const unrecognized = new Map<string, Parameter>();

    for (const parameter of parameters) {
      if (parameter.recognized) {
        if (!recognized.some((p) => p.name === parameter.name)) recognized.push(parameter);
      } else if (!unrecognized.has(parameter.name)) {
        unrecognized.set(parameter.name, parameter);
      }
    }
    recognized.sort((a, b) => registry.position(a.name) - registry.position(b.name));
    const byName = new Map(recognized.map((p) => [p.name, p] as const));

    const explicit = options.name?.trim();
    const derived = explicit ? explicit : deriveName(byName, registry);
    return new ImagingSequence({
      name: derived ?? UNNAMED_SEQUENCE,
      unnamed: derived === undefined,
      source: options.source ?? { type: 'manual' },
      registry,
      parameters: byName,
      unrecognized,
    });
  }

  /**
   * Copy of this sequence under another name.
   */
  withName(name: string): ImagingSequence {
    const trimmed = name.trim();
    if (trimmed.length === 0) {
      throw new ProtocolError('UNNAMED_SEQUENCE', 'Sequence name must not be empty');
    }
    return new ImagingSequence({
      name: trimmed,
      unnamed: false,
      source: this.source,
      registry: this.registry,
      parameters: this.params,
      unrecognized: this.extras,
    });
  }

  // --------------------------------------------------------------------------
  // Access
  // --------------------------------------------------------------------------

  /**
   * Parameter by canonical name, alias or tag; unrecognized parameters by
   * their raw key.
   */
  get(key: HeaderKey): Parameter | undefined {
    const resolved = this.registry.resolve(key);
    if (resolved.recognized) return this.params.get(resolved.name);
    return this.extras.get(resolved.rawName);
  }

  has(key: HeaderKey): boolean {
    return this.get(key) !== undefined;
  }

  /** Recognized parameter names in registry order. */
  names(): string[] {
    return [...this.params.keys()];
  }

  get parameters(): ReadonlyMap<string, Parameter> {
    return this.params;
  }

  get unrecognized(): ReadonlyMap<string, Parameter> {
    return this.extras;
  }

  get size(): number {
    return this.params.size;
  }

  /** Required parameters this sequence lacks, in registry order. */
  missingRequired(): string[] {
    return this.registry.required.filter((name) => !this.params.has(name));
  }

  isFullySpecified(): boolean {
    return this.missingRequired().length === 0;
  }

  /** Acquired with more than one echo time. */
  get multiEcho(): boolean {
    const echo = this.params.get('EchoTime');
    return echo !== undefined && echo.value.kind === 'vector' && echo.value.value.length > 1;
  }

  [Symbol.iterator](): Iterator<Parameter> {
    return this.params.values();
  }

  toString(): string {
    const fields = [...this.params.values()].map(
      (p) => `${p.acronym ?? p.name}=${formatValue(p.value)}`
    );
    return `${this.name}(${fields.join(', ')})`;
  }
}

/**
 * First identifying parameter with a usable value.
 */
function deriveName(
  parameters: ReadonlyMap<string, Parameter>,
  registry: ParameterRegistry
): string | undefined {
  for (const field of registry.identifyingParameters) {
    const parameter = parameters.get(field);
    if (parameter === undefined || parameter.value.kind === 'raw') continue;
    const text = String(plainValue(parameter.value) ?? '').trim();
    if (text.length > 0) return text;
  }
  return undefined;
}
