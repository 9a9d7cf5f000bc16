/**
 * ImagingProtocol: a named, append-only collection of sequences.
 *
 * Sequences are addressed by name only. Adding a name twice is a conflict,
 * never an overwrite; a protocol is the record of a scan session.
 * `addSequence` assumes a single writer per instance.
 */

import { ProtocolError, SequenceConflictError, SequenceNotFoundError } from '../errors.js';
import { getLogger } from '../logging/logger.js';
import type { ParameterRegistry } from '../registry/ParameterRegistry.js';
import { ImagingSequence, type HeaderMapping } from '../sequence/ImagingSequence.js';

const log = getLogger('protocol');

/** Imaging modalities a protocol may describe. */
export const SUPPORTED_CATEGORIES = ['MR'] as const;

export type ProtocolCategory = (typeof SUPPORTED_CATEGORIES)[number];

export interface ProtocolOptions {
  category?: string | undefined;
  metadata?: Readonly<Record<string, string>> | undefined;
  /** Registry used by the dictionary builders */
  registry?: ParameterRegistry | undefined;
}

function isSupportedCategory(category: string): category is ProtocolCategory {
  return SUPPORTED_CATEGORIES.some((c) => c === category);
}

export class ImagingProtocol implements Iterable<ImagingSequence> {
  readonly name: string;
  readonly category: ProtocolCategory;
  readonly metadata: Readonly<Record<string, string>>;
  private readonly sequences = new Map<string, ImagingSequence>();
  private readonly registry: ParameterRegistry | undefined;

  constructor(name: string, options: ProtocolOptions = {}) {
    const category = options.category ?? 'MR';
    if (!isSupportedCategory(category)) {
      throw new ProtocolError(
        'UNSUPPORTED_MODALITY',
        `Unsupported protocol category '${category}'; expected one of ${SUPPORTED_CATEGORIES.join(', ')}`
      );
    }
    this.name = name;
    this.category = category;
    this.metadata = Object.freeze({ ...(options.metadata ?? {}) });
    this.registry = options.registry;
  }

  /**
   * Sequence by name.
   * @throws SequenceNotFoundError when the protocol has no such sequence
   */
  get(name: string): ImagingSequence {
    const sequence = this.sequences.get(name);
    if (!sequence) {
      throw new SequenceNotFoundError(name, this.name);
    }
    return sequence;
  }

  has(name: string): boolean {
    return this.sequences.has(name);
  }

  /**
   * Add a sequence under `name` (trimmed). A sequence carrying another name
   * is stored as a renamed copy.
   * @throws SequenceConflictError when the name is taken
   */
  addSequence(name: string, sequence: ImagingSequence): ImagingSequence {
    const key = name.trim();
    if (key.length === 0) {
      throw new ProtocolError(
        'UNNAMED_SEQUENCE',
        `Cannot add a sequence with an empty name to protocol '${this.name}'`
      );
    }
    if (this.sequences.has(key)) {
      throw new SequenceConflictError(key, this.name);
    }
    const stored = sequence.name === key && !sequence.unnamed ? sequence : sequence.withName(key);
    this.sequences.set(key, stored);
    log.debug({ protocol: this.name, sequence: key }, 'sequence added');
    return stored;
  }

  /**
   * Add a sequence under its own name.
   */
  add(sequence: ImagingSequence): ImagingSequence {
    if (sequence.unnamed) {
      throw new ProtocolError(
        'UNNAMED_SEQUENCE',
        `Cannot add an unnamed sequence to protocol '${this.name}'; supply a name`
      );
    }
    return this.addSequence(sequence.name, sequence);
  }

  addSequenceFromDict(name: string, dict: HeaderMapping): ImagingSequence {
    const sequence = ImagingSequence.fromDict(dict, { name, registry: this.registry });
    return this.addSequence(name, sequence);
  }

  /**
   * Add one sequence per entry of `{ sequenceName: { parameter: value } }`.
   */
  addSequencesFromDict(record: Readonly<Record<string, HeaderMapping>>): ImagingSequence[] {
    return Object.entries(record).map(([name, dict]) => this.addSequenceFromDict(name, dict));
  }

  /** Sequence names in insertion order. */
  sequenceNames(): string[] {
    return [...this.sequences.keys()];
  }

  get size(): number {
    return this.sequences.size;
  }

  get isEmpty(): boolean {
    return this.sequences.size === 0;
  }

  [Symbol.iterator](): Iterator<ImagingSequence> {
    return this.sequences.values();
  }

  toString(): string {
    return `${this.name}(${this.sequenceNames().join(', ')})`;
  }
}
