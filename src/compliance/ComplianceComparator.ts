/**
 * ComplianceComparator: parameter-by-parameter comparison of acquisitions.
 *
 * Evaluates a subset of parameters (the registry's required set plus any
 * extras) on two sides and reports every parameter that differs. A parameter
 * missing from either side, or present without a value, is a mismatch unless
 * the registry marks it optional-for-comparison. Mismatches follow the subset
 * order, so the same inputs always give the same report.
 */

import { getLogger } from '../logging/logger.js';
import { isEmptyValue } from '../parameter/coercion.js';
import { evaluateRule } from '../parameter/equivalence.js';
import { formatValue } from '../parameter/Parameter.js';
import { getParameterRegistry, type ParameterRegistry } from '../registry/ParameterRegistry.js';
import type { ImagingProtocol } from '../protocol/ImagingProtocol.js';
import type { ImagingSequence } from '../sequence/ImagingSequence.js';
import { ABSENT, type AbsentValue, type Parameter, type ParameterValue } from '../types/parameter.js';

const log = getLogger('compliance');

// ============================================================================
// Types
// ============================================================================

export type MismatchReason = 'absent' | 'unequal';

export interface Mismatch {
  name: string;
  valueA: ParameterValue | AbsentValue;
  valueB: ParameterValue | AbsentValue;
  reason: MismatchReason;
  unitA?: string;
  unitB?: string;
}

export interface ComparisonResult {
  compliant: boolean;
  mismatches: readonly Mismatch[];
  /** Parameters present on both sides and checked with their rule */
  evaluated: readonly string[];
  /** Optional-for-comparison parameters missing from a side */
  skipped: readonly string[];
}

export interface CompareOptions {
  registry?: ParameterRegistry | undefined;
  /** Names added to the required set (aliases accepted) */
  extraParameters?: readonly string[] | undefined;
  /** Replaces the required set as the base subset */
  parameters?: readonly string[] | undefined;
}

export interface SequenceComparison {
  name: string;
  result: ComparisonResult;
}

export interface ProtocolComparison {
  compliant: boolean;
  /** Sequences present in both protocols, in reference order */
  sequences: readonly SequenceComparison[];
  /** Reference sequences the candidate lacks */
  missing: readonly string[];
  /** Candidate sequences the reference lacks */
  extra: readonly string[];
}

// ============================================================================
// Subset
// ============================================================================

/**
 * Names to evaluate: the base subset in order, then extras in the order
 * given, each resolved to its canonical name and de-duplicated.
 */
export function evaluationSubset(registry: ParameterRegistry, options: CompareOptions = {}): string[] {
  const base = options.parameters ?? registry.required;
  const subset: string[] = [];
  for (const raw of [...base, ...(options.extraParameters ?? [])]) {
    const resolved = registry.resolve(raw);
    const name = resolved.recognized ? resolved.name : resolved.rawName;
    if (name.length > 0 && !subset.includes(name)) subset.push(name);
  }
  return subset;
}

// ============================================================================
// Comparison
// ============================================================================

function unitFields(side: 'A' | 'B', parameter: Parameter | undefined): Pick<Mismatch, 'unitA' | 'unitB'> {
  if (parameter?.unit === undefined) return {};
  return side === 'A' ? { unitA: parameter.unit } : { unitB: parameter.unit };
}

/** A parameter with no value counts as missing. */
function present(parameter: Parameter | undefined): Parameter | undefined {
  return parameter !== undefined && !isEmptyValue(parameter.value) ? parameter : undefined;
}

/**
 * Compare two parameter maps keyed by canonical name (or raw key for
 * unrecognized parameters).
 */
export function compareParameterSets(
  a: ReadonlyMap<string, Parameter>,
  b: ReadonlyMap<string, Parameter>,
  options: CompareOptions = {}
): ComparisonResult {
  const registry = options.registry ?? getParameterRegistry();
  const mismatches: Mismatch[] = [];
  const evaluated: string[] = [];
  const skipped: string[] = [];

  for (const name of evaluationSubset(registry, options)) {
    const pa = present(a.get(name));
    const pb = present(b.get(name));

    if (pa === undefined || pb === undefined) {
      if (registry.isOptionalForComparison(name)) {
        skipped.push(name);
        continue;
      }
      mismatches.push({
        name,
        valueA: pa?.value ?? ABSENT,
        valueB: pb?.value ?? ABSENT,
        reason: 'absent',
        ...unitFields('A', pa),
        ...unitFields('B', pb),
      });
      continue;
    }

    evaluated.push(name);
    if (!evaluateRule(pa.rule, pa.value, pb.value)) {
      mismatches.push({
        name,
        valueA: pa.value,
        valueB: pb.value,
        reason: 'unequal',
        ...unitFields('A', pa),
        ...unitFields('B', pb),
      });
    }
  }

  return { compliant: mismatches.length === 0, mismatches, evaluated, skipped };
}

function lookupOf(sequence: ImagingSequence): ReadonlyMap<string, Parameter> {
  return new Map([...sequence.unrecognized, ...sequence.parameters]);
}

/**
 * Compare two sequences.
 */
export function compareSequences(
  a: ImagingSequence,
  b: ImagingSequence,
  options: CompareOptions = {}
): ComparisonResult {
  const result = compareParameterSets(lookupOf(a), lookupOf(b), options);
  log.debug(
    { a: a.name, b: b.name, compliant: result.compliant, mismatches: result.mismatches.length },
    'compared sequences'
  );
  return result;
}

export function isCompliant(a: ImagingSequence, b: ImagingSequence, options: CompareOptions = {}): boolean {
  return compareSequences(a, b, options).compliant;
}

/**
 * Compare every reference sequence with the candidate sequence of the same
 * name. Each pair is checked on its own.
 */
export function compareProtocols(
  reference: ImagingProtocol,
  candidate: ImagingProtocol,
  options: CompareOptions = {}
): ProtocolComparison {
  const sequences: SequenceComparison[] = [];
  const missing: string[] = [];

  for (const sequence of reference) {
    if (!candidate.has(sequence.name)) {
      missing.push(sequence.name);
      continue;
    }
    sequences.push({
      name: sequence.name,
      result: compareSequences(sequence, candidate.get(sequence.name), options),
    });
  }
  const extra = candidate.sequenceNames().filter((name) => !reference.has(name));
  const compliant =
    missing.length === 0 && extra.length === 0 && sequences.every((s) => s.result.compliant);

  if (!compliant) {
    log.info(
      { reference: reference.name, candidate: candidate.name, missing, extra },
      'protocols differ'
    );
  }
  return { compliant, sequences, missing, extra };
}

function sideText(value: ParameterValue | AbsentValue, unit: string | undefined): string {
  const text = formatValue(value);
  return unit !== undefined && value.kind !== 'absent' ? `${text} ${unit}` : text;
}

/**
 * One-line description, e.g. "RepetitionTime: 2000 ms vs 2300 ms (unequal)".
 */
export function formatMismatch(mismatch: Mismatch): string {
  const a = sideText(mismatch.valueA, mismatch.unitA);
  const b = sideText(mismatch.valueB, mismatch.unitB);
  return `${mismatch.name}: ${a} vs ${b} (${mismatch.reason})`;
}
