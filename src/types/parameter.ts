/**
 * Parameter types - the value model for a single acquisition setting.
 *
 * A parameter value is a closed tagged union. Sources hand us loosely typed
 * values (header entries, dictionary values, XML text); coercion turns them
 * into one of these variants, or into the `raw` fallback when that fails.
 */

/**
 * Value as it arrives from a header mapping, dictionary or XML block.
 */
export type RawValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | ReadonlyArray<string | number>;

/**
 * Value kind a registry entry declares for a parameter.
 */
export type ParameterKind = 'number' | 'string' | 'enum' | 'vector';

export interface NumberValue {
  kind: 'number';
  value: number;
}

export interface StringValue {
  kind: 'string';
  value: string;
}

/**
 * Enumerated symbol, stored upper-cased and trimmed.
 */
export interface EnumValue {
  kind: 'enum';
  value: string;
}

export interface VectorValue {
  kind: 'vector';
  value: readonly number[];
}

/**
 * Fallback for values that could not be coerced to the declared kind, and for
 * every value of an unrecognized parameter.
 */
export interface RawParameterValue {
  kind: 'raw';
  value: string | number | boolean | null | ReadonlyArray<string | number>;
  reason: string;
}

export type ParameterValue =
  | NumberValue
  | StringValue
  | EnumValue
  | VectorValue
  | RawParameterValue;

/**
 * Sentinel used in mismatch records for the side that lacks a parameter.
 */
export interface AbsentValue {
  kind: 'absent';
}

export const ABSENT: AbsentValue = Object.freeze({ kind: 'absent' });

// ============================================================================
// Equivalence rules
// ============================================================================

/**
 * Identical after normalization (strings case-folded, whitespace removed).
 */
export interface ExactRule {
  type: 'exact';
}

/**
 * |a - b| <= tolerance, element-wise for vectors.
 */
export interface ToleranceRule {
  type: 'tolerance';
  tolerance: number;
}

/**
 * Values naming the same axis are equal, whatever encoding they use.
 */
export interface AxisRule {
  type: 'axis';
  /** Axis name -> interchangeable encodings of that axis */
  axes: Readonly<Record<string, readonly string[]>>;
}

/**
 * Values in the same class of a fixed partition are equal.
 */
export interface SetRule {
  type: 'set';
  classes: ReadonlyArray<readonly string[]>;
}

export type EquivalenceRule = ExactRule | ToleranceRule | AxisRule | SetRule;

export type EquivalenceRuleType = EquivalenceRule['type'];

// ============================================================================
// Parameter
// ============================================================================

/**
 * A single named acquisition setting.
 */
export interface Parameter {
  /** Canonical name, or the trimmed source key when unrecognized */
  readonly name: string;
  readonly value: ParameterValue;
  readonly unit?: string;
  readonly rule: EquivalenceRule;
  /** Whether the name was resolved through the registry */
  readonly recognized: boolean;
  /** Short display name (TR, TE, ...) */
  readonly acronym?: string;
}
