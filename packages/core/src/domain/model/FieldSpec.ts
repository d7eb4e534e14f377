import type {
  FilterArgument,
  FilterFn,
  FilterScalar,
  PostFn,
  PreFn,
  ValidFn,
} from './TypeDefinition.js';
import type { ParamSource } from '../ports/ParamSource.js';

/** Alternate raw-value source: a path into a structured request body. */
export interface StructuredSelector {
  /** Extractor kind registered in the validator config (e.g. `'jpath'`). */
  readonly kind: string;
  /** Path expression understood by that extractor. */
  readonly path: string;
}

/** Full attribute form of a field spec. */
export interface FieldAttributes {
  /** Registered type name, possibly wrapped in shortcut markers (`'@int'`, `'maybe[str]'`). */
  readonly type?: string;
  readonly pre?: PreFn;
  readonly valid?: ValidFn;
  readonly post?: PostFn;
  /** Value used when validation fails or the value is absent. A defined default suppresses every error. */
  readonly default?: unknown;
  /** When `true`, an absent or blank value is not an error. */
  readonly optional?: boolean;
  /** Force an array result even for a single raw value. */
  readonly array?: boolean;
  /** Drop `undefined` outputs (array entries, or the scalar key itself). */
  readonly skipundef?: boolean;
  /** Leave the field out of the call entirely. */
  readonly skip?: boolean | ((source: ParamSource) => boolean);
  /** Read raw values through a structured extractor instead of the flat params. */
  readonly selector?: StructuredSelector;
  /** Shorthand for `selector: { kind: 'jpath', path }`. */
  readonly jpath?: string;
  /** Shorthand for `selector: { kind: 'cpath', path }`. */
  readonly cpath?: string;
  /** Shorthand for `selector: { kind: 'xpath', path }`. */
  readonly xpath?: string;
  readonly min?: number;
  readonly max?: number;
  readonly range?: readonly [number, number];
  readonly regexp?: RegExp | string;
  readonly in?: readonly FilterScalar[];
  readonly size?: readonly [number, number];
  /** Arguments for filters registered at runtime. */
  readonly [filter: string]: unknown;
}

/**
 * Every accepted way to describe a field:
 * - a type name (shortcut markers allowed),
 * - a `RegExp` (same as `{ regexp }`),
 * - a function (same as `{ post }`),
 * - a list of literals (same as `{ in }`),
 * - the full attribute map.
 */
export type FieldSpecInput = string | RegExp | PostFn | readonly FilterScalar[] | FieldAttributes;

/** A map of field name to spec, as passed to `validateMany`. */
export type FieldSpecMap = Readonly<Record<string, FieldSpecInput>>;

/** One filter to run on the post-transformed value. */
export interface FilterStep {
  readonly name: string;
  readonly fn: FilterFn;
  readonly argument: FilterArgument;
}

/** A field spec after shorthand expansion, shortcut parsing and type resolution. */
export interface NormalizedField {
  readonly name: string;
  /** Type name after stripping shortcut markers, if a type was given. */
  readonly type?: string;
  readonly pre?: PreFn;
  readonly valid?: ValidFn;
  readonly post?: PostFn;
  readonly default: unknown;
  readonly absentIsDefault: boolean;
  readonly optional: boolean;
  readonly array: boolean;
  readonly skipundef: boolean;
  readonly selector?: StructuredSelector;
  /** Filters in attribute-key order. */
  readonly filters: readonly FilterStep[];
}

/** Per-call defaults for fields that leave a flag unset. */
export interface ValidateOptions {
  readonly optional?: boolean;
  readonly skipundef?: boolean;
}

/** Output of a validation call: field name to coerced value. */
export type ValidatedValues = Record<string, unknown>;
