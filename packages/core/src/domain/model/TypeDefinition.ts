/** `0` when a value is acceptable, otherwise a human-readable error message. */
export type CheckResult = 0 | string;

/** Parsing step applied to a defined raw value before validation. */
export type PreFn = (raw: string) => unknown;

/** Validation step. Returns `0` for a valid value or an error message. */
export type ValidFn = (value: unknown) => CheckResult;

/** Output step applied after validation (or to the substituted default). */
export type PostFn = (value: unknown) => unknown;

/**
 * Behaviour bundle registered under a type name.
 *
 * Every step is optional: a type with no `valid` accepts anything, a type with
 * no `post` returns the intermediate value unchanged.
 */
export interface TypeDefinition {
  readonly pre?: PreFn;
  readonly valid?: ValidFn;
  readonly post?: PostFn;
  /** Used as the field default when the field spec does not set one. */
  readonly default?: unknown;
  /**
   * When `true`, an absent raw value resolves to the default without being
   * validated. HTML forms omit unchecked checkboxes, so `bool` sets this.
   */
  readonly absentIsDefault?: boolean;
}

/** Scalar accepted as a filter argument or enumeration member. */
export type FilterScalar = string | number | boolean;

/** Closed set of argument shapes a filter can receive. */
export type FilterArgument =
  | FilterScalar
  | RegExp
  | readonly [number, number]
  | readonly FilterScalar[];

/** Extra constraint applied to the post-transformed value. */
export type FilterFn = (value: unknown, argument: FilterArgument) => CheckResult;
