import type { CheckResult, FilterArgument, FilterFn, FilterScalar } from '../model/TypeDefinition.js';
import { checkNumeric } from '../types/numbers.js';
import { checkPresent, isAbsent } from '../types/common.js';
import { ConfigurationError } from '../errors/FieldwiseError.js';

function isPair(argument: FilterArgument): argument is readonly [number, number] {
  return Array.isArray(argument) && argument.length === 2 && argument.every((n) => typeof n === 'number');
}

function isScalarList(argument: FilterArgument): argument is readonly FilterScalar[] {
  return Array.isArray(argument);
}

function subject(filter: string, field?: string): string {
  return field === undefined ? `Filter "${filter}"` : `Filter "${filter}" of field "${field}"`;
}

function limit(argument: FilterArgument, filter: string, field?: string): number {
  if (typeof argument === 'number') return argument;
  if (typeof argument === 'string' && argument.trim() !== '' && !Number.isNaN(Number(argument))) {
    return Number(argument);
  }
  throw new ConfigurationError(`${subject(filter, field)} expects a number`, { field, filter });
}

function bounds(argument: FilterArgument, filter: string, field?: string): readonly [number, number] {
  if (!isPair(argument)) {
    throw new ConfigurationError(`${subject(filter, field)} expects a [min, max] pair`, { field, filter });
  }
  return argument;
}

function members(argument: FilterArgument, filter: string, field?: string): readonly FilterScalar[] {
  if (!isScalarList(argument)) {
    throw new ConfigurationError(`${subject(filter, field)} expects a list of values`, { field, filter });
  }
  return argument;
}

function pattern(argument: FilterArgument, filter: string, field?: string): RegExp {
  if (argument instanceof RegExp) return argument;
  try {
    return new RegExp(String(argument));
  } catch (error) {
    throw new ConfigurationError(`${subject(filter, field)} has an invalid pattern`, {
      field,
      filter,
      pattern: String(argument),
      reason: error instanceof Error ? error.message : String(error),
    });
  }
}

/** Error unless `value >= argument`. */
export const min: FilterFn = (value, argument) => {
  const numeric = checkNumeric(value);
  if (numeric) return numeric;

  const bound = limit(argument, 'min');
  return Number(value) >= bound ? 0 : `Value should not be less than ${bound}`;
};

/** Error unless `value <= argument`. */
export const max: FilterFn = (value, argument) => {
  const numeric = checkNumeric(value);
  if (numeric) return numeric;

  const bound = limit(argument, 'max');
  return Number(value) <= bound ? 0 : `Value should not be greater than ${bound}`;
};

/** `min` then `max`; the lower bound's error wins. */
export const range: FilterFn = (value, argument) => {
  const [lo, hi] = bounds(argument, 'range');
  return min(value, lo) || max(value, hi);
};

/** Error unless the value's text matches the pattern. */
export const regexp: FilterFn = (value, argument) => {
  if (isAbsent(value)) return 'Value not defined';

  const compiled = pattern(argument, 'regexp');
  compiled.lastIndex = 0;
  return compiled.test(String(value)) ? 0 : 'Wrong format';
};

/** Error unless the value's text equals the text of one list member. */
export const inList: FilterFn = (value, argument) => {
  const list = members(argument, 'in');
  if (isAbsent(value)) return 'Value not defined';

  const text = String(value);
  return list.some((member) => String(member) === text) ? 0 : 'Wrong value';
};

/** Error unless the character count (code points) lies within `[min, max]`. */
export const size: FilterFn = (value, argument): CheckResult => {
  const [lo, hi] = bounds(argument, 'size');
  const present = checkPresent(value);
  if (present) return present;

  const length = [...String(value)].length;
  if (length < lo) return `Value should not be less than ${lo}`;
  if (length > hi) return `Value should not be longer than ${hi}`;
  return 0;
};

type ArgumentCheck = (argument: FilterArgument, filter: string, field?: string) => unknown;

const ARGUMENT_CHECKS: ReadonlyMap<FilterFn, ArgumentCheck> = new Map<FilterFn, ArgumentCheck>([
  [min, limit],
  [max, limit],
  [range, bounds],
  [size, bounds],
  [regexp, pattern],
  [inList, members],
]);

/**
 * Check the argument shape of a built-in filter when the field is normalized,
 * so a malformed argument fails whatever the input. Other filters pass.
 *
 * @throws ConfigurationError when the argument does not fit the filter.
 */
export function checkFilterArgument(fn: FilterFn, argument: FilterArgument, filter: string, field: string): void {
  ARGUMENT_CHECKS.get(fn)?.(argument, filter, field);
}

/** Built-in filters keyed by attribute name. */
export function createBuiltinFilters(): Record<string, FilterFn> {
  return { min, max, range, regexp, in: inList, size };
}
