import type { CheckResult, TypeDefinition } from '../model/TypeDefinition.js';
import { checkPresent, isAbsent, trim } from './common.js';

const UUID = /^[0-9a-f]{8}-?[0-9a-f]{4}-?[0-9a-f]{4}-?[0-9a-f]{4}-?[0-9a-f]{12}$/i;

export function checkStr(value: unknown): CheckResult {
  return isAbsent(value) ? 'Value is not defined' : 0;
}

export function checkPassword(value: unknown, minLength: number): CheckResult {
  if (isAbsent(value)) return 'Value is not defined';

  const text = String(value);
  if ([...text].length < minLength) return `The length should be greater than ${minLength}`;
  if (!/\d/.test(text) || !/\D/.test(text)) return 'Value must contain characters and digits';
  return 0;
}

export function checkUuid(value: unknown): CheckResult {
  const present = checkPresent(value);
  if (present) return present;
  if (!UUID.test(String(value))) return 'Wrong format';
  return 0;
}

/** Text types: `str` (trimmed), `text` (as is), `password`, `uuid`. */
export function textTypes(passwordMin: number): Record<string, TypeDefinition> {
  return {
    str: { pre: trim, valid: checkStr },
    text: { valid: checkStr },
    password: { valid: (value) => checkPassword(value, passwordMin) },
    uuid: {
      pre: trim,
      valid: checkUuid,
      post: (value) => (typeof value === 'string' ? value.toLowerCase() : value),
    },
  };
}
