import type { CheckResult, TypeDefinition } from '../model/TypeDefinition.js';

const FALSE_TOKENS = /^(?:0|no|false|fail)$/i;
const TRUE_TOKENS = /^(?:1|yes|true|ok)$/i;

/**
 * Map a checkbox / flag token to a boolean. Blank means `false`;
 * an unrecognised token gives `undefined`.
 */
export function parseBool(raw: string): boolean | undefined {
  const token = raw.trim();
  if (token === '' || FALSE_TOKENS.test(token)) return false;
  if (TRUE_TOKENS.test(token)) return true;
  return undefined;
}

export function checkBool(value: unknown): CheckResult {
  return typeof value === 'boolean' ? 0 : 'Wrong format';
}

export function booleanTypes(): Record<string, TypeDefinition> {
  return {
    bool: { pre: parseBool, valid: checkBool, absentIsDefault: true },
  };
}
