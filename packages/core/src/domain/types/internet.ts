import type { CheckResult, TypeDefinition } from '../model/TypeDefinition.js';
import { checkPresent, trim } from './common.js';

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const SCHEME = /^[a-z][a-z\d+.-]*:/i;

export function checkEmail(value: unknown): CheckResult {
  const present = checkPresent(value, 'Value not defined');
  if (present) return present;
  if (!EMAIL_PATTERN.test(String(value))) return 'Wrong format';
  return 0;
}

export function checkUrl(value: unknown): CheckResult {
  const present = checkPresent(value, 'Value not defined');
  if (present) return present;

  const text = String(value);
  if (!SCHEME.test(text)) return 'Protocol not set';
  if (!URL.canParse(text)) return 'Wrong format';
  if (new URL(text).host === '') return 'Host not set';
  return 0;
}

/** `email` (trimmed address) and `url` (returned as a `URL`). */
export function internetTypes(): Record<string, TypeDefinition> {
  return {
    email: { pre: trim, valid: checkEmail },
    url: {
      pre: trim,
      valid: checkUrl,
      post: (value) => (typeof value === 'string' && URL.canParse(value) ? new URL(value) : value),
    },
  };
}
