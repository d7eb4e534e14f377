import type { CheckResult, TypeDefinition } from '../model/TypeDefinition.js';
import { checkPresent, trim } from './common.js';

// 'A' → 10, 'B' → 11, ...
const LETTER_SHIFT = 'A'.charCodeAt(0) - 10;

const INN_10_WEIGHTS = [2, 4, 10, 3, 5, 9, 4, 6, 8] as const;
const INN_11_WEIGHTS = [7, 2, 4, 10, 3, 5, 9, 4, 6, 8] as const;
const INN_12_WEIGHTS = [3, 7, 2, 4, 10, 3, 5, 9, 4, 6, 8] as const;

/** Keep letters and digits only, upper-cased. */
export function parseIsin(raw: string): string {
  return raw.replace(/[^a-zA-Z0-9]/g, '').toUpperCase();
}

/** Luhn checksum over the number with letters expanded to two digits. Card numbers and ISINs both pass through here. */
export function checkIsin(value: unknown): CheckResult {
  const present = checkPresent(value, 'Value not defined', 'Value not set');
  if (present) return present;

  const text = String(value);
  if (!/^[A-Z0-9]+$/.test(text)) return 'Wrong format';

  const digits = text.replace(/[A-Z]/g, (letter) => String(letter.charCodeAt(0) - LETTER_SHIFT));
  let sum = 0;
  [...digits].reverse().forEach((char, i) => {
    let digit = Number(char);
    if (i % 2 === 1) digit *= 2;
    if (digit > 9) digit -= 9;
    sum += digit;
  });

  return sum % 10 === 0 ? 0 : 'Checksum error';
}

function innControl(digits: readonly number[], weights: readonly number[]): number {
  const sum = weights.reduce((acc, weight, i) => acc + weight * (digits[i] ?? 0), 0);
  return (sum % 11) % 10;
}

/** RU taxpayer number: 10 digits (organisations) or 12 (individuals) with control digits. */
export function checkInn(value: unknown): CheckResult {
  const present = checkPresent(value, 'Value not defined', 'Value not set');
  if (present) return present;

  const text = String(value);
  if (!/^(?:\d{10}|\d{12})$/.test(text)) return 'Wrong format';

  const digits = [...text].map(Number);
  if (digits.length === 10) {
    return innControl(digits, INN_10_WEIGHTS) === digits[9] ? 0 : 'Checksum error';
  }
  const valid =
    innControl(digits, INN_11_WEIGHTS) === digits[10] && innControl(digits, INN_12_WEIGHTS) === digits[11];
  return valid ? 0 : 'Checksum error';
}

/** RU registration reason code: nine digits. */
export function checkKpp(value: unknown): CheckResult {
  const present = checkPresent(value, 'Value not defined', 'Value not set');
  if (present) return present;
  if (!/^\d{9}$/.test(String(value))) return 'Wrong format';
  return 0;
}

export function identifierTypes(): Record<string, TypeDefinition> {
  return {
    isin: { pre: parseIsin, valid: checkIsin },
    inn: { pre: trim, valid: checkInn },
    kpp: { pre: trim, valid: checkKpp },
  };
}
