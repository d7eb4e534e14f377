import type { CheckResult, TypeDefinition } from '../model/TypeDefinition.js';
import { checkPresent, isAbsent } from './common.js';

const INTEGER = /[-+]?\d+/;
const NUMBER = /[-+]?\d+(?:\.\d*)?/;
const NUMERIC_FORMAT = /^[-+]?\d+(?:\.\d*)?$/;

/** First signed integer found in the text. `'id: 42'` → `'42'`. */
export function parseInteger(raw: string): string | undefined {
  return INTEGER.exec(raw)?.[0];
}

/** First signed decimal found in the text. */
export function parseNumber(raw: string): string | undefined {
  return NUMBER.exec(raw)?.[0];
}

export function checkInt(value: unknown): CheckResult {
  return checkPresent(value);
}

export function checkNumeric(value: unknown): CheckResult {
  const present = checkPresent(value);
  if (present) return present;
  if (!NUMERIC_FORMAT.test(String(value))) return 'Wrong format';
  return 0;
}

export function checkMoney(value: unknown): CheckResult {
  const numeric = checkNumeric(value);
  if (numeric) return numeric;

  const text = String(value);
  if (text.includes('.') && !/\.\d{0,2}$/.test(text)) return 'Invalid fractional part';
  return 0;
}

export function checkPercent(value: unknown): CheckResult {
  const numeric = checkNumeric(value);
  if (numeric) return numeric;

  const n = Number(value);
  if (n < 0) return 'Value must be greater than 0';
  if (n > 100) return 'Value must be less than 100';
  return 0;
}

function checkBounded(value: unknown, limit: number): CheckResult {
  if (isAbsent(value)) return 'Value not defined';

  const numeric = checkNumeric(value);
  if (numeric) return numeric;

  const n = Number(value);
  if (n < -limit) return `Value should not be less than -${limit}°`;
  if (n > limit) return `Value should not be greater than ${limit}°`;
  return 0;
}

/** Longitude in degrees, −180…180. */
export function checkLon(value: unknown): CheckResult {
  return checkBounded(value, 180);
}

/** Latitude in degrees, −90…90. */
export function checkLat(value: unknown): CheckResult {
  return checkBounded(value, 90);
}

function toNumber(value: unknown): unknown {
  return isAbsent(value) ? undefined : Number(value);
}

const decimal = (valid: (value: unknown) => CheckResult): TypeDefinition => ({
  pre: parseNumber,
  valid,
  post: toNumber,
});

/** Integer and decimal types: `int`, `numeric`, `number`, `money`, `percent`, `lon`, `lat`. */
export function numberTypes(): Record<string, TypeDefinition> {
  const numeric = decimal(checkNumeric);

  return {
    int: { pre: parseInteger, valid: checkInt, post: toNumber },
    numeric,
    number: numeric,
    money: decimal(checkMoney),
    percent: decimal(checkPercent),
    lon: decimal(checkLon),
    lat: decimal(checkLat),
  };
}
