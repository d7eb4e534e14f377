import type { CheckResult, TypeDefinition } from '../model/TypeDefinition.js';
import { checkPresent } from './common.js';

/** Codes prepended to numbers typed without them. */
export interface PhoneDefaults {
  readonly country: string;
  readonly region: string;
}

/**
 * Normalise a phone number to `+<digits>[p|w<extension>]`.
 *
 * Separators are dropped, `.` and `,` become a wait marker (`w`). Numbers
 * shorter than 11 digits get the region, then the country code prepended.
 * Fewer than 10 digits after that gives `undefined`.
 */
export function parsePhone(raw: string, defaults: PhoneDefaults): string | undefined {
  const cleaned = raw
    .trim()
    .replace(/[.,]/g, 'w')
    .replace(/[^0-9pw]/gi, '')
    .replace(/w{2,}/gi, 'w')
    .replace(/p{2,}/gi, 'p');
  if (cleaned === '') return undefined;

  const match = /^(\d+)([wp])?(\d+)?$/i.exec(cleaned);
  if (!match?.[1]) return undefined;

  const [, , pause, extension] = match;
  let phone = match[1];
  if (defaults.region && phone.length < 11) phone = defaults.region + phone;
  if (defaults.country && phone.length < 11) phone = defaults.country + phone;
  if (phone.length < 10) return undefined;

  return `+${phone}${pause ? pause.toLowerCase() : ''}${extension ?? ''}`;
}

export function checkPhone(value: unknown): CheckResult {
  const present = checkPresent(value, 'Value not defined');
  if (present) return present;

  const text = String(value);
  if (!/^\+\d/.test(text)) return 'The number should be in the format +...';
  if (!/^\+\d{11}/.test(text)) return 'The number must be a minimum of 11 digits';
  if (!/^\+\d{11,16}(?:\D|$)/.test(text)) return 'The number should be no more than 16 digits';
  if (!/^\+\d{11,16}(?:[pw]\d+)?$/.test(text)) return 'Wrong format';
  return 0;
}

export function phoneTypes(defaults: PhoneDefaults): Record<string, TypeDefinition> {
  return {
    phone: { pre: (raw) => parsePhone(raw, defaults), valid: checkPhone },
  };
}
