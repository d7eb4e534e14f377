import type { CheckResult, TypeDefinition } from '../model/TypeDefinition.js';
import { Address } from '../model/Address.js';
import { checkLat, checkLon } from './numbers.js';

export function checkAddress(value: unknown, secret: string): CheckResult {
  if (value === undefined || value === null) return 'Value not defined';
  if (!(value instanceof Address) || !value.address) return 'Wrong format';

  const lon = checkLon(value.lon);
  if (lon) return lon;

  const lat = checkLat(value.lat);
  if (lat) return lat;

  if (!value.verify(secret)) return 'Unknown source';
  return 0;
}

/** `address`: text or JSON address with coordinates, signature-checked when `secret` is set. */
export function addressTypes(secret: string): Record<string, TypeDefinition> {
  return {
    address: { pre: (raw) => Address.parse(raw), valid: (value) => checkAddress(value, secret) },
  };
}
