import type { TypeDefinition } from '../model/TypeDefinition.js';
import { addressTypes } from './address.js';
import { booleanTypes } from './boolean.js';
import { dateTypes, type Clock, type DateFormats } from './datetime.js';
import { identifierTypes } from './identifiers.js';
import { internetTypes } from './internet.js';
import { jsonTypes } from './json.js';
import { numberTypes } from './numbers.js';
import { phoneTypes, type PhoneDefaults } from './phone.js';
import { textTypes } from './text.js';

/** Settings the built-in types close over. */
export interface BuiltinTypeOptions {
  readonly passwordMin: number;
  readonly phone: PhoneDefaults;
  readonly dateFormats: DateFormats;
  readonly addressSecret: string;
  /** Clock for relative and time-only dates. Default: system time. */
  readonly clock?: Clock;
}

/** The full built-in type catalogue, keyed by type name. */
export function createBuiltinTypes(options: BuiltinTypeOptions): Record<string, TypeDefinition> {
  return {
    ...numberTypes(),
    ...textTypes(options.passwordMin),
    ...dateTypes(options.dateFormats, options.clock),
    ...booleanTypes(),
    ...internetTypes(),
    ...phoneTypes(options.phone),
    ...jsonTypes(),
    ...addressTypes(options.addressSecret),
    ...identifierTypes(),
  };
}

export type { Clock, DateFormats } from './datetime.js';
export type { PhoneDefaults } from './phone.js';
