import type { CheckResult, TypeDefinition } from '../model/TypeDefinition.js';
import { createLogger } from '../../utils/logger.js';
import { isAbsent } from './common.js';

const logger = createLogger('json-type');

/** Decode a JSON parameter. Unparseable or blank input gives `undefined`. */
export function parseJson(raw: string): unknown {
  if (raw === '') return undefined;
  try {
    const value: unknown = JSON.parse(raw);
    return value;
  } catch (error) {
    logger.warn({ err: error }, 'unparseable JSON parameter');
    return undefined;
  }
}

export function checkJson(value: unknown): CheckResult {
  return isAbsent(value) ? 'Wrong format' : 0;
}

export function jsonTypes(): Record<string, TypeDefinition> {
  return {
    json: { pre: parseJson, valid: checkJson },
  };
}
