import { ConfigurationError, createLogger, type StructuredExtractor } from '@fieldwise/core';

const logger = createLogger('jpath');
const ARRAY_INDEX = /^(?:0|[1-9]\d*)$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function unescapeToken(token: string): string {
  return token.replace(/~1/g, '/').replace(/~0/g, '~');
}

/**
 * `jpath` selector: RFC 6901 JSON Pointer into a JSON request body.
 *
 * A pointer yields at most one value. Strings are returned as is, numbers and
 * booleans stringified, objects and arrays as JSON text; `null` and missing
 * paths yield nothing.
 */
export class JsonPointerExtractor implements StructuredExtractor<unknown> {
  readonly kind = 'jpath';

  parse(body: string): unknown {
    if (body.trim() === '') return undefined;
    try {
      const document: unknown = JSON.parse(body);
      return document;
    } catch (error) {
      logger.warn({ err: error }, 'request body is not valid JSON');
      return undefined;
    }
  }

  select(document: unknown, path: string): readonly string[] {
    if (path !== '' && !path.startsWith('/')) {
      throw new ConfigurationError(`JSON pointer "${path}" must be empty or start with "/"`, { path });
    }

    let value = document;
    for (const token of path === '' ? [] : path.slice(1).split('/').map(unescapeToken)) {
      if (Array.isArray(value)) {
        value = ARRAY_INDEX.test(token) ? value[Number(token)] : undefined;
      } else if (isRecord(value) && Object.hasOwn(value, token)) {
        value = value[token];
      } else {
        return [];
      }
    }

    if (value === undefined || value === null) return [];
    if (typeof value === 'string') return [value];
    if (typeof value === 'number' || typeof value === 'boolean') return [String(value)];
    return [JSON.stringify(value)];
  }
}
