import { ConfigurationError } from '../errors/FieldwiseError.js';

const SHORTCUT = /^([!?@~]|(?:array|maybe|optional|required?|skipundef)\[)(.*?)\]?$/i;

/** Flags forced by shortcut markers, plus the bare type name left after stripping them. */
export interface ShortcutResult {
  readonly type: string;
  readonly optional?: boolean;
  readonly array?: boolean;
  readonly skipundef?: boolean;
}

/**
 * Expand a compact type expression.
 *
 * | Marker | Effect |
 * |---|---|
 * | `!`, `required[…]`, `require[…]` | optional = false |
 * | `?`, `optional[…]`, `maybe[…]` | optional = true |
 * | `@`, `array[…]` | array = true |
 * | `skipundef[…]` | skipundef = true |
 * | `~` | optional = true, skipundef = true |
 *
 * Markers nest and combine: `'@?int'`, `'array[maybe[int]]'`, `'~@str'`.
 *
 * @throws ConfigurationError when a marker wraps nothing or the expression does not reduce.
 */
export function parseShortcut(expression: string): ShortcutResult {
  let type = expression;
  let optional: boolean | undefined;
  let array: boolean | undefined;
  let skipundef: boolean | undefined;

  for (let step = 0; ; step++) {
    if (step > expression.length) {
      throw new ConfigurationError(`Type expression "${expression}" does not reduce to a type name`, { expression });
    }

    const match = SHORTCUT.exec(type);
    if (!match) break;

    const marker = (match[1] ?? '').toLowerCase();
    const inner = match[2] ?? '';
    if (inner === '') {
      throw new ConfigurationError(`Type expression "${expression}" has no type name`, { expression });
    }
    type = inner;

    switch (marker) {
      case '!':
      case 'required[':
      case 'require[':
        optional = false;
        break;
      case '?':
      case 'optional[':
      case 'maybe[':
        optional = true;
        break;
      case '@':
      case 'array[':
        array = true;
        break;
      case 'skipundef[':
        skipundef = true;
        break;
      case '~':
        optional = true;
        skipundef = true;
        break;
    }
  }

  const result: { type: string; optional?: boolean; array?: boolean; skipundef?: boolean } = { type };
  if (optional !== undefined) result.optional = optional;
  if (array !== undefined) result.array = array;
  if (skipundef !== undefined) result.skipundef = skipundef;
  return result;
}
