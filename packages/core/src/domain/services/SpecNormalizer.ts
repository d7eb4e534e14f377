import type {
  FieldAttributes,
  FieldSpecInput,
  FilterStep,
  NormalizedField,
  StructuredSelector,
} from '../model/FieldSpec.js';
import type { FilterArgument, FilterScalar, TypeDefinition } from '../model/TypeDefinition.js';
import { ConfigurationError } from '../errors/FieldwiseError.js';
import type { TypeRegistry } from './TypeRegistry.js';
import type { FilterRegistry } from './FilterRegistry.js';
import { parseShortcut } from './ShortcutGrammar.js';
import { checkFilterArgument } from '../filters/builtin.js';

/** Attribute keys with a fixed meaning; never treated as filter names. */
const RESERVED_KEYS: ReadonlySet<string> = new Set([
  'type',
  'pre',
  'valid',
  'post',
  'default',
  'optional',
  'array',
  'skipundef',
  'skip',
  'selector',
  'jpath',
  'cpath',
  'xpath',
]);

const SELECTOR_KEYS = ['jpath', 'cpath', 'xpath'] as const;

function isScalar(value: unknown): value is string | number | boolean {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function isFilterArgument(value: unknown): value is FilterArgument {
  if (isScalar(value) || value instanceof RegExp) return true;
  return Array.isArray(value) && value.every(isScalar);
}

function isEnumeration(input: FieldSpecInput): input is readonly FilterScalar[] {
  return Array.isArray(input);
}

/** Expand the shorthand spec forms into the attribute map. */
export function toAttributes(input: FieldSpecInput): FieldAttributes {
  if (typeof input === 'string') return { type: input };
  if (input instanceof RegExp) return { regexp: input };
  if (typeof input === 'function') return { post: input };
  if (isEnumeration(input)) return { in: input };
  return input;
}

/** Resolved per-call defaults for the two global flags. */
export interface FlagDefaults {
  readonly optional: boolean;
  readonly skipundef: boolean;
}

/**
 * Turns a field spec into a `NormalizedField`: expands shorthands, parses
 * shortcut markers, merges the registered type underneath the explicit
 * attributes, and builds the ordered filter list.
 */
export class SpecNormalizer {
  constructor(
    private readonly types: TypeRegistry,
    private readonly filters: FilterRegistry,
  ) {}

  /** @throws ConfigurationError for an unknown type, or a filter argument of the wrong shape. */
  normalize(name: string, attributes: FieldAttributes, defaults: FlagDefaults): NormalizedField {
    let optional = attributes.optional ?? defaults.optional;
    let skipundef = attributes.skipundef ?? defaults.skipundef;
    let array = attributes.array ?? false;
    let type: string | undefined;
    let definition: TypeDefinition = {};

    if (attributes.type !== undefined) {
      const shortcut = parseShortcut(attributes.type);
      type = shortcut.type;
      optional = shortcut.optional ?? optional;
      array = shortcut.array ?? array;
      skipundef = shortcut.skipundef ?? skipundef;

      const registered = this.types.get(type);
      if (!registered) {
        throw new ConfigurationError(`Type "${type}" is not defined`, { field: name, type });
      }
      definition = registered;
    }

    return {
      name,
      type,
      pre: attributes.pre ?? definition.pre,
      valid: attributes.valid ?? definition.valid,
      post: attributes.post ?? definition.post,
      default: attributes.default !== undefined ? attributes.default : definition.default,
      absentIsDefault: definition.absentIsDefault ?? false,
      optional,
      array,
      skipundef,
      selector: this.selector(name, attributes),
      filters: this.filterSteps(name, attributes),
    };
  }

  private selector(name: string, attributes: FieldAttributes): StructuredSelector | undefined {
    if (attributes.selector) return attributes.selector;

    const shorthands = SELECTOR_KEYS.filter((key) => attributes[key] !== undefined);
    if (shorthands.length > 1) {
      throw new ConfigurationError(`Field "${name}" declares more than one selector`, { field: name, shorthands });
    }

    const kind = shorthands[0];
    if (kind === undefined) return undefined;
    return { kind, path: attributes[kind] ?? '' };
  }

  private filterSteps(name: string, attributes: FieldAttributes): FilterStep[] {
    const steps: FilterStep[] = [];

    for (const [key, argument] of Object.entries(attributes)) {
      if (RESERVED_KEYS.has(key) || argument === undefined) continue;

      const fn = this.filters.get(key);
      if (!fn) continue;

      if (!isFilterArgument(argument)) {
        throw new ConfigurationError(`Filter "${key}" of field "${name}" has an unsupported argument`, {
          field: name,
          filter: key,
        });
      }
      checkFilterArgument(fn, argument, key, name);
      steps.push({ name: key, fn, argument });
    }

    return steps;
  }
}
