import type {
  FieldAttributes,
  FieldSpecInput,
  FieldSpecMap,
  NormalizedField,
  ValidateOptions,
  ValidatedValues,
} from '../domain/model/FieldSpec.js';
import type { FieldErrors } from '../domain/model/ErrorRecord.js';
import type { CheckResult } from '../domain/model/TypeDefinition.js';
import type { ParamSource } from '../domain/ports/ParamSource.js';
import type { StructuredExtractor } from '../domain/ports/StructuredExtractor.js';
import { ConfigurationError, isConfigurationError } from '../domain/errors/FieldwiseError.js';
import type { FieldProcessor } from '../domain/services/FieldProcessor.js';
import { buildSortFields, type SortOptions } from '../domain/services/SortFields.js';
import { toAttributes, type FlagDefaults, type SpecNormalizer } from '../domain/services/SpecNormalizer.js';
import { createLogger } from '../utils/logger.js';
import { ValidationContext } from './ValidationContext.js';

const logger = createLogger('request-validation');

/** Shared machinery and resolved settings handed over by `InputValidator`. */
export interface RequestSettings {
  readonly normalizer: SpecNormalizer;
  readonly processor: FieldProcessor;
  readonly extractors: ReadonlyMap<string, StructuredExtractor>;
  readonly defaults: FlagDefaults;
  readonly errorClass: string;
  readonly sort: SortOptions;
}

function isAttributeMap(spec: FieldSpecInput): spec is FieldAttributes {
  return typeof spec === 'object' && !(spec instanceof RegExp) && !Array.isArray(spec);
}

/**
 * Validation bound to one request's parameters.
 *
 * Every `validate*` call starts from a clean error set; the helpers
 * (`errorFor`, `errorClass`, ...) answer for the most recent call.
 */
export class RequestValidation {
  private readonly context: ValidationContext;

  constructor(
    private readonly source: ParamSource,
    private readonly settings: RequestSettings,
  ) {
    this.context = new ValidationContext(source, settings.extractors);
  }

  /**
   * Validate a single field and return its value.
   *
   * `extra` attributes are merged into shorthand specs; an attribute-map spec
   * is used as is.
   */
  validateOne(name: string, spec: FieldSpecInput, extra?: FieldAttributes): unknown {
    const attributes = extra && !isAttributeMap(spec) ? { ...toAttributes(spec), ...extra } : spec;
    return this.validateMany({ [name]: attributes })[name];
  }

  /**
   * Validate several fields. Fields are all normalized before any is
   * processed, so a configuration error leaves no partial result. An error
   * thrown while processing clears the errors recorded so far.
   *
   * @throws ConfigurationError for an unknown type, filter argument or selector kind.
   */
  validateMany(fields: FieldSpecMap, options: ValidateOptions = {}): ValidatedValues {
    this.context.reset();

    const defaults: FlagDefaults = {
      optional: options.optional ?? this.settings.defaults.optional,
      skipundef: options.skipundef ?? this.settings.defaults.skipundef,
    };
    const planned = this.plan(fields, defaults);

    const result: ValidatedValues = {};
    try {
      for (const field of planned) {
        const raws = this.context.fetch(field.name, field.selector);
        const outcome = this.settings.processor.process(field, raws, this.context.errors);
        if (!outcome.omit) result[field.name] = outcome.value;
      }
    } catch (error) {
      // an aborted call leaves no errors behind
      this.context.errors.clear();
      if (isConfigurationError(error)) {
        logger.error({ ...error.detail }, error.message);
      }
      throw error;
    }

    logger.debug({ fields: planned.length, errors: this.context.errors.count() }, 'request validated');
    return result;
  }

  /** `validateMany` plus the page, rows, order-by and order-direction fields. */
  validateSorted(
    columns: readonly string[] | undefined,
    fields: FieldSpecMap = {},
    options?: ValidateOptions,
  ): ValidatedValues {
    return this.validateMany({ ...fields, ...buildSortFields(columns, this.settings.sort) }, options);
  }

  errorFor(name: string, index?: number): CheckResult {
    return this.context.errors.errorFor(name, index);
  }

  allErrors(): Record<string, FieldErrors> {
    return this.context.errors.all();
  }

  errorCount(): number {
    return this.context.errors.count();
  }

  /** CSS classes for an invalid field, `''` for a valid one. */
  errorClass(name: string, ...classes: string[]): string {
    if (!this.context.errors.has(name)) return '';
    const errorClass = this.settings.errorClass;
    return (errorClass === '' ? classes : [errorClass, ...classes]).join(' ');
  }

  /** Raw input: `fallback` when absent, the value, or every value when repeated. */
  rawValue(name: string, fallback?: string): string | readonly string[] | undefined {
    const values = this.source.values(name);
    if (values.length === 0) return fallback;
    return values.length === 1 ? values[0] : values;
  }

  private plan(fields: FieldSpecMap, defaults: FlagDefaults): NormalizedField[] {
    const planned: NormalizedField[] = [];

    try {
      for (const [name, spec] of Object.entries(fields)) {
        const attributes = toAttributes(spec);
        if (this.isSkipped(attributes)) continue;

        const field = this.settings.normalizer.normalize(name, attributes, defaults);
        if (field.selector && !this.settings.extractors.has(field.selector.kind)) {
          throw new ConfigurationError(`No extractor registered for selector "${field.selector.kind}"`, {
            field: name,
            kind: field.selector.kind,
          });
        }
        planned.push(field);
      }
    } catch (error) {
      if (isConfigurationError(error)) {
        logger.error({ ...error.detail }, error.message);
      }
      throw error;
    }

    return planned;
  }

  private isSkipped(attributes: FieldAttributes): boolean {
    const { skip } = attributes;
    return typeof skip === 'function' ? skip(this.source) : skip === true;
  }
}
