import type { FilterFn, TypeDefinition } from './domain/model/TypeDefinition.js';
import type { ParamSource } from './domain/ports/ParamSource.js';
import type { StructuredExtractor } from './domain/ports/StructuredExtractor.js';
import { ConfigurationError } from './domain/errors/FieldwiseError.js';
import { createBuiltinFilters } from './domain/filters/builtin.js';
import { FieldProcessor } from './domain/services/FieldProcessor.js';
import { FilterRegistry } from './domain/services/FilterRegistry.js';
import type { SortFieldNames } from './domain/services/SortFields.js';
import { SpecNormalizer } from './domain/services/SpecNormalizer.js';
import { TypeRegistry } from './domain/services/TypeRegistry.js';
import { createBuiltinTypes, type Clock } from './domain/types/index.js';
import { RequestValidation, type RequestSettings } from './application/RequestValidation.js';

/** Settings for an `InputValidator`. Every field is optional. */
export interface InputValidatorConfig {
  /** Extra or replacement types, registered after the built-ins. */
  readonly types?: Readonly<Record<string, TypeDefinition>>;
  /** Extra or replacement filters, registered after the built-ins. */
  readonly filters?: Readonly<Record<string, FilterFn>>;
  /** Structured-body extractors, keyed by their `kind`. */
  readonly extractors?: readonly StructuredExtractor[];
  /** CSS class returned by `errorClass()` for invalid fields. Default: `'field-with-error'`. */
  readonly errorClass?: string;
  /** Default `optional` flag for fields that leave it unset. Default: `false`. */
  readonly optional?: boolean;
  /** Default `skipundef` flag for fields that leave it unset. Default: `false`. */
  readonly skipundef?: boolean;
  /**
   * Output names of the sort fields. Defaults: `page`, `rws`, `oby`, `ods`.
   * `null` leaves a field out.
   */
  readonly sort?: Partial<SortFieldNames>;
  /** Default rows per page. Default: `25`. */
  readonly rows?: number;
  /** Default order direction. Default: `'ASC'`. */
  readonly orderDirection?: string;
  /** Country code prepended to short phone numbers. Default: `''`. */
  readonly phoneCountry?: string;
  /** Region code prepended to short phone numbers. Default: `''`. */
  readonly phoneRegion?: string;
  /** Output format of `date`; `null` returns the `Date`. Default: `'%F'`. */
  readonly dateFormat?: string | null;
  /** Output format of `time`; `null` returns the `Date`. Default: `'%T'`. */
  readonly timeFormat?: string | null;
  /** Output format of `datetime`; `null` returns the `Date`. Default: `'%F %T %z'`. */
  readonly datetimeFormat?: string | null;
  /** Secret for address signatures. Empty disables the check. Default: `''`. */
  readonly addressSecret?: string;
  /** Minimum `password` length. Default: `8`. */
  readonly passwordMin?: number;
  /** Clock for relative and time-only dates. Default: system time. */
  readonly clock?: Clock;
}

/**
 * Entry point: owns the type and filter registries and the resolved settings,
 * and hands out request-scoped validations.
 *
 * Create one per process and configure it during start-up.
 *
 * @example
 * ```typescript
 * const validator = new InputValidator({ rows: 50 });
 * const request = validator.forRequest(new SearchParamsSource('id=42&tag=a&tag=b'));
 * const { id, tag } = request.validateMany({ id: 'int', tag: '@str' });
 * if (request.errorCount() > 0) console.log(request.allErrors());
 * ```
 */
export class InputValidator {
  private readonly types: TypeRegistry;
  private readonly filters: FilterRegistry;
  private readonly settings: RequestSettings;

  constructor(config: InputValidatorConfig = {}) {
    this.types = new TypeRegistry(
      createBuiltinTypes({
        passwordMin: config.passwordMin ?? 8,
        phone: { country: config.phoneCountry ?? '', region: config.phoneRegion ?? '' },
        dateFormats: {
          date: config.dateFormat === undefined ? '%F' : config.dateFormat,
          time: config.timeFormat === undefined ? '%T' : config.timeFormat,
          datetime: config.datetimeFormat === undefined ? '%F %T %z' : config.datetimeFormat,
        },
        addressSecret: config.addressSecret ?? '',
        clock: config.clock,
      }),
    );
    for (const [name, definition] of Object.entries(config.types ?? {})) {
      this.types.set(name, definition);
    }

    this.filters = new FilterRegistry(createBuiltinFilters());
    for (const [name, fn] of Object.entries(config.filters ?? {})) {
      this.filters.set(name, fn);
    }

    const names = config.sort ?? {};
    this.settings = {
      normalizer: new SpecNormalizer(this.types, this.filters),
      processor: new FieldProcessor(),
      extractors: new Map(
        (config.extractors ?? []).map((extractor): [string, StructuredExtractor] => [extractor.kind, extractor]),
      ),
      defaults: { optional: config.optional ?? false, skipundef: config.skipundef ?? false },
      errorClass: config.errorClass ?? 'field-with-error',
      sort: {
        names: {
          page: names.page === undefined ? 'page' : names.page,
          rows: names.rows === undefined ? 'rws' : names.rows,
          orderBy: names.orderBy === undefined ? 'oby' : names.orderBy,
          orderDirection: names.orderDirection === undefined ? 'ods' : names.orderDirection,
        },
        rows: config.rows ?? 25,
        orderDirection: config.orderDirection ?? 'ASC',
      },
    };
  }

  /**
   * Look up a type, or register one when `definition` is given.
   *
   * @throws ConfigurationError when looking up an unknown type.
   */
  getOrSetType(name: string, definition?: TypeDefinition): TypeDefinition {
    if (definition) return this.types.set(name, definition);

    const existing = this.types.get(name);
    if (!existing) throw new ConfigurationError(`Type "${name}" is not defined`, { type: name });
    return existing;
  }

  /**
   * Look up a filter, or register one when `fn` is given.
   *
   * @throws ConfigurationError when looking up an unknown filter.
   */
  getOrSetFilter(name: string, fn?: FilterFn): FilterFn {
    if (fn) return this.filters.set(name, fn);

    const existing = this.filters.get(name);
    if (!existing) throw new ConfigurationError(`Filter "${name}" is not defined`, { filter: name });
    return existing;
  }

  /** Start validating one request's parameters. */
  forRequest(source: ParamSource): RequestValidation {
    return new RequestValidation(source, this.settings);
  }
}
