// Main entry point
export { InputValidator } from './InputValidator.js';
export type { InputValidatorConfig } from './InputValidator.js';
export { RequestValidation } from './application/RequestValidation.js';
export { ValidationContext } from './application/ValidationContext.js';

// Domain model
export type {
  CheckResult,
  PreFn,
  ValidFn,
  PostFn,
  TypeDefinition,
  FilterScalar,
  FilterArgument,
  FilterFn,
} from './domain/model/TypeDefinition.js';
export type {
  StructuredSelector,
  FieldAttributes,
  FieldSpecInput,
  FieldSpecMap,
  FilterStep,
  NormalizedField,
  ValidateOptions,
  ValidatedValues,
} from './domain/model/FieldSpec.js';
export type { ErrorRecord, ErrorRecordCode, FieldErrors } from './domain/model/ErrorRecord.js';
export { emptyArrayRecord } from './domain/model/ErrorRecord.js';
export { Address, signAddress } from './domain/model/Address.js';
export type { Coordinate } from './domain/model/Address.js';

// Errors
export { FieldwiseError, ConfigurationError, isConfigurationError } from './domain/errors/FieldwiseError.js';
export type { FieldwiseErrorCode } from './domain/errors/FieldwiseError.js';

// Domain services (for building custom pipelines)
export { TypeRegistry } from './domain/services/TypeRegistry.js';
export { FilterRegistry } from './domain/services/FilterRegistry.js';
export { parseShortcut } from './domain/services/ShortcutGrammar.js';
export type { ShortcutResult } from './domain/services/ShortcutGrammar.js';
export { SpecNormalizer, toAttributes } from './domain/services/SpecNormalizer.js';
export type { FlagDefaults } from './domain/services/SpecNormalizer.js';
export { FieldProcessor } from './domain/services/FieldProcessor.js';
export type { FieldOutcome } from './domain/services/FieldProcessor.js';
export { ErrorAccumulator } from './domain/services/ErrorAccumulator.js';
export { buildSortFields, orderByColumn } from './domain/services/SortFields.js';
export type { SortFieldNames, SortOptions } from './domain/services/SortFields.js';

// Built-in types and filters
export { createBuiltinTypes } from './domain/types/index.js';
export type { BuiltinTypeOptions, Clock, DateFormats, PhoneDefaults } from './domain/types/index.js';
export { parseDate, formatDate } from './domain/types/datetime.js';
export { parseBool } from './domain/types/boolean.js';
export { parsePhone } from './domain/types/phone.js';
export { createBuiltinFilters, min, max, range, regexp, inList, size } from './domain/filters/builtin.js';

// Ports (for custom implementations)
export type { ParamSource } from './domain/ports/ParamSource.js';
export type { StructuredExtractor } from './domain/ports/StructuredExtractor.js';

// Infrastructure
export { RecordParamSource } from './infrastructure/sources/RecordParamSource.js';
export type { ParamValue, RecordParamSourceOptions } from './infrastructure/sources/RecordParamSource.js';
export { SearchParamsSource } from './infrastructure/sources/SearchParamsSource.js';

// Logging
export { createLogger, getLogger } from './utils/logger.js';
