/** Machine-readable codes for errors thrown by the engine. */
export type FieldwiseErrorCode = 'CONFIGURATION';

/** Base class for every error the engine throws. Value errors are never thrown; see `ErrorRecord`. */
export class FieldwiseError extends Error {
  readonly code: FieldwiseErrorCode;

  constructor(code: FieldwiseErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A programming mistake in a field specification or in the engine setup:
 * unknown type, unknown extractor, malformed sort columns, and so on.
 *
 * Aborts the whole validation call; no partial output is produced.
 */
export class ConfigurationError extends FieldwiseError {
  /** Structured context about the offending setting (field name, type name, ...). */
  readonly detail: Readonly<Record<string, unknown>>;

  constructor(message: string, detail: Readonly<Record<string, unknown>> = {}) {
    super('CONFIGURATION', message);
    this.detail = detail;
  }
}

/** Narrow an unknown thrown value to a `ConfigurationError`. */
export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}
