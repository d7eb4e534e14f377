/** Machine-readable codes for recorded value errors. */
export type ErrorRecordCode = 'INVALID_VALUE' | 'FILTER_FAILED' | 'EMPTY_ARRAY';

/** A recorded (non-fatal) validation failure for one field or one array element. */
export interface ErrorRecord {
  /** Name of the field that failed. */
  readonly field: string;
  /** Element position, present only for array fields. */
  readonly index?: number;
  /** Raw input as received. */
  readonly original: string | undefined;
  /** Value after `pre`, before default substitution. */
  readonly intermediate: unknown;
  /** Human-readable error message. */
  readonly message: string;
  readonly code: ErrorRecordCode;
  /** Name of the failing filter (for `FILTER_FAILED`). */
  readonly filter?: string;
}

/** Errors of one field: a single record, or one per failing element for array fields. */
export type FieldErrors = ErrorRecord | readonly ErrorRecord[];

/** Create the record for a required array field that received no values. */
export function emptyArrayRecord(field: string): ErrorRecord {
  return { field, original: undefined, intermediate: undefined, message: 'Empty array', code: 'EMPTY_ARRAY' };
}
