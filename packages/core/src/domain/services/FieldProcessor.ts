import type { NormalizedField } from '../model/FieldSpec.js';
import type { ErrorRecordCode } from '../model/ErrorRecord.js';
import { emptyArrayRecord } from '../model/ErrorRecord.js';
import type { ErrorAccumulator } from './ErrorAccumulator.js';

/** Result of running one field through the pipeline. */
export interface FieldOutcome {
  /** `true` when `skipundef` removes the key from the output map. */
  readonly omit: boolean;
  readonly value: unknown;
}

interface Failure {
  readonly raw: string | undefined;
  readonly intermediate: unknown;
  readonly message: string;
  readonly code: ErrorRecordCode;
  readonly filter?: string;
}

const BLANK = /^\s*$/;

function isBlank(raw: string | undefined): boolean {
  return raw === undefined || BLANK.test(raw);
}

/**
 * Runs the per-field pipeline over the raw values of one field:
 *
 * pre → valid → default substitution → post → filters → assemble.
 *
 * A failing element outputs the field's `default`; the filters still run on
 * the post-transformed default after a failed `valid`. Its error is recorded
 * unless a default is defined, or the field is optional and the raw element
 * was absent or blank.
 */
export class FieldProcessor {
  process(field: NormalizedField, raws: readonly string[], errors: ErrorAccumulator): FieldOutcome {
    const inputs: ReadonlyArray<string | undefined> = raws.length === 0 && !field.array ? [undefined] : raws;
    const array = field.array || inputs.length > 1;

    const outputs: unknown[] = [];
    inputs.forEach((raw, position) => {
      const output = this.element(field, raw, array ? position : undefined, errors);
      if (!(field.skipundef && output === undefined)) outputs.push(output);
    });

    if (array && !field.optional && raws.length === 0) {
      errors.record(emptyArrayRecord(field.name), false);
    }

    if (array) return { omit: false, value: outputs };

    const value = outputs[0];
    return { omit: field.skipundef && value === undefined, value };
  }

  private element(
    field: NormalizedField,
    raw: string | undefined,
    index: number | undefined,
    errors: ErrorAccumulator,
  ): unknown {
    const post = (value: unknown): unknown => (field.post ? field.post(value) : value);

    if (raw === undefined && field.absentIsDefault) return post(field.default);

    const intermediate = raw !== undefined && field.pre ? field.pre(raw) : raw;
    const invalid = field.valid ? field.valid(intermediate) : 0;
    if (invalid) {
      this.fail(field, index, errors, { raw, intermediate, message: invalid, code: 'INVALID_VALUE' });
    }

    // An element that failed `valid` still runs the filters on its default, but records one error at most.
    const output = post(invalid ? field.default : intermediate);
    for (const step of field.filters) {
      const failed = step.fn(output, step.argument);
      if (failed) {
        if (!invalid) {
          this.fail(field, index, errors, {
            raw,
            intermediate,
            message: failed,
            code: 'FILTER_FAILED',
            filter: step.name,
          });
        }
        return field.default;
      }
    }
    return output;
  }

  private fail(field: NormalizedField, index: number | undefined, errors: ErrorAccumulator, failure: Failure): void {
    if (field.default !== undefined) return;
    if (field.optional && isBlank(failure.raw)) return;

    errors.record(
      {
        field: field.name,
        index,
        original: failure.raw,
        intermediate: failure.intermediate,
        message: failure.message,
        code: failure.code,
        filter: failure.filter,
      },
      index !== undefined,
    );
  }
}
