import { describe, it, expect, vi } from 'vitest';
import { FieldProcessor } from '../../../../src/domain/services/FieldProcessor.js';
import { ErrorAccumulator } from '../../../../src/domain/services/ErrorAccumulator.js';
import type { NormalizedField } from '../../../../src/domain/model/FieldSpec.js';
import { min } from '../../../../src/domain/filters/builtin.js';

function field(overrides: Partial<NormalizedField>): NormalizedField {
  return {
    name: 'n',
    default: undefined,
    absentIsDefault: false,
    optional: false,
    array: false,
    skipundef: false,
    filters: [],
    ...overrides,
  };
}

const digits: Partial<NormalizedField> = {
  valid: (value) => (typeof value === 'string' && /^\d+$/.test(value) ? 0 : 'Not digits'),
  post: (value) => (value === undefined ? undefined : Number(value)),
};

describe('FieldProcessor', () => {
  const processor = new FieldProcessor();

  it('should run pre, valid and post on a single value', () => {
    const errors = new ErrorAccumulator();
    const outcome = processor.process(field({ ...digits, pre: (raw) => raw.trim() }), [' 42 '], errors);

    expect(outcome).toEqual({ omit: false, value: 42 });
    expect(errors.count()).toBe(0);
  });

  it('should not call pre for an absent value', () => {
    const pre = vi.fn((raw: string) => raw);
    processor.process(field({ ...digits, pre }), [], new ErrorAccumulator());

    expect(pre).not.toHaveBeenCalled();
  });

  it('should record a failure with the raw and intermediate values', () => {
    const errors = new ErrorAccumulator();
    const outcome = processor.process(field({ ...digits, pre: (raw) => raw.toUpperCase() }), ['abc'], errors);

    expect(outcome.value).toBeUndefined();
    expect(errors.all()).toEqual({
      n: {
        field: 'n',
        index: undefined,
        original: 'abc',
        intermediate: 'ABC',
        message: 'Not digits',
        code: 'INVALID_VALUE',
        filter: undefined,
      },
    });
  });

  it('should apply post to a substituted default', () => {
    const errors = new ErrorAccumulator();
    const outcome = processor.process(field({ ...digits, default: '7' }), ['abc'], errors);

    expect(outcome.value).toBe(7);
    expect(errors.count()).toBe(0);
  });

  it('should stay silent for an optional blank value', () => {
    const errors = new ErrorAccumulator();
    processor.process(field({ ...digits, optional: true }), ['   '], errors);

    expect(errors.count()).toBe(0);
  });

  it('should still report bad input on an optional field', () => {
    const errors = new ErrorAccumulator();
    processor.process(field({ ...digits, optional: true }), ['abc'], errors);

    expect(errors.errorFor('n')).toBe('Not digits');
  });

  it('should resolve an absent value to the default without validation', () => {
    const valid = vi.fn(() => 'never');
    const errors = new ErrorAccumulator();
    const outcome = processor.process(field({ valid, default: false, absentIsDefault: true }), [], errors);

    expect(outcome.value).toBe(false);
    expect(valid).not.toHaveBeenCalled();
    expect(errors.count()).toBe(0);
  });

  describe('filters', () => {
    const atLeastTen = { name: 'min', fn: min, argument: 10 };

    it('should run on the post-transformed value', () => {
      const errors = new ErrorAccumulator();
      const outcome = processor.process(field({ ...digits, filters: [atLeastTen] }), ['12'], errors);

      expect(outcome.value).toBe(12);
    });

    it('should output the default and record the filter on failure', () => {
      const errors = new ErrorAccumulator();
      const outcome = processor.process(field({ ...digits, filters: [atLeastTen] }), ['3'], errors);

      expect(outcome.value).toBeUndefined();
      expect(errors.all()['n']).toMatchObject({
        message: 'Value should not be less than 10',
        code: 'FILTER_FAILED',
        filter: 'min',
        original: '3',
      });
    });

    it('should stop at the first failing filter', () => {
      const second = vi.fn(() => 'second');
      const errors = new ErrorAccumulator();
      processor.process(
        field({ ...digits, filters: [atLeastTen, { name: 'other', fn: second, argument: 0 }] }),
        ['3'],
        errors,
      );

      expect(second).not.toHaveBeenCalled();
      expect(errors.errorFor('n')).toBe('Value should not be less than 10');
    });

    it('should run on the defaulted value after a failed validation', () => {
      const fn = vi.fn(() => 0 as const);
      const errors = new ErrorAccumulator();
      const outcome = processor.process(
        field({ ...digits, default: '20', filters: [{ name: 'spy', fn, argument: 0 }] }),
        ['abc'],
        errors,
      );

      expect(fn).toHaveBeenCalledWith(20, 0);
      expect(outcome.value).toBe(20);
      expect(errors.count()).toBe(0);
    });

    it('should output the raw default when the defaulted value fails a filter', () => {
      const errors = new ErrorAccumulator();
      const outcome = processor.process(field({ ...digits, default: '7', filters: [atLeastTen] }), ['abc'], errors);

      expect(outcome.value).toBe('7');
      expect(errors.count()).toBe(0);
    });

    it('should keep the validation error when the default also fails a filter', () => {
      const errors = new ErrorAccumulator();
      processor.process(field({ ...digits, filters: [atLeastTen] }), ['abc'], errors);

      expect(errors.all()['n']).toMatchObject({ message: 'Not digits', code: 'INVALID_VALUE' });
    });
  });

  describe('arrays', () => {
    it('should keep one output per raw value', () => {
      const errors = new ErrorAccumulator();
      const outcome = processor.process(field({ ...digits, array: true }), ['1', 'x', '3'], errors);

      expect(outcome.value).toEqual([1, undefined, 3]);
      expect(errors.errorFor('n', 1)).toBe('Not digits');
      expect(errors.all()['n']).toEqual([expect.objectContaining({ index: 1, original: 'x' })]);
    });

    it('should drop undefined outputs with skipundef', () => {
      const errors = new ErrorAccumulator();
      const outcome = processor.process(field({ ...digits, array: true, skipundef: true }), ['1', 'x', '3'], errors);

      expect(outcome.value).toEqual([1, 3]);
      expect(errors.errorFor('n', 1)).toBe('Not digits');
    });

    it('should turn repeated values into an array', () => {
      const outcome = processor.process(field(digits), ['1', '2'], new ErrorAccumulator());

      expect(outcome.value).toEqual([1, 2]);
    });

    it('should report a required array with no values', () => {
      const errors = new ErrorAccumulator();
      const outcome = processor.process(field({ ...digits, array: true }), [], errors);

      expect(outcome.value).toEqual([]);
      expect(errors.all()['n']).toMatchObject({ message: 'Empty array', code: 'EMPTY_ARRAY' });
    });

    it('should accept an optional array with no values', () => {
      const errors = new ErrorAccumulator();
      processor.process(field({ ...digits, array: true, optional: true }), [], errors);

      expect(errors.count()).toBe(0);
    });
  });

  it('should omit an undefined scalar with skipundef', () => {
    const outcome = processor.process(field({ ...digits, optional: true, skipundef: true }), [], new ErrorAccumulator());

    expect(outcome).toEqual({ omit: true, value: undefined });
  });
});
