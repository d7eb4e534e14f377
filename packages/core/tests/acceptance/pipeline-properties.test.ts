import { describe, it, expect } from 'vitest';
import { InputValidator } from '../../src/InputValidator.js';
import { RecordParamSource, type ParamValue } from '../../src/infrastructure/sources/RecordParamSource.js';
import { ConfigurationError } from '../../src/domain/errors/FieldwiseError.js';
import { min } from '../../src/domain/filters/builtin.js';

const validator = new InputValidator();

function request(params: Record<string, ParamValue> = {}) {
  return validator.forRequest(new RecordParamSource(params));
}

describe('validation pipeline', () => {
  describe('defaults and optional fields', () => {
    it('should substitute the default without recording an error', () => {
      const r = request({ age: 'abc' });

      expect(r.validateMany({ age: { type: 'int', default: 18 } })).toEqual({ age: 18 });
      expect(r.errorCount()).toBe(0);
    });

    it('should report a missing required field', () => {
      const r = request();
      const result = r.validateMany({ age: 'int' });

      expect(result).toHaveProperty('age', undefined);
      expect(r.errorFor('age')).toBe('Value is not defined');
    });

    it('should stay silent for missing or blank optional fields', () => {
      const r = request({ b: '   ' });
      r.validateMany({ a: '?int', b: 'maybe[int]' });

      expect(r.errorCount()).toBe(0);
    });

    it('should report garbage in an optional field', () => {
      const r = request({ a: 'abc' });
      r.validateMany({ a: '?int' });

      expect(r.errorFor('a')).toBe('Value is not defined');
    });

    it('should take per-call flag defaults from options', () => {
      const r = request();
      r.validateMany({ a: 'int', b: '!int' }, { optional: true });

      expect(r.errorFor('a')).toBe(0);
      expect(r.errorFor('b')).toBe('Value is not defined');
    });
  });

  describe('arrays', () => {
    it('should keep one slot per element and index the errors', () => {
      const r = request({ ids: ['1', 'x', '3'] });

      expect(r.validateMany({ ids: '@int' })).toEqual({ ids: [1, undefined, 3] });
      expect(r.errorFor('ids', 1)).toBe('Value is not defined');
      expect(r.errorFor('ids', 0)).toBe(0);
    });

    it('should drop undefined elements with skipundef', () => {
      const r = request({ ids: ['1', 'x', '3'] });

      expect(r.validateMany({ ids: 'skipundef[@int]' })).toEqual({ ids: [1, 3] });
      expect(r.errorFor('ids', 1)).toBe('Value is not defined');
    });

    it('should treat the prefix and bracket markers alike', () => {
      const params = { ids: ['4', '5'] };

      expect(request(params).validateMany({ ids: '@int' })).toEqual(request(params).validateMany({ ids: 'array[int]' }));
      expect(request({ ids: '4' }).validateMany({ ids: 'array[int]' })).toEqual({ ids: [4] });
    });

    it('should return an array for a repeated scalar parameter', () => {
      expect(request({ tag: ['a', 'b'] }).validateMany({ tag: 'str' })).toEqual({ tag: ['a', 'b'] });
    });

    it('should report an empty required array', () => {
      const r = request();

      expect(r.validateMany({ ids: '@int' })).toEqual({ ids: [] });
      expect(r.errorFor('ids')).toBe('Empty array');
    });
  });

  it('should omit an undefined scalar with skipundef', () => {
    const r = request({ b: '2' });

    expect(Object.keys(r.validateMany({ a: '~int', b: '~int' }))).toEqual(['b']);
  });

  it('should map the boolean token set', () => {
    const r = request({ a: '1', b: 'True', c: 'YES', d: '0', e: 'no', f: 'false' });

    expect(r.validateMany({ a: 'bool', b: 'bool', c: 'bool', d: 'bool', e: 'bool', f: 'bool' })).toEqual({
      a: true,
      b: true,
      c: true,
      d: false,
      e: false,
      f: false,
    });
    expect(r.errorCount()).toBe(0);
  });

  it('should report an unknown boolean token unless a default is set', () => {
    const r = request({ a: 'maybe', b: 'maybe' });

    expect(r.validateMany({ a: 'bool', b: { type: 'bool', default: false } })).toEqual({ a: undefined, b: false });
    expect(r.errorFor('a')).toBe('Wrong format');
    expect(r.errorFor('b')).toBe(0);
  });

  it('should throw for an unknown type and keep no errors from the call', () => {
    const r = request();
    r.validateMany({ a: 'int' });
    expect(r.errorCount()).toBe(1);

    expect(() => r.validateMany({ a: 'int', b: 'nope' })).toThrow(ConfigurationError);
    expect(r.errorCount()).toBe(0);
  });

  it('should throw for a malformed filter argument whatever the input', () => {
    const strict = new InputValidator({ filters: { atLeast: min } });

    for (const input of ['x', '5']) {
      const r = strict.forRequest(new RecordParamSource({ n: input }));

      expect(() => r.validateMany({ a: 'int', n: { type: 'str', atLeast: 'abc' } })).toThrow(
        'Filter "atLeast" of field "n" expects a number',
      );
      expect(r.errorCount()).toBe(0);
    }
  });

  it('should throw for a selector kind with no extractor', () => {
    expect(() => request().validateMany({ a: { type: 'str', jpath: '/a' } })).toThrow(
      'No extractor registered for selector "jpath"',
    );
  });

  describe('filters', () => {
    it('should record the failing filter', () => {
      const r = request({ age: '3' });

      expect(r.validateMany({ age: { type: 'int', min: 10 } })).toEqual({ age: undefined });
      expect(r.allErrors()['age']).toMatchObject({
        code: 'FILTER_FAILED',
        filter: 'min',
        message: 'Value should not be less than 10',
        original: '3',
      });
    });

    it('should accept a RegExp shorthand', () => {
      const r = request({ good: '123', bad: 'AB1' });

      expect(r.validateMany({ good: /^\d+$/, bad: /^\d+$/ })).toEqual({ good: '123', bad: undefined });
      expect(r.errorFor('bad')).toBe('Wrong format');
    });

    it('should accept a list shorthand', () => {
      const r = request({ good: 'red', bad: 'blue' });

      expect(r.validateMany({ good: ['red', 'green'], bad: ['red', 'green'] })).toEqual({ good: 'red', bad: undefined });
      expect(r.errorFor('bad')).toBe('Wrong value');
    });
  });

  it('should accept a function shorthand as post', () => {
    const result = request({ name: '  ada ' }).validateMany({ name: (value) => String(value).trim().toUpperCase() });

    expect(result).toEqual({ name: 'ADA' });
  });

  describe('validateOne', () => {
    it('should return the single value', () => {
      expect(request({ page: '2' }).validateOne('page', 'int')).toBe(2);
    });

    it('should merge extra attributes into a shorthand spec', () => {
      const r = request({ page: '2' });

      expect(r.validateOne('page', 'int', { max: 1 })).toBeUndefined();
      expect(r.errorFor('page')).toBe('Value should not be greater than 1');
    });
  });

  it('should leave out skipped fields', () => {
    const result = request({ a: '1', b: '2' }).validateMany({
      a: 'int',
      b: { type: 'int', skip: true },
      c: { type: 'int', skip: (source) => source.values('c').length === 0 },
    });

    expect(Object.keys(result)).toEqual(['a']);
  });

  it('should return raw values', () => {
    const r = request({ a: '1', b: ['x', 'y'] });

    expect(r.rawValue('a')).toBe('1');
    expect(r.rawValue('b')).toEqual(['x', 'y']);
    expect(r.rawValue('c', 'fallback')).toBe('fallback');
    expect(r.rawValue('c')).toBeUndefined();
  });

  it('should build error classes for invalid fields only', () => {
    const r = request({ b: '1' });
    r.validateMany({ a: 'int', b: 'int' });

    expect(r.errorClass('a')).toBe('field-with-error');
    expect(r.errorClass('a', 'wide', 'dark')).toBe('field-with-error wide dark');
    expect(r.errorClass('b', 'wide')).toBe('');
  });
});
