import { describe, it, expect } from 'vitest';
import { ConfigurationError, InputValidator, RecordParamSource, SearchParamsSource } from '@fieldwise/core';
import { CssExtractor, JsonPointerExtractor, XPathExtractor } from '../../src/index.js';

const validator = new InputValidator({
  extractors: [new JsonPointerExtractor(), new CssExtractor(), new XPathExtractor()],
});

describe('structured request bodies', () => {
  it('should read JSON fields next to flat parameters', () => {
    const body = JSON.stringify({ user: { name: ' Ada ', age: 37 } });
    const request = validator.forRequest(new RecordParamSource({ page: '2' }, { body }));

    const result = request.validateMany({
      name: { type: 'str', jpath: '/user/name' },
      age: { type: 'int', jpath: '/user/age', min: 18 },
      nickname: { type: '?str', jpath: '/user/nickname' },
      page: 'int',
    });

    expect(result).toEqual({ name: 'Ada', age: 37, nickname: undefined, page: 2 });
    expect(request.errorCount()).toBe(0);
  });

  it('should report a required field when the JSON body is invalid', () => {
    const request = validator.forRequest(new RecordParamSource({}, { body: '{oops' }));

    request.validateMany({ age: { type: 'int', jpath: '/age' } });

    expect(request.errorFor('age')).toBe('Value is not defined');
  });

  it('should read HTML fields through CSS selectors', () => {
    const body = '<form><ul><li class="pick">3</li><li class="pick">4</li><li>9</li></ul></form>';
    const request = validator.forRequest(new SearchParamsSource('lang=en', body));

    expect(request.validateMany({ picks: { type: '@int', cpath: 'li.pick' }, lang: 'str' })).toEqual({
      picks: [3, 4],
      lang: 'en',
    });
  });

  it('should read XML fields through XPath', () => {
    const body = '<order><item sku="a1" qty="2"/><item sku="b2" qty="1"/></order>';
    const request = validator.forRequest(new RecordParamSource({}, { body }));

    const result = request.validateMany({
      skus: { type: '@str', xpath: '//item/@sku' },
      qty: { type: 'int', xpath: '//item[@sku="b2"]/@qty' },
    });

    expect(result).toEqual({ skus: ['a1', 'b2'], qty: 1 });
  });

  it('should take the selector object form', () => {
    const request = validator.forRequest(new RecordParamSource({}, { body: '{"id":"7"}' }));

    expect(request.validateOne('id', { type: 'int', selector: { kind: 'jpath', path: '/id' } })).toBe(7);
  });

  it('should reject a field with two selectors', () => {
    const request = validator.forRequest(new RecordParamSource({}, { body: '{}' }));

    expect(() => request.validateMany({ a: { type: 'str', jpath: '/a', xpath: '//a' } })).toThrow(ConfigurationError);
  });

  it('should read a body with out-of-range character references', () => {
    const request = validator.forRequest(new RecordParamSource({}, { body: '<a>&#1114112;</a>' }));

    expect(request.validateMany({ a: { type: '?str', cpath: 'a' } })).toEqual({ a: '\uFFFD' });
    expect(request.errorCount()).toBe(0);
  });
});
