import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@fieldwise/core';
import { CssExtractor } from '../../../src/infrastructure/extractors/CssExtractor.js';
import type { MarkupElement } from '../../../src/domain/model/MarkupNode.js';

const PAGE = `
<div id="main" class="list wide">
  <h1>Title</h1>
  <ul>
    <li class="item">One</li>
    <li class="item active" data-id="2">Two</li>
    <li>Three</li>
  </ul>
  <p><span>Para</span> text</p>
</div>`;

describe('CssExtractor', () => {
  const extractor = new CssExtractor();
  const parsed = extractor.parse(PAGE);

  function select(selector: string, document: MarkupElement | undefined = parsed): readonly string[] {
    if (!document) throw new Error('page did not parse');
    return extractor.select(document, selector);
  }

  it('should match type selectors ignoring case', () => {
    expect(select('li')).toEqual(['One', 'Two', 'Three']);
    expect(select('LI')).toEqual(['One', 'Two', 'Three']);
  });

  it('should match classes and ids', () => {
    expect(select('li.item')).toEqual(['One', 'Two']);
    expect(select('.item.active')).toEqual(['Two']);
    expect(select('#main h1')).toEqual(['Title']);
  });

  it('should match attribute presence and value', () => {
    expect(select('li[data-id]')).toEqual(['Two']);
    expect(select('li[data-id="2"]')).toEqual(['Two']);
    expect(select('li[data-id=3]')).toEqual([]);
  });

  it('should distinguish child and descendant combinators', () => {
    expect(select('#main > h1')).toEqual(['Title']);
    expect(select('#main > li')).toEqual([]);
    expect(select('div li')).toEqual(['One', 'Two', 'Three']);
    expect(select('ul > *')).toEqual(['One', 'Two', 'Three']);
  });

  it('should return group matches in document order', () => {
    expect(select('p, h1')).toEqual(['Title', 'Para text']);
  });

  it('should reject unsupported syntax', () => {
    expect(() => select('li:first-child')).toThrow(ConfigurationError);
    expect(() => select('h1 + ul')).toThrow(ConfigurationError);
    expect(() => select('li,')).toThrow(ConfigurationError);
  });

  it('should find nothing in a body without markup', () => {
    expect(extractor.parse('plain text')).toBeUndefined();
  });

  it('should select inside deeply nested markup', () => {
    const deep = extractor.parse('<a>'.repeat(3000) + 'x');

    const matches = select('a > a', deep);

    expect(matches).toHaveLength(2999);
    expect(matches[2998]).toBe('x');
  });
});
