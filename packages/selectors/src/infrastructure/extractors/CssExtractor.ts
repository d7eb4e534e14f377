import { ConfigurationError, createLogger, type StructuredExtractor } from '@fieldwise/core';
import type { MarkupElement } from '../../domain/model/MarkupNode.js';
import { childElements, descendantElements, parseMarkup, textContent } from '../markup/parseMarkup.js';

const logger = createLogger('cpath');

const COMPOUND =
  /^(\*|[A-Za-z_][\w:.-]*)?((?:#[\w-]+|\.[\w-]+|\[\s*[\w:.-]+\s*(?:=\s*(?:"[^"]*"|'[^']*'|[^\]\s]+)\s*)?\])*)/;
const QUALIFIER = /#([\w-]+)|\.([\w-]+)|\[\s*([\w:.-]+)\s*(?:=\s*(?:"([^"]*)"|'([^']*)'|([^\]\s]+))\s*)?\]/g;
const SEPARATOR = /^\s*([>,])?\s*/;

type Combinator = 'descendant' | 'child';

interface AttributeTest {
  readonly name: string;
  readonly value?: string;
}

interface Compound {
  readonly tag?: string;
  readonly ids: readonly string[];
  readonly classes: readonly string[];
  readonly attributes: readonly AttributeTest[];
}

interface Step {
  readonly combinator: Combinator;
  readonly compound: Compound;
}

function parseCompound(tag: string | undefined, qualifiers: string): Compound {
  const ids: string[] = [];
  const classes: string[] = [];
  const attributes: AttributeTest[] = [];

  for (const match of qualifiers.matchAll(QUALIFIER)) {
    const [, id, className, attribute, doubleQuoted, singleQuoted, bare] = match;
    if (id !== undefined) ids.push(id);
    else if (className !== undefined) classes.push(className);
    else if (attribute !== undefined) {
      const value = doubleQuoted ?? singleQuoted ?? bare;
      attributes.push(value === undefined ? { name: attribute } : { name: attribute, value });
    }
  }

  return { tag: tag === '*' ? undefined : tag, ids, classes, attributes };
}

/** Split a selector list into its comma groups, each a chain of compound steps. */
function parseSelector(selector: string): Step[][] {
  const groups: Step[][] = [];
  let steps: Step[] = [];
  let combinator: Combinator = 'descendant';
  let rest = selector.trim();

  const unsupported = (): ConfigurationError =>
    new ConfigurationError(`Unsupported CSS selector "${selector}"`, { selector });

  while (rest !== '') {
    const compound = COMPOUND.exec(rest);
    const text = compound?.[0] ?? '';
    if (!compound || text === '') throw unsupported();

    steps.push({ combinator, compound: parseCompound(compound[1], compound[2] ?? '') });
    rest = rest.slice(text.length);

    const separator = SEPARATOR.exec(rest);
    rest = rest.slice(separator?.[0].length ?? 0);
    if (separator?.[1] === ',') {
      groups.push(steps);
      steps = [];
      combinator = 'descendant';
    } else {
      combinator = separator?.[1] === '>' ? 'child' : 'descendant';
    }
  }

  if (steps.length === 0) throw unsupported();
  groups.push(steps);
  return groups;
}

function matches(element: MarkupElement, compound: Compound): boolean {
  if (compound.tag !== undefined && element.name.toLowerCase() !== compound.tag.toLowerCase()) return false;

  const { attributes } = element;
  if (compound.ids.some((id) => attributes['id'] !== id)) return false;

  const classList = (attributes['class'] ?? '').split(/\s+/);
  if (compound.classes.some((className) => !classList.includes(className))) return false;

  return compound.attributes.every((test) =>
    test.value === undefined ? Object.hasOwn(attributes, test.name) : attributes[test.name] === test.value,
  );
}

/**
 * `cpath` selector: CSS selectors over an XML or HTML request body. Returns
 * the text content of every matching element, in document order.
 *
 * Supported: type and `*` selectors, `#id`, `.class`, `[attr]`,
 * `[attr=value]`, descendant and `>` combinators, comma-separated groups.
 * Type selectors ignore case.
 */
export class CssExtractor implements StructuredExtractor<MarkupElement> {
  readonly kind = 'cpath';

  parse(body: string): MarkupElement | undefined {
    const document = parseMarkup(body);
    if (!document) logger.warn('request body contains no markup');
    return document;
  }

  select(document: MarkupElement, path: string): readonly string[] {
    const matched = new Set<MarkupElement>();

    for (const steps of parseSelector(path)) {
      let current: MarkupElement[] = [document];
      for (const { combinator, compound } of steps) {
        const next = new Set<MarkupElement>();
        for (const context of current) {
          const candidates = combinator === 'child' ? childElements(context) : descendantElements(context);
          for (const candidate of candidates) {
            if (matches(candidate, compound)) next.add(candidate);
          }
        }
        current = [...next];
      }
      for (const element of current) matched.add(element);
    }

    return descendantElements(document)
      .filter((element) => matched.has(element))
      .map(textContent);
  }
}
