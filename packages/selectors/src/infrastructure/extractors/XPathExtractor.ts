import { ConfigurationError, createLogger, type StructuredExtractor } from '@fieldwise/core';
import type { MarkupElement } from '../../domain/model/MarkupNode.js';
import { childElements, descendantElements, parseMarkup, textContent } from '../markup/parseMarkup.js';

const logger = createLogger('xpath');

const STEP = /^(\/\/|\/)?\s*(@\*|@[\w:.-]+|text\(\)|\*|[A-Za-z_][\w:.-]*)\s*((?:\[[^\]]*\]\s*)*)/;
const PREDICATE = /\[([^\]]*)\]/g;
const ATTRIBUTE_EQUALS = /^@([\w:.-]+)\s*=\s*(?:"([^"]*)"|'([^']*)')$/;

type Axis = 'child' | 'descendant';

type Predicate =
  | { readonly kind: 'position'; readonly position: number }
  | { readonly kind: 'attribute'; readonly name: string; readonly value?: string };

interface Step {
  readonly axis: Axis;
  readonly test: string;
  readonly predicates: readonly Predicate[];
}

function parsePredicate(expression: string, path: string): Predicate {
  const text = expression.trim();
  if (/^\d+$/.test(text)) return { kind: 'position', position: Number(text) };

  const named = /^@([\w:.-]+)$/.exec(text);
  if (named?.[1] !== undefined) return { kind: 'attribute', name: named[1] };

  const equals = ATTRIBUTE_EQUALS.exec(text);
  if (equals?.[1] !== undefined) return { kind: 'attribute', name: equals[1], value: equals[2] ?? equals[3] ?? '' };

  throw new ConfigurationError(`Unsupported XPath predicate "[${expression}]" in "${path}"`, { path });
}

function parsePath(path: string): Step[] {
  const steps: Step[] = [];
  let rest = path.trim();

  while (rest !== '') {
    const match = STEP.exec(rest);
    if (!match || match[0] === '' || match[2] === undefined || (steps.length > 0 && match[1] === undefined)) {
      throw new ConfigurationError(`Unsupported XPath expression "${path}"`, { path });
    }

    const predicates = [...(match[3] ?? '').matchAll(PREDICATE)].map((predicate) =>
      parsePredicate(predicate[1] ?? '', path),
    );
    steps.push({ axis: match[1] === '//' ? 'descendant' : 'child', test: match[2], predicates });
    rest = rest.slice(match[0].length);
  }

  if (steps.length === 0) throw new ConfigurationError('Empty XPath expression', { path });
  return steps;
}

function satisfies(element: MarkupElement, predicate: Predicate): boolean {
  if (predicate.kind === 'position') return true;
  return predicate.value === undefined
    ? Object.hasOwn(element.attributes, predicate.name)
    : element.attributes[predicate.name] === predicate.value;
}

/** Elements the step selects below one context element, predicates applied per parent. */
function stepElements(context: MarkupElement, step: Step): MarkupElement[] {
  const parents = step.axis === 'child' ? [context] : [context, ...descendantElements(context)];
  const result: MarkupElement[] = [];

  for (const parent of parents) {
    let candidates = childElements(parent).filter((child) => step.test === '*' || child.name === step.test);
    for (const predicate of step.predicates) {
      candidates =
        predicate.kind === 'position'
          ? candidates.filter((_, index) => index + 1 === predicate.position)
          : candidates.filter((candidate) => satisfies(candidate, predicate));
    }
    result.push(...candidates);
  }
  return result;
}

/** Attribute or text values the final step selects below one context element. */
function stepValues(context: MarkupElement, step: Step): string[] {
  const owners = step.axis === 'child' ? [context] : [context, ...descendantElements(context)];

  if (step.test === 'text()') {
    return owners.flatMap((owner) => owner.children.flatMap((child) => (child.type === 'text' ? [child.value] : [])));
  }

  const name = step.test.slice(1);
  return owners.flatMap((owner) =>
    Object.entries(owner.attributes)
      .filter(([attribute]) => name === '*' || attribute === name)
      .map(([, value]) => value),
  );
}

/**
 * `xpath` selector over an XML or HTML request body.
 *
 * Supported subset: absolute and relative location paths with `/` and `//`,
 * name and `*` tests, `[n]`, `[@attr]` and `[@attr="value"]` predicates, and a
 * final `@attr`, `@*` or `text()` step. Elements yield their text content.
 */
export class XPathExtractor implements StructuredExtractor<MarkupElement> {
  readonly kind = 'xpath';

  parse(body: string): MarkupElement | undefined {
    const document = parseMarkup(body);
    if (!document) logger.warn('request body contains no markup');
    return document;
  }

  select(document: MarkupElement, path: string): readonly string[] {
    const steps = parsePath(path);
    const order = new Map(
      descendantElements(document).map((element, index): [MarkupElement, number] => [element, index]),
    );

    let current: MarkupElement[] = [document];
    for (const [position, step] of steps.entries()) {
      const final = position === steps.length - 1;

      if (step.test === 'text()' || step.test.startsWith('@')) {
        if (!final) return [];
        return current.flatMap((context) => stepValues(context, step));
      }

      const next = new Set(current.flatMap((context) => stepElements(context, step)));
      current = [...next].sort((a, b) => (order.get(a) ?? 0) - (order.get(b) ?? 0));
    }

    return current.map(textContent);
  }
}
