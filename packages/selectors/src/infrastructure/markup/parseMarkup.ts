import { DOCUMENT_NAME, type MarkupElement, type MarkupNode } from '../../domain/model/MarkupNode.js';

const TOKEN =
  /<!--[\s\S]*?-->|<!\[CDATA\[([\s\S]*?)\]\]>|<![^>]*>|<\?[\s\S]*?\?>|<\/\s*([A-Za-z_][\w:.-]*)\s*>|<([A-Za-z_][\w:.-]*)((?:\s+[^\s=/>]+(?:\s*=\s*(?:"[^"]*"|'[^']*'|[^\s"'>]+))?)*)\s*(\/?)>/g;
const ATTRIBUTE = /([^\s=/>]+)(?:\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'>]+)))?/g;
const ENTITY = /&(?:#(\d+)|#x([0-9a-fA-F]+)|(amp|lt|gt|quot|apos));/g;

const NAMED_ENTITIES: Readonly<Record<string, string>> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
};

/** HTML elements that never have a closing tag. */
const VOID_ELEMENTS: ReadonlySet<string> = new Set([
  'area',
  'base',
  'br',
  'col',
  'embed',
  'hr',
  'img',
  'input',
  'link',
  'meta',
  'source',
  'track',
  'wbr',
]);

const MAX_CODE_POINT = 0x10ffff;
const REPLACEMENT_CHARACTER = '\uFFFD';

/** Character for a numeric reference; U+FFFD outside the Unicode range. */
function fromCodePoint(codePoint: number): string {
  return codePoint <= MAX_CODE_POINT ? String.fromCodePoint(codePoint) : REPLACEMENT_CHARACTER;
}

function decodeEntities(text: string): string {
  return text.replace(ENTITY, (entity, decimal?: string, hex?: string, named?: string) => {
    if (decimal !== undefined) return fromCodePoint(Number(decimal));
    if (hex !== undefined) return fromCodePoint(parseInt(hex, 16));
    return (named !== undefined && NAMED_ENTITIES[named]) || entity;
  });
}

function parseAttributes(text: string): Record<string, string> {
  const attributes: Record<string, string> = {};
  for (const match of text.matchAll(ATTRIBUTE)) {
    const [, name, doubleQuoted, singleQuoted, bare] = match;
    if (name !== undefined) {
      attributes[name] = decodeEntities(doubleQuoted ?? singleQuoted ?? bare ?? '');
    }
  }
  return attributes;
}

function element(name: string, attributes: Record<string, string>): MarkupElement {
  return { type: 'element', name, attributes, children: [] };
}

function appendText(parent: MarkupElement, text: string): void {
  if (text.trim() !== '') parent.children.push({ type: 'text', value: text });
}

/**
 * Build an element tree from XML or HTML text.
 *
 * Lenient: unknown closing tags are ignored, unclosed elements end with their
 * parent, and HTML void elements need no closing tag. Whitespace-only text is
 * dropped. Returns `undefined` when the input contains no element at all.
 */
export function parseMarkup(source: string): MarkupElement | undefined {
  const document = element(DOCUMENT_NAME, {});
  const stack: MarkupElement[] = [document];
  let current = document;
  let cursor = 0;
  let found = false;

  for (const match of source.matchAll(TOKEN)) {
    const start = match.index ?? cursor;
    appendText(current, decodeEntities(source.slice(cursor, start)));
    cursor = start + match[0].length;

    const [, cdata, closing, opening, attributeText, selfClosing] = match;
    if (cdata !== undefined) {
      appendText(current, cdata);
    } else if (closing !== undefined) {
      const depth = stack.map((open) => open.name).lastIndexOf(closing);
      if (depth > 0) {
        stack.length = depth;
        current = stack[depth - 1] ?? document;
      }
    } else if (opening !== undefined) {
      const child = element(opening, parseAttributes(attributeText ?? ''));
      current.children.push(child);
      found = true;
      if (selfClosing !== '/' && !VOID_ELEMENTS.has(opening.toLowerCase())) {
        stack.push(child);
        current = child;
      }
    }
  }
  appendText(current, decodeEntities(source.slice(cursor)));

  return found ? document : undefined;
}

/** Direct child elements. */
export function childElements(parent: MarkupElement): MarkupElement[] {
  return parent.children.filter((child): child is MarkupElement => child.type === 'element');
}

/** Every element below `root`, in document order. `root` itself is not included. */
export function descendantElements(root: MarkupElement): MarkupElement[] {
  const result: MarkupElement[] = [];
  const pending = childElements(root).reverse();

  for (let element = pending.pop(); element !== undefined; element = pending.pop()) {
    result.push(element);
    for (const child of childElements(element).reverse()) pending.push(child);
  }
  return result;
}

/** Concatenated text of a node and everything below it. */
export function textContent(node: MarkupNode): string {
  const parts: string[] = [];
  const pending: MarkupNode[] = [node];

  for (let current = pending.pop(); current !== undefined; current = pending.pop()) {
    if (current.type === 'text') {
      parts.push(current.value);
    } else {
      for (let index = current.children.length - 1; index >= 0; index--) {
        const child = current.children[index];
        if (child !== undefined) pending.push(child);
      }
    }
  }
  return parts.join('');
}
