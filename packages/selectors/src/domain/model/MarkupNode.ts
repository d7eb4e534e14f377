/** An element of a parsed XML/HTML document. The document itself is an element named `#document`. */
export interface MarkupElement {
  readonly type: 'element';
  readonly name: string;
  readonly attributes: Readonly<Record<string, string>>;
  readonly children: MarkupNode[];
}

/** A run of character data between tags, entities decoded. */
export interface MarkupText {
  readonly type: 'text';
  readonly value: string;
}

export type MarkupNode = MarkupElement | MarkupText;

export const DOCUMENT_NAME = '#document';
