// Extractors
export { JsonPointerExtractor } from './infrastructure/extractors/JsonPointerExtractor.js';
export { CssExtractor } from './infrastructure/extractors/CssExtractor.js';
export { XPathExtractor } from './infrastructure/extractors/XPathExtractor.js';

// Markup tree (for custom extractors)
export { parseMarkup, childElements, descendantElements, textContent } from './infrastructure/markup/parseMarkup.js';
export type { MarkupElement, MarkupText, MarkupNode } from './domain/model/MarkupNode.js';
export { DOCUMENT_NAME } from './domain/model/MarkupNode.js';
