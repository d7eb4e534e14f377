/**
 * Port for reading raw values out of a structured request body
 * (JSON, XML, HTML).
 *
 * The body is parsed at most once per validation call; the engine caches the
 * parsed document in the `ValidationContext` and calls `select()` for every
 * field that uses this extractor kind.
 */
export interface StructuredExtractor<TDocument = unknown> {
  /** Selector key this extractor answers to (e.g. `'jpath'`). */
  readonly kind: string;
  /** Parse the raw body. Returns `undefined` when the body cannot be parsed. */
  parse(body: string): TDocument | undefined;
  /** Textual values matched by `path`, in document order. */
  select(document: TDocument, path: string): readonly string[];
}
