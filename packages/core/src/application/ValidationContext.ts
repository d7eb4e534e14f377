import type { StructuredSelector } from '../domain/model/FieldSpec.js';
import type { ParamSource } from '../domain/ports/ParamSource.js';
import type { StructuredExtractor } from '../domain/ports/StructuredExtractor.js';
import { ConfigurationError } from '../domain/errors/FieldwiseError.js';
import { ErrorAccumulator } from '../domain/services/ErrorAccumulator.js';

/**
 * State of one top-level validation call.
 *
 * Owns the error accumulator and the parsed structured documents. A
 * `RequestValidation` resets it at the start of every call; it is never shared
 * between requests.
 */
export class ValidationContext {
  readonly errors = new ErrorAccumulator();
  private readonly documents = new Map<string, { readonly document: unknown }>();

  constructor(
    readonly source: ParamSource,
    private readonly extractors: ReadonlyMap<string, StructuredExtractor>,
  ) {}

  /** Raw values for a field: flat parameters, or the selector's matches in the body. */
  fetch(name: string, selector?: StructuredSelector): readonly string[] {
    if (!selector) return this.source.values(name);

    const extractor = this.extractors.get(selector.kind);
    if (!extractor) {
      throw new ConfigurationError(`No extractor registered for selector "${selector.kind}"`, {
        field: name,
        kind: selector.kind,
      });
    }

    const document = this.document(extractor);
    return document === undefined ? [] : extractor.select(document, selector.path);
  }

  /** Forget the errors and cached documents of the previous call. */
  reset(): void {
    this.errors.clear();
    this.documents.clear();
  }

  private document(extractor: StructuredExtractor): unknown {
    const cached = this.documents.get(extractor.kind);
    if (cached) return cached.document;

    const body = this.source.body?.();
    const document = body === undefined ? undefined : extractor.parse(body);
    this.documents.set(extractor.kind, { document });
    return document;
  }
}
