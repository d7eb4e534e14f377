import type { ParamSource } from '../../domain/ports/ParamSource.js';

/** A parameter value as frameworks commonly decode it: single, repeated, or missing. */
export type ParamValue = string | readonly string[] | undefined;

export interface RecordParamSourceOptions {
  /** Raw request body for structured extractors. */
  readonly body?: string;
}

/** Param source over a plain object, such as an Express `req.query` or `req.body`. */
export class RecordParamSource implements ParamSource {
  private readonly params: Readonly<Record<string, ParamValue>>;
  private readonly rawBody: string | undefined;

  constructor(params: Readonly<Record<string, ParamValue>>, options?: RecordParamSourceOptions) {
    this.params = params;
    this.rawBody = options?.body;
  }

  values(name: string): readonly string[] {
    if (!Object.prototype.hasOwnProperty.call(this.params, name)) return [];

    const value = this.params[name];
    if (value === undefined) return [];
    return typeof value === 'string' ? [value] : value;
  }

  body(): string | undefined {
    return this.rawBody;
  }
}
