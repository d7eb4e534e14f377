import type { ParamSource } from '../../domain/ports/ParamSource.js';

/** Param source over `URLSearchParams`: a query string or an urlencoded form body. */
export class SearchParamsSource implements ParamSource {
  private readonly params: URLSearchParams;
  private readonly rawBody: string | undefined;

  constructor(params: URLSearchParams | string, body?: string) {
    this.params = typeof params === 'string' ? new URLSearchParams(params) : params;
    this.rawBody = body;
  }

  values(name: string): readonly string[] {
    return this.params.getAll(name);
  }

  body(): string | undefined {
    return this.rawBody;
  }
}
