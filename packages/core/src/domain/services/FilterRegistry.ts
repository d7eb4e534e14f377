import type { FilterFn } from '../model/TypeDefinition.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('filter-registry');

/**
 * Filter name → check function. A field attribute whose key is a registered
 * filter name becomes a filter step for that field.
 */
export class FilterRegistry {
  private readonly filters = new Map<string, FilterFn>();

  constructor(initial?: Readonly<Record<string, FilterFn>>) {
    if (initial) {
      for (const [name, fn] of Object.entries(initial)) {
        this.filters.set(name, fn);
      }
    }
  }

  get(name: string): FilterFn | undefined {
    return this.filters.get(name);
  }

  has(name: string): boolean {
    return this.filters.has(name);
  }

  /** Register or replace a filter. Last write wins. */
  set(name: string, fn: FilterFn): FilterFn {
    if (this.filters.has(name)) {
      logger.debug({ filter: name }, 'overriding filter');
    }
    this.filters.set(name, fn);
    return fn;
  }

  names(): string[] {
    return [...this.filters.keys()];
  }
}
