import type { ErrorRecord, FieldErrors } from '../model/ErrorRecord.js';
import type { CheckResult } from '../model/TypeDefinition.js';

/**
 * Collects the value errors of one validation call.
 *
 * Scalar fields hold a single record; array fields hold one record per
 * failing element, in element order.
 */
export class ErrorAccumulator {
  private readonly errors = new Map<string, ErrorRecord | ErrorRecord[]>();

  /** Store a record. `asArray` appends to the field's list instead of replacing it. */
  record(record: ErrorRecord, asArray: boolean): void {
    if (!asArray) {
      this.errors.set(record.field, record);
      return;
    }

    const existing = this.errors.get(record.field);
    if (Array.isArray(existing)) {
      existing.push(record);
    } else {
      this.errors.set(record.field, [record]);
    }
  }

  /** Number of fields with at least one error. */
  count(): number {
    return this.errors.size;
  }

  has(field: string): boolean {
    return this.errors.has(field);
  }

  /**
   * Message for a field, or `0` when it is valid. For array fields `index`
   * selects an element; without it the first failing element answers. A
   * scalar record answers whatever the index.
   */
  errorFor(field: string, index?: number): CheckResult {
    const entry = this.errors.get(field);
    if (entry === undefined) return 0;

    if (!Array.isArray(entry)) return entry.message;

    const match = index === undefined ? entry[0] : entry.find((record) => record.index === index);
    return match?.message ?? 0;
  }

  all(): Record<string, FieldErrors> {
    const result: Record<string, FieldErrors> = {};
    for (const [field, entry] of this.errors) {
      result[field] = Array.isArray(entry) ? [...entry] : entry;
    }
    return result;
  }

  clear(): void {
    this.errors.clear();
  }
}
