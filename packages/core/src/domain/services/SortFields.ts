import type { FieldAttributes } from '../model/FieldSpec.js';
import { ConfigurationError } from '../errors/FieldwiseError.js';

/** Output keys of the pagination fields. `null` leaves that field out. */
export interface SortFieldNames {
  readonly page: string | null;
  readonly rows: string | null;
  readonly orderBy: string | null;
  readonly orderDirection: string | null;
}

export interface SortOptions {
  readonly names: SortFieldNames;
  /** Default rows per page. */
  readonly rows: number;
  /** Default order direction. */
  readonly orderDirection: string;
}

/**
 * Map an order-by index to a column: the column at that position, else the
 * index plus one, else `1`.
 */
export function orderByColumn(columns: readonly string[], value: unknown): string | number {
  const index = Number(value);
  return columns[index] || index + 1 || 1;
}

function isColumnList(value: unknown): value is readonly string[] {
  return Array.isArray(value) && value.every((column) => typeof column === 'string');
}

/**
 * Field specs for page, rows per page, order-by column and order direction.
 *
 * @throws ConfigurationError when `columns` is not a list of strings.
 */
export function buildSortFields(columns: unknown, options: SortOptions): Record<string, FieldAttributes> {
  let list: readonly string[] = [];
  if (isColumnList(columns)) {
    list = columns;
  } else if (columns !== undefined) {
    throw new ConfigurationError('Sort columns must be a list of strings', { columns });
  }
  const { names } = options;
  const fields: Record<string, FieldAttributes> = {};

  if (names.page !== null) {
    fields[names.page] = { type: 'int', default: 1 };
  }
  if (names.rows !== null) {
    fields[names.rows] = { type: 'int', default: options.rows };
  }
  if (names.orderBy !== null) {
    fields[names.orderBy] = {
      type: 'int',
      default: 0,
      post: (value) => orderByColumn(list, value),
    };
  }
  if (names.orderDirection !== null) {
    fields[names.orderDirection] = {
      type: 'str',
      default: options.orderDirection,
      post: (value) => (typeof value === 'string' ? value.toUpperCase() : value),
      regexp: /^(?:asc|desc)$/i,
    };
  }

  return fields;
}
