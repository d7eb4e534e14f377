/** Strip leading and trailing whitespace. */
export function trim(raw: string): string {
  return raw.trim();
}

/** `true` for `undefined`, `null`. */
export function isAbsent(value: unknown): value is undefined | null {
  return value === undefined || value === null;
}

/** Standard "missing / empty" checks shared by most types. */
export function checkPresent(
  value: unknown,
  absentMessage = 'Value is not defined',
  emptyMessage = 'Value is not set',
): 0 | string {
  if (isAbsent(value)) return absentMessage;
  if (String(value) === '') return emptyMessage;
  return 0;
}
