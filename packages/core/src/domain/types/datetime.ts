import type { CheckResult, TypeDefinition } from '../model/TypeDefinition.js';
import { isAbsent } from './common.js';

const RELATIVE = /^([+-])\s*(?:(\d+)\s+)?(?:(\d+):)??(\d+)(?::(\d+))?$/;
const DOTTED_DATE = /^(\d{1,2})\.(\d{1,2})\.(\d{1,4})(.*)$/;
const ISO_LIKE =
  /^(\d{4})-(\d{1,2})-(\d{1,2})(?:(?:T|\s+)(\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3})\d*)?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;

/** Clock used for relative and time-only input. */
export type Clock = () => Date;

const systemClock: Clock = () => new Date();

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

function isoDay(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

function offsetMinutes(offset: string): number {
  if (offset.toUpperCase() === 'Z') return 0;
  const digits = offset.replace(':', '');
  const sign = digits.startsWith('-') ? -1 : 1;
  return sign * (Number(digits.slice(1, 3)) * 60 + Number(digits.slice(3, 5)));
}

function parseRelative(text: string, now: Date): Date {
  const match = RELATIVE.exec(text);
  if (!match) return new Date(Number.NaN);

  const [, sign, days, hours, minutes, seconds] = match;
  const totalSeconds =
    Number(days ?? 0) * 86_400 + Number(hours ?? 0) * 3_600 + Number(minutes ?? 0) * 60 + Number(seconds ?? 0);
  const direction = sign === '-' ? -1 : 1;
  return new Date(now.getTime() + direction * totalSeconds * 1000);
}

function parseIsoLike(text: string): Date | undefined {
  const match = ISO_LIKE.exec(text);
  if (!match) return undefined;

  const [, year, month, day, hours, minutes, seconds, millis, offset] = match;
  const parts = [
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hours ?? 0),
    Number(minutes ?? 0),
    Number(seconds ?? 0),
    Number((millis ?? '0').padEnd(3, '0')),
  ] as const;

  const date =
    offset === undefined
      ? new Date(parts[0], parts[1], parts[2], parts[3], parts[4], parts[5], parts[6])
      : new Date(Date.UTC(...parts) - offsetMinutes(offset) * 60_000);

  // Reject overflowing components such as 2024-02-31 or 25:00.
  const probe = offset === undefined ? date : new Date(Date.UTC(...parts));
  const [probeMonth, probeHours] =
    offset === undefined ? [probe.getMonth(), probe.getHours()] : [probe.getUTCMonth(), probe.getUTCHours()];
  if (probeMonth !== parts[1] || probeHours !== parts[3]) return new Date(Number.NaN);

  return date;
}

/**
 * Parse a date/time from the formats users actually type:
 *
 * - Unix timestamp in seconds (`1700000000`)
 * - relative to now, minutes by default: `+15`, `-6`, `+15:44`, `+3:15:44`, `+8 3:15:44`
 * - day-first dotted dates: `25.12.2024`, `25.12.24 10:30`
 * - ISO-like dates with optional time and offset: `2024-12-25`, `2024-12-25 10:30:00 +0300`
 * - time only, meaning today: `10:30`
 * - anything `Date.parse` accepts
 *
 * Returns `undefined` for blank input and an invalid `Date` for unparseable input.
 */
export function parseDate(raw: string, clock: Clock = systemClock): Date | undefined {
  let text = raw.trim();
  if (text === '') return undefined;

  if (/^\d+$/.test(text)) return new Date(Number(text) * 1000);
  if (/^[+-]/.test(text)) return parseRelative(text, clock());

  const dotted = DOTTED_DATE.exec(text);
  if (dotted) {
    const [, day, month, shortYear, rest] = dotted;
    let year = shortYear ?? '';
    if (year.length < 4) {
      const currentYear = String(clock().getFullYear());
      year = currentYear.slice(0, 4 - year.length) + year;
    }
    text = `${year}-${month ?? ''}-${day ?? ''}${rest ?? ''}`;
  }

  if (/^\d{2}:/.test(text)) {
    text = `${isoDay(clock())} ${text}`;
  }

  return parseIsoLike(text) ?? new Date(Date.parse(text));
}

/**
 * strftime-style formatting in local time. Supports `%Y %y %m %d %H %M %S %z
 * %F %T %%`; other characters are copied through.
 */
export function formatDate(date: Date, format: string): string {
  return format.replace(/%([YymdHMSzFT%])/g, (_, directive: string) => {
    switch (directive) {
      case 'Y':
        return pad(date.getFullYear(), 4);
      case 'y':
        return pad(date.getFullYear() % 100);
      case 'm':
        return pad(date.getMonth() + 1);
      case 'd':
        return pad(date.getDate());
      case 'H':
        return pad(date.getHours());
      case 'M':
        return pad(date.getMinutes());
      case 'S':
        return pad(date.getSeconds());
      case 'z': {
        const offset = -date.getTimezoneOffset();
        const sign = offset >= 0 ? '+' : '-';
        const abs = Math.abs(offset);
        return `${sign}${pad(Math.floor(abs / 60))}${pad(abs % 60)}`;
      }
      case 'F':
        return isoDay(date);
      case 'T':
        return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
      default:
        return '%';
    }
  });
}

export function checkDate(value: unknown): CheckResult {
  if (isAbsent(value)) return 'Value is not defined';
  if (!(value instanceof Date) || Number.isNaN(value.getTime())) return 'Wrong format';
  return 0;
}

/** Output formats for the date types. `null` returns the `Date` object itself. */
export interface DateFormats {
  readonly date: string | null;
  readonly time: string | null;
  readonly datetime: string | null;
}

function dateType(format: string | null, clock: Clock): TypeDefinition {
  return {
    pre: (raw) => parseDate(raw, clock),
    valid: checkDate,
    post: (value) => (value instanceof Date && format ? formatDate(value, format) : value),
  };
}

export function dateTypes(formats: DateFormats, clock: Clock = systemClock): Record<string, TypeDefinition> {
  return {
    date: dateType(formats.date, clock),
    time: dateType(formats.time, clock),
    datetime: dateType(formats.datetime, clock),
  };
}
