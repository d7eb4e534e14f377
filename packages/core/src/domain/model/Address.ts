import { createHash } from 'node:crypto';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('address');

const TEXT_FORM =
  /^(\s*(\S.*?)\s*:\s*(-?\d{1,3}(?:\.\d+)?)\s*,\s*(-?\d{1,3}(?:\.\d+)?)\s*)(?:\[\s*(\w*)\s*\])?\s*$/;

/** Coordinate as received: text from the string form, number from the JSON form. */
export type Coordinate = string | number | undefined;

/** Signature proving an address string came from a trusted geocoder: `md5(secret + fullname)`. */
export function signAddress(fullname: string, secret: string): string {
  return createHash('md5').update(secret + fullname, 'utf8').digest('hex');
}

function scalar(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}

function coordinate(value: unknown): Coordinate {
  return typeof value === 'number' ? value : scalar(value);
}

/**
 * A geocoded location address with coordinates.
 *
 * Two input forms are accepted:
 * - text: `ADDRESS : LON , LAT` optionally followed by `[signature]`
 * - JSON array: `[id, type, address, lon, lat, lang, opt]` where `opt` is
 *   `'extra'` or a nested `[address, lon, lat]` of a nearby point.
 */
export class Address {
  constructor(
    readonly address: string | undefined,
    readonly lon: Coordinate,
    readonly lat: Coordinate,
    /** Signature from the text form. */
    readonly signature: string | undefined,
    /** The text the signature was computed over. */
    readonly fullname: string | undefined,
    readonly id?: string,
    /** Source type; `'p'` marks a user-placed point that is trusted without a signature. */
    readonly type?: string,
    readonly lang?: string,
    readonly extra = false,
    readonly near?: Address,
  ) {}

  /** Parse either input form. Text that matches neither gives an address with no fields set. */
  static parse(raw: string): Address {
    if (/^\s*\[/.test(raw) && /\]\s*$/.test(raw)) {
      return Address.fromJson(raw);
    }

    const match = TEXT_FORM.exec(raw);
    if (!match) return new Address(undefined, undefined, undefined, undefined, undefined);

    const [, fullname, address, lon, lat, signature] = match;
    return new Address(address, lon, lat, signature, fullname);
  }

  private static fromJson(raw: string): Address {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      logger.warn({ err: error }, 'unparseable JSON address');
      return new Address(undefined, undefined, undefined, undefined, undefined);
    }
    if (!Array.isArray(parsed)) return new Address(undefined, undefined, undefined, undefined, undefined);

    const items: readonly unknown[] = parsed;
    const [id, type, address, lon, lat, lang, opt] = items;
    const fullname = `${scalar(address) ?? ''} : ${scalar(lon) ?? ''} , ${scalar(lat) ?? ''}`;
    const near = Array.isArray(opt) ? Address.fromPoint(opt) : undefined;

    return new Address(
      scalar(address),
      coordinate(lon),
      coordinate(lat),
      undefined,
      fullname,
      scalar(id),
      scalar(type),
      scalar(lang),
      opt === 'extra',
      near,
    );
  }

  private static fromPoint(point: readonly unknown[]): Address {
    const [address, lon, lat] = point;
    return new Address(scalar(address), coordinate(lon), coordinate(lat), undefined, undefined);
  }

  /** `true` when the address is trusted under `secret` (always, when no secret is configured). */
  verify(secret: string): boolean {
    if (!secret) return true;
    if (this.type === 'p') return true;
    if (this.signature === undefined || this.fullname === undefined) return false;
    return this.signature === signAddress(this.fullname, secret);
  }
}
