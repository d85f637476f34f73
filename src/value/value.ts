import { cfAbsoluteTimeEpochMilliseconds } from './epoch';

export type PlistNull = { readonly kind: 'null' };
export type PlistBoolean = { readonly kind: 'boolean'; readonly value: boolean };
/** Width-independent; the binary format stores these in 1, 2, 4, 8 or 16 bytes. */
export type PlistInteger = { readonly kind: 'integer'; readonly value: bigint };
export type PlistReal = { readonly kind: 'real'; readonly value: number };
/** Seconds (fractional) since 2001-01-01T00:00:00Z. */
export type PlistDate = { readonly kind: 'date'; readonly value: number };
export type PlistData = { readonly kind: 'data'; readonly value: Uint8Array };
export type PlistString = { readonly kind: 'string'; readonly value: string };
/** Object reference used by keyed archives (`$top`, `$objects`, `$class`). */
export type PlistUid = { readonly kind: 'uid'; readonly value: bigint };
export type PlistArray = { readonly kind: 'array'; readonly value: readonly PlistValue[] };
export type PlistDictionary = { readonly kind: 'dictionary'; readonly value: ReadonlyMap<string, PlistValue> };

export type PlistValue =
  | PlistNull
  | PlistBoolean
  | PlistInteger
  | PlistReal
  | PlistDate
  | PlistData
  | PlistString
  | PlistUid
  | PlistArray
  | PlistDictionary
  ;

export type PlistKind = PlistValue['kind'];
export type PlistScalar = Exclude<PlistValue, PlistArray | PlistDictionary>;
export type PlistContainer = PlistArray | PlistDictionary;

export const minInteger = -(2n ** 63n);
/** exclusive; unsigned 64-bit values are stored as 16-byte ints */
export const maxIntegerExclusive = 2n ** 64n;

const NULL: PlistNull = Object.freeze({ kind: 'null' });
const TRUE: PlistBoolean = Object.freeze({ kind: 'boolean', value: true });
const FALSE: PlistBoolean = Object.freeze({ kind: 'boolean', value: false });

export function nullValue(): PlistNull {
  return NULL;
}

export function bool(value: boolean): PlistBoolean {
  return value ? TRUE : FALSE;
}

export function isIntegerInRange(value: bigint) {
  return value >= minInteger && value < maxIntegerExclusive;
}

/**
 * @throws RangeError if the value is outside `[-2^63, 2^64)` or is an unsafe/fractional number
 */
export function integer(value: bigint | number): PlistInteger {
  if (typeof value === 'number' && !Number.isSafeInteger(value)) {
    throw new RangeError(`integer() takes a safe integer number or a bigint, got ${value}`);
  }
  const big = BigInt(value);
  if (!isIntegerInRange(big)) {
    throw new RangeError(`integer ${big} is outside the plist range [-2^63, 2^64)`);
  }
  return Object.freeze({ kind: 'integer', value: big });
}

export function real(value: number): PlistReal {
  return Object.freeze({ kind: 'real', value });
}

/**
 * @param seconds seconds since 2001-01-01T00:00:00Z; NaN and infinities are kept as stored
 */
export function date(seconds: number): PlistDate {
  return Object.freeze({ kind: 'date', value: seconds });
}

export function dateFromJs(value: Date) {
  return date((value.getTime() - cfAbsoluteTimeEpochMilliseconds) / 1e3);
}

export function dateToJs(value: PlistDate) {
  return new Date(cfAbsoluteTimeEpochMilliseconds + value.value * 1e3);
}

/**
 * Copies the bytes so the node never aliases a caller's (or a decoder's) buffer.
 * `Buffer#slice` returns a view, so the copy goes through the typed-array constructor.
 */
export function data(bytes: Uint8Array | ArrayBuffer): PlistData {
  const copy = bytes instanceof ArrayBuffer ? new Uint8Array(bytes.slice(0)) : new Uint8Array(bytes);
  return Object.freeze({ kind: 'data', value: copy });
}

export function string(value: string): PlistString {
  return Object.freeze({ kind: 'string', value });
}

/**
 * @throws RangeError if negative or 2^64 and above
 */
export function uid(value: bigint | number): PlistUid {
  const big = BigInt(value);
  if (big < 0n || big >= maxIntegerExclusive) {
    throw new RangeError(`uid ${big} is outside [0, 2^64)`);
  }
  return Object.freeze({ kind: 'uid', value: big });
}

export function array(items: Iterable<PlistValue>): PlistArray {
  return Object.freeze({ kind: 'array', value: Object.freeze([...items]) });
}

export type DictionaryInit =
  | ReadonlyMap<string, PlistValue>
  | Iterable<readonly [string, PlistValue]>
  | { readonly [key: string]: PlistValue };

function isEntryIterable(init: DictionaryInit): init is Iterable<readonly [string, PlistValue]> {
  return Symbol.iterator in init;
}

/**
 * Keys keep their insertion order, which is the order they are re-encoded in.
 *
 * @throws TypeError on a non-string or repeated key
 */
export function dictionary(init: DictionaryInit = []): PlistDictionary {
  const map = new Map<string, PlistValue>();
  const entries = isEntryIterable(init) ? init : Object.entries(init);

  for (const [key, value] of entries) {
    if (typeof key !== 'string') {
      throw new TypeError(`dictionary keys must be strings, got ${typeof key}`);
    }
    if (map.has(key)) {
      throw new TypeError(`duplicate dictionary key ${JSON.stringify(key)}`);
    }
    map.set(key, value);
  }

  return Object.freeze({ kind: 'dictionary', value: map });
}

export function isContainer(value: PlistValue): value is PlistContainer {
  return value.kind === 'array' || value.kind === 'dictionary';
}

export function kindOf(value: PlistValue): PlistKind {
  return value.kind;
}
