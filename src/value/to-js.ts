import { dateToJs } from './value';
import type { PlistValue } from './value';

export type JsPlistOutput =
  | null
  | boolean
  | bigint
  | number
  | Date
  | Uint8Array
  | string
  | { readonly uid: bigint }
  | readonly JsPlistOutput[]
  | { readonly [key: string]: JsPlistOutput };

/**
 * Lossy conversion to plain JS values, e.g. for printing.
 * Integers stay bigints so 64-bit values survive; reals and integers are
 * no longer told apart by kind once a caller turns them into numbers.
 */
export function toJs(value: PlistValue): JsPlistOutput {
  switch (value.kind) {
    case 'null':
      return null;
    case 'boolean':
    case 'integer':
    case 'real':
    case 'string':
      return value.value;
    case 'date':
      return dateToJs(value);
    case 'data':
      return value.value.slice();
    case 'uid':
      return { uid: value.value };
    case 'array':
      return value.value.map(toJs);
    case 'dictionary': {
      const out: { [key: string]: JsPlistOutput } = {};
      for (const [key, child] of value.value) {
        // __proto__ and friends must land as own data properties
        Object.defineProperty(out, key, { value: toJs(child), enumerable: true, writable: true, configurable: true });
      }
      return out;
    }
  }
}
