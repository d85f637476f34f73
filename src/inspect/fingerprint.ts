import { blake3 } from "@napi-rs/blake-hash";
import { flatten } from "./flatten";
import type { PlistValue } from "../value/value";

function byKey([a]: readonly [string, unknown], [b]: readonly [string, unknown]) {
  return a < b ? -1 : a > b ? 1 : 0;
}

function hex(bytes: Uint8Array) {
  return Array.from(bytes, b => b.toString(16).padStart(2, '0')).join('');
}

/**
 * Canonical text for one node. Dictionary keys are sorted, so two trees the comparator
 * calls equal render the same; kinds are tagged, so `3` and `3.0` do not.
 */
export function canonical(value: PlistValue): string {
  switch (value.kind) {
    case 'null':
      return 'null';
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'integer':
      return `i(${value.value})`;
    case 'real':
      // String(-0) is "0", matching the comparator's 0 == -0
      return `r(${String(value.value)})`;
    case 'date':
      return `d(${String(value.value)})`;
    case 'data':
      return `x(${hex(value.value)})`;
    case 'string':
      return JSON.stringify(value.value);
    case 'uid':
      return `u(${value.value})`;
    case 'array':
      return `[${value.value.map(canonical).join(',')}]`;
    case 'dictionary':
      return renderEntries([...value.value].sort(byKey));
  }
}

function renderEntries(entries: readonly (readonly [string, PlistValue])[]) {
  return `{${entries.map(([key, child]) => `${JSON.stringify(key)}:${canonical(child)}`).join(',')}}`;
}

/**
 * Hex BLAKE3 digest of the flattened entries in key order.
 * Stable across dictionary order and across the encoding the tree was read from.
 */
export function fingerprint(value: PlistValue): string {
  const payload = renderEntries([...flatten(value)].sort(byKey));

  return blake3(payload).toString("hex");
}
