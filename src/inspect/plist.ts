import { decodeBinaryPlist } from "../bplist/reader";
import { encodeBinaryPlist } from "../bplist/writer";
import { compare } from "../compare/comparator";
import { fingerprint } from "./fingerprint";
import { flatten } from "./flatten";
import type { DecodeOptions } from "../bplist/reader";
import type { EncodeOptions } from "../bplist/writer";
import type { CompareOptions } from "../compare/comparator";
import type { CompareResult } from "../compare/discrepancy";
import type { PlistValue } from "../value/value";

export interface PlistFromBinaryOptions extends DecodeOptions {
  readonly name?: string;
}

/**
 * A decoded plist with a flattened, key-addressable view of its data.
 * Equality and fingerprints look at the data only, never at the name.
 */
export class Plist {
  private _data?: ReadonlyMap<string, PlistValue>;
  private _fingerprint?: string;

  constructor(readonly root: PlistValue, readonly name?: string) { }

  /**
   * @throws DecodeError
   */
  static fromBinary(input: Uint8Array | ArrayBuffer, { name, ...options }: PlistFromBinaryOptions = {}) {
    return new Plist(decodeBinaryPlist(input, options), name);
  }

  /** Flattened entries, see {@link flatten}. */
  get data(): ReadonlyMap<string, PlistValue> {
    this._data ??= flatten(this.root);
    return this._data;
  }

  get keys(): readonly string[] {
    return [...this.data.keys()];
  }

  get values(): readonly PlistValue[] {
    return [...this.data.values()];
  }

  get fingerprint(): string {
    this._fingerprint ??= fingerprint(this.root);
    return this._fingerprint;
  }

  /** Discrepancies of `other` against this plist as the reference. */
  diff(other: Plist, options?: CompareOptions): CompareResult {
    return compare(this.root, other.root, options);
  }

  equals(other: Plist, options?: CompareOptions) {
    return this.diff(other, options).equal;
  }

  toBinary(options?: EncodeOptions) {
    return encodeBinaryPlist(this.root, options);
  }

  toString() {
    const name = this.name === undefined ? '' : `${JSON.stringify(this.name)}, `;
    return `Plist(${name}${this.data.size} keys)`;
  }
}
