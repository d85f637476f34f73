import { bplistMagicNumber, headerByteLength } from "./constants/magic-number";
import { EncodeError, EncodeErrorKind } from "./errors/encode-error";
import { Marker, trailingCountNibble } from "./markers";
import { ObjectTableArrayLike, ObjectTableDict } from "./models/object-table-entries";
import { Trailer } from "./models/trailer";
import { bytesToBinaryString, isAscii } from "./text";
import { widthForUnsigned } from "./widths";
import { isContainer, isIntegerInRange, maxIntegerExclusive, string } from "../value/value";
import { DEFAULT_MAX_DEPTH } from "../shared/limits";
import { defaultLogger } from "../shared/logger";
import type { ObjRef } from "./types/bplist-index-aliases";
import type { ObjectTableEntry } from "./models/object-table-entries";
import type { ByteWidth } from "./widths";
import type { PathSegment } from "../value/path";
import type { PlistContainer, PlistScalar, PlistValue } from "../value/value";
import type { ILogger } from "../shared/logger";

/** Every index must fit a 4-byte object ref. */
export const DEFAULT_MAX_OBJECT_COUNT = 2 ** 32;

export interface EncodeOptions {
  /** deepest nesting accepted, the root being at depth 0; defaults to {@link DEFAULT_MAX_DEPTH} */
  readonly maxDepth?: number;
  /** defaults to {@link DEFAULT_MAX_OBJECT_COUNT} */
  readonly maxObjectCount?: number;
  readonly logger?: ILogger;
}

type FlattenedContainer = {
  readonly ref: ObjRef;
  readonly height: number;
}

const twoTo63 = 2n ** 63n;

/** Big-endian unsigned write of `value` in exactly `width` bytes. */
function setUnsigned(view: DataView, offset: number, value: number | bigint, width: ByteWidth) {
  switch (width) {
    case 1:
      view.setUint8(offset, Number(value));
      break;
    case 2:
      view.setUint16(offset, Number(value));
      break;
    case 4:
      view.setUint32(offset, Number(value));
      break;
    case 8:
      view.setBigUint64(offset, BigInt(value));
      break;
  }
}

function concatBytes(parts: readonly Uint8Array[]) {
  const out = new Uint8Array(parts.reduce((sum, part) => sum + part.byteLength, 0));
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.byteLength;
  }
  return out;
}

/**
 * Smallest int object for `value`: 1/2/4 bytes unsigned, 8 bytes signed
 * (which also covers every negative value), 16 bytes past 2^63.
 */
function encodeInt(value: bigint) {
  let width: 1 | 2 | 4 | 8 | 16;
  if (value < 0n) {
    width = 8;
  }
  else if (value <= 0xFFn) {
    width = 1;
  }
  else if (value <= 0xFFFFn) {
    width = 2;
  }
  else if (value <= 0xFFFF_FFFFn) {
    width = 4;
  }
  else if (value < twoTo63) {
    width = 8;
  }
  else {
    width = 16;
  }

  const out = new Uint8Array(1 + width);
  const view = new DataView(out.buffer);
  out[0] = Marker.int | Math.log2(width);
  switch (width) {
    case 1:
    case 2:
    case 4:
      setUnsigned(view, 1, value, width);
      break;
    case 8:
      view.setBigInt64(1, value);
      break;
    case 16:
      // high 8 bytes stay zero: only [2^63, 2^64) lands here
      view.setBigUint64(9, value);
      break;
  }
  return out;
}

/** Marker with an inline count, or 0xF followed by the count as an int object. */
function encodeMarkerWithCount(marker: Marker, count: number) {
  if (count < trailingCountNibble) {
    return Uint8Array.of(marker | count);
  }
  return concatBytes([Uint8Array.of(marker | trailingCountNibble), encodeInt(BigInt(count))]);
}

function encodeDouble(marker: Marker, value: number) {
  const out = new Uint8Array(9);
  out[0] = marker | 3;
  new DataView(out.buffer).setFloat64(1, value);
  return out;
}

function encodeReal(value: number) {
  if (!Object.is(Math.fround(value), value)) {
    return encodeDouble(Marker.real, value);
  }
  const out = new Uint8Array(5);
  out[0] = Marker.real | 2;
  new DataView(out.buffer).setFloat32(1, value);
  return out;
}

function encodeString(value: string) {
  if (isAscii(value)) {
    const body = new Uint8Array(value.length);
    for (let i = 0; i < value.length; ++i) {
      body[i] = value.charCodeAt(i);
    }
    return concatBytes([encodeMarkerWithCount(Marker.ascii, value.length), body]);
  }

  const body = new Uint8Array(value.length * 2);
  const view = new DataView(body.buffer);
  for (let i = 0; i < value.length; ++i) {
    view.setUint16(i * 2, value.charCodeAt(i));
  }
  return concatBytes([encodeMarkerWithCount(Marker.unicode, value.length), body]);
}

function encodeUid(value: bigint) {
  const width = widthForUnsigned(value);
  const out = new Uint8Array(1 + width);
  out[0] = Marker.uid | (width - 1);
  setUnsigned(new DataView(out.buffer), 1, value, width);
  return out;
}

function encodeScalar(value: PlistScalar) {
  switch (value.kind) {
    case 'null':
      return Uint8Array.of(Marker.null);
    case 'boolean':
      return Uint8Array.of(value.value ? Marker.true : Marker.false);
    case 'integer':
      return encodeInt(value.value);
    case 'real':
      return encodeReal(value.value);
    case 'date':
      return encodeDouble(Marker.date, value.value);
    case 'data':
      return concatBytes([encodeMarkerWithCount(Marker.data, value.value.byteLength), value.value]);
    case 'string':
      return encodeString(value.value);
    case 'uid':
      return encodeUid(value.value);
  }
}

function encodeRefs(refs: readonly ObjRef[], width: ByteWidth) {
  const out = new Uint8Array(refs.length * width);
  const view = new DataView(out.buffer);
  refs.forEach((ref, i) => setUnsigned(view, i * width, ref, width));
  return out;
}

function encodeEntry(entry: ObjectTableEntry, objectRefSize: ByteWidth) {
  if (entry instanceof ObjectTableArrayLike) {
    return concatBytes([
      encodeMarkerWithCount(entry.type, entry.objrefs.length),
      encodeRefs(entry.objrefs, objectRefSize),
    ]);
  }
  if (entry instanceof ObjectTableDict) {
    return concatBytes([
      encodeMarkerWithCount(Marker.dict, entry.entries.length),
      encodeRefs(entry.entries.map(([key]) => key), objectRefSize),
      encodeRefs(entry.entries.map(([, value]) => value), objectRefSize),
    ]);
  }
  return encodeScalar(entry);
}

/**
 * Identity of a scalar for de-duplication; kinds never collide and -0 stays apart from 0.
 */
function scalarKey(value: PlistScalar) {
  switch (value.kind) {
    case 'null':
      return 'n';
    case 'boolean':
      return value.value ? 'b:1' : 'b:0';
    case 'integer':
      return `i:${value.value}`;
    case 'real':
      return `r:${Object.is(value.value, -0) ? '-0' : value.value}`;
    case 'date':
      return `d:${Object.is(value.value, -0) ? '-0' : value.value}`;
    case 'data':
      return `x:${bytesToBinaryString(value.value)}`;
    case 'string':
      return `s:${value.value}`;
    case 'uid':
      return `u:${value.value}`;
  }
}

/**
 * Flattens a value tree into a `bplist00` object table and serializes it.
 *
 * Equal scalars share one object, and a container node reached twice is written once,
 * so a decoded tree re-encodes with its aliasing intact.
 * Children are numbered before their container; the root is the last object.
 */
export class Writer {
  readonly maxDepth: number;
  readonly maxObjectCount: number;
  readonly logger: ILogger;

  readonly topObject: ObjRef;

  private readonly _objects: ObjectTableEntry[] = [];
  private readonly _scalarRefs = new Map<string, ObjRef>();
  private readonly _containers = new Map<PlistContainer, FlattenedContainer>();
  private readonly _inProgress = new Set<PlistContainer>();
  private readonly _path: PathSegment[] = [];

  /**
   * @throws EncodeError
   */
  constructor(root: PlistValue, { maxDepth = DEFAULT_MAX_DEPTH, maxObjectCount = DEFAULT_MAX_OBJECT_COUNT, logger = defaultLogger }: EncodeOptions = {}) {
    this.maxDepth = maxDepth;
    this.maxObjectCount = Math.min(maxObjectCount, DEFAULT_MAX_OBJECT_COUNT);
    this.logger = logger;

    this.topObject = this._flatten(root, 0).ref;
    this.logger.debug('DBG: flattened %d objects, top object %d', this._objects.length, this.topObject);
  }

  /** The flattened object table, indexed by object ref. */
  get objects(): readonly ObjectTableEntry[] {
    return this._objects;
  }

  toBytes(): Uint8Array {
    const objectRefSize = widthForUnsigned(this._objects.length - 1);
    const bodies = this._objects.map(entry => encodeEntry(entry, objectRefSize));

    const offsets: number[] = [];
    let offset = headerByteLength;
    for (const body of bodies) {
      offsets.push(offset);
      offset += body.byteLength;
    }
    const offsetTableOffset = offset;
    const offsetIntSize = widthForUnsigned(offsets[offsets.length - 1]);
    const trailerOffset = offsetTableOffset + offsets.length * offsetIntSize;
    this.logger.debug('DBG: objectRefSize=%d offsetIntSize=%d offsetTableOffset=%d', objectRefSize, offsetIntSize, offsetTableOffset);

    const out = new Uint8Array(trailerOffset + Trailer.trailerByteLength);
    const view = new DataView(out.buffer);

    for (let i = 0; i < bplistMagicNumber.length; ++i) {
      out[i] = bplistMagicNumber.charCodeAt(i);
    }
    out[6] = 0x30;
    out[7] = 0x30;

    bodies.forEach((body, i) => out.set(body, offsets[i]));
    offsets.forEach((objectOffset, i) => setUnsigned(view, offsetTableOffset + i * offsetIntSize, objectOffset, offsetIntSize));

    new Trailer(0, offsetIntSize, objectRefSize, this._objects.length, this.topObject, offsetTableOffset, trailerOffset).writeTo(view);

    return out;
  }

  private _error(kind: EncodeErrorKind, detail: string) {
    return new EncodeError(kind, detail, [...this._path]);
  }

  private _push(entry: ObjectTableEntry): ObjRef {
    if (this._objects.length >= this.maxObjectCount) {
      throw this._error(EncodeErrorKind.CountOverflow, `more than ${this.maxObjectCount} objects`);
    }
    return this._objects.push(entry) - 1;
  }

  private _addScalar(value: PlistScalar): ObjRef {
    if (value.kind === 'integer' && !isIntegerInRange(value.value)) {
      throw this._error(EncodeErrorKind.UnsupportedValue, `integer ${value.value} is outside [-2^63, 2^64)`);
    }
    if (value.kind === 'uid' && (value.value < 0n || value.value >= maxIntegerExclusive)) {
      throw this._error(EncodeErrorKind.UnsupportedValue, `uid ${value.value} is outside [0, 2^64)`);
    }

    const key = scalarKey(value);
    const existing = this._scalarRefs.get(key);
    if (existing !== undefined) {
      return existing;
    }
    const ref = this._push(value);
    this._scalarRefs.set(key, ref);
    return ref;
  }

  private _flatten(value: PlistValue, depth: number): FlattenedContainer {
    if (depth > this.maxDepth) {
      throw this._error(EncodeErrorKind.DepthExceeded, `nesting deeper than ${this.maxDepth}`);
    }
    if (!isContainer(value)) {
      return { ref: this._addScalar(value), height: 0 };
    }

    const existing = this._containers.get(value);
    if (existing) {
      if (depth + existing.height > this.maxDepth) {
        throw this._error(EncodeErrorKind.DepthExceeded, `nesting deeper than ${this.maxDepth}`);
      }
      return existing;
    }
    if (this._inProgress.has(value)) {
      throw this._error(EncodeErrorKind.CyclicValue, 'container contains itself');
    }

    this._inProgress.add(value);
    let height = 0;
    let entry: ObjectTableEntry;

    if (value.kind === 'array') {
      const refs = value.value.map((child, i) => {
        this._path.push(i);
        const flattened = this._flatten(child, depth + 1);
        this._path.pop();
        height = Math.max(height, flattened.height + 1);
        return flattened.ref;
      });
      entry = new ObjectTableArrayLike(Marker.array, refs);
    }
    else {
      const pairs: [ObjRef, ObjRef][] = [];
      for (const [key, child] of value.value) {
        this._path.push(key);
        const keyRef = this._addScalar(string(key));
        const flattened = this._flatten(child, depth + 1);
        this._path.pop();
        height = Math.max(height, flattened.height + 1);
        pairs.push([keyRef, flattened.ref]);
      }
      entry = new ObjectTableDict(pairs);
    }

    this._inProgress.delete(value);

    const flattened = { ref: this._push(entry), height };
    this._containers.set(value, flattened);
    return flattened;
  }
}

/**
 * Encodes a value tree as a complete `bplist00` buffer.
 *
 * @throws EncodeError
 */
export function encodeBinaryPlist(value: PlistValue, options?: EncodeOptions): Uint8Array {
  return new Writer(value, options).toBytes();
}
