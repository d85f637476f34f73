import { BaseReader } from "./base-reader";
import { bplistMagicNumber, versionByteLength } from "./constants/magic-number";
import { DecodeError, DecodeErrorKind } from "./errors/decode-error";
import { ObjectTable } from "./models/object-table";
import { ObjectTableArrayLike, ObjectTableDict } from "./models/object-table-entries";
import { OffsetTable } from "./models/offset-table";
import { Trailer } from "./models/trailer";
import { array, data, dictionary } from "../value/value";
import { DEFAULT_MAX_DEPTH, DEFAULT_MAX_NODES } from "../shared/limits";
import { defaultLogger } from "../shared/logger";
import type { ObjRef } from "./types/bplist-index-aliases";
import type { PlistValue } from "../value/value";
import type { ILogger } from "../shared/logger";

export interface DecodeOptions {
  /** deepest nesting accepted, the root being at depth 0; defaults to {@link DEFAULT_MAX_DEPTH} */
  readonly maxDepth?: number;
  /** most nodes the tree may expand to, shared subtrees counted at every place they appear; defaults to {@link DEFAULT_MAX_NODES} */
  readonly maxNodes?: number;
  readonly logger?: ILogger;
}

/** A resolved object, the height of the subtree below it and the nodes it expands to. */
type BuiltObject = {
  readonly value: PlistValue;
  readonly height: number;
  readonly nodes: number;
  /** some node below is data, whose bytes are mutable */
  readonly holdsData: boolean;
}

/** Rebuilds `value` with fresh copies of every data node in it. */
function copyData(value: PlistValue): PlistValue {
  switch (value.kind) {
    case 'data':
      return data(value.value);
    case 'array':
      return array(value.value.map(copyData));
    case 'dictionary':
      return dictionary([...value.value].map(([key, child]) => [key, copyData(child)] as const));
    default:
      return value;
  }
}

export class Reader extends BaseReader {
  readonly version: string;
  readonly maxDepth: number;
  readonly maxNodes: number;

  readonly trailer: Trailer;
  readonly offsetTable: OffsetTable;
  readonly objectTable: ObjectTable;

  /**
   * Validates the header, the trailer and the offset table up front.
   * Objects are only parsed once {@link buildTopLevelObject} reaches them.
   *
   * @throws DecodeError
   */
  constructor(input: Uint8Array | ArrayBuffer, { maxDepth = DEFAULT_MAX_DEPTH, maxNodes = DEFAULT_MAX_NODES, logger = defaultLogger }: DecodeOptions = {}) {
    super(input, logger);

    this.maxDepth = maxDepth;
    this.maxNodes = maxNodes;

    const magicNumber = this.readAscii(0, bplistMagicNumber.length);
    if (magicNumber !== bplistMagicNumber) {
      throw new DecodeError(DecodeErrorKind.BadMagic, `must start with ${bplistMagicNumber} but got ${JSON.stringify(magicNumber)}`, { offset: 0 });
    }
    this.version = this.readAscii(bplistMagicNumber.length, versionByteLength);
    if (this.version.length !== versionByteLength || this.version[0] !== '0') {
      throw new DecodeError(DecodeErrorKind.BadMagic, `unsupported version ${JSON.stringify(this.version)}`, { offset: bplistMagicNumber.length });
    }
    if (this.version !== '00') {
      logger.warn('WARN: version is not 00 and may not decode as expected! version = %s', this.version);
    }

    this.trailer = Trailer.fromBuffer(this.bytes, logger);
    logger.debug('DBG: Trailer found: %O', this.trailer);

    if (this.trailer.numObjects >= 1 && this.trailer.topObject >= this.trailer.numObjects) {
      throw new DecodeError(
        DecodeErrorKind.DanglingReference,
        `top object ${this.trailer.topObject} is outside [0, ${this.trailer.numObjects})`,
        { objRef: this.trailer.topObject },
      );
    }

    this.offsetTable = new OffsetTable(this.bytes, this.trailer, logger);
    this.objectTable = new ObjectTable(this.bytes, this.offsetTable, this.trailer, logger);
  }

  /**
   * Resolves the whole tree under the top object.
   * An object reachable through several refs is resolved once and its frozen node shared;
   * subtrees holding data are copied for every place after the first.
   *
   * @throws DecodeError
   */
  buildTopLevelObject(): PlistValue {
    const built = this._buildObjectsRecursive(this.trailer.topObject, 0, new Map(), new Set());
    this.logger.debug('DBG: resolved %d of %d objects', this.objectTable.size, this.trailer.numObjects);
    return built.value;
  }

  private _buildObjectsRecursive(
    ref: ObjRef,
    depth: number,
    built: Map<ObjRef, BuiltObject>,
    decodeStack: Set<ObjRef>,
  ): BuiltObject {
    if (depth > this.maxDepth) {
      throw new DecodeError(DecodeErrorKind.DepthExceeded, `nesting deeper than ${this.maxDepth}`, { objRef: ref });
    }

    const existing = built.get(ref);
    if (existing) {
      // a shared subtree can sit deeper here than where it was first resolved
      if (depth + existing.height > this.maxDepth) {
        throw new DecodeError(DecodeErrorKind.DepthExceeded, `nesting deeper than ${this.maxDepth}`, { objRef: ref });
      }
      return existing.holdsData ? { ...existing, value: copyData(existing.value) } : existing;
    }
    if (decodeStack.has(ref)) {
      throw new DecodeError(DecodeErrorKind.CyclicReference, `object ${ref} contains itself`, { objRef: ref });
    }

    const tableEntry = this.objectTable.getEntryByObjRef(ref);

    let output: BuiltObject;
    if (tableEntry instanceof ObjectTableArrayLike) {
      decodeStack.add(ref);
      let height = 0;
      let nodes = 1;
      let holdsData = false;
      const elements = tableEntry.objrefs.map(child => {
        const element = this._buildObjectsRecursive(child, depth + 1, built, decodeStack);
        height = Math.max(height, element.height + 1);
        nodes += element.nodes;
        // checked per child, so copying reused subtrees stops at the bound
        this.checkNodeCount(nodes, ref);
        holdsData ||= element.holdsData;
        return element.value;
      });
      decodeStack.delete(ref);

      output = { value: array(elements), height, nodes, holdsData };
    }
    else if (tableEntry instanceof ObjectTableDict) {
      decodeStack.add(ref);
      let height = 0;
      let nodes = 1;
      let holdsData = false;
      const entries = new Map<string, PlistValue>();
      for (const [keyRef, valueRef] of tableEntry.entries) {
        const key = this._buildObjectsRecursive(keyRef, depth + 1, built, decodeStack).value;
        if (key.kind !== 'string') {
          throw new DecodeError(DecodeErrorKind.InvalidDictionaryKey, `dictionary key must be a string, found ${key.kind} (object ${keyRef})`, { objRef: ref });
        }
        if (entries.has(key.value)) {
          throw new DecodeError(DecodeErrorKind.DuplicateDictionaryKey, `dictionary key ${JSON.stringify(key.value)} appears more than once`, { objRef: ref });
        }
        const value = this._buildObjectsRecursive(valueRef, depth + 1, built, decodeStack);
        height = Math.max(height, value.height + 1);
        nodes += value.nodes;
        this.checkNodeCount(nodes, ref);
        holdsData ||= value.holdsData;
        entries.set(key.value, value.value);
      }
      decodeStack.delete(ref);

      output = { value: dictionary(entries), height, nodes, holdsData };
    }
    else {
      output = { value: tableEntry, height: 0, nodes: 1, holdsData: tableEntry.kind === 'data' };
    }

    built.set(ref, output);
    return output;
  }

  private checkNodeCount(nodes: number, ref: ObjRef) {
    if (nodes > this.maxNodes) {
      throw new DecodeError(DecodeErrorKind.NodeLimitExceeded, `object expands to ${nodes} nodes, more than ${this.maxNodes}`, { objRef: ref });
    }
  }
}

/**
 * Decodes a complete `bplist00` buffer into a value tree.
 *
 * @throws DecodeError on any malformed input; nothing is partially returned
 */
export function decodeBinaryPlist(input: Uint8Array | ArrayBuffer, options?: DecodeOptions): PlistValue {
  return new Reader(input, options).buildTopLevelObject();
}
