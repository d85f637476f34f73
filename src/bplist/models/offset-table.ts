import { BaseReader } from "../base-reader";
import { headerByteLength } from "../constants/magic-number";
import { DecodeError, DecodeErrorKind } from "../errors/decode-error";
import type { ObjRef, ObjectTableOffset } from "../types/bplist-index-aliases";
import type { ILogger } from "../../shared/logger";
import type { Trailer } from "./trailer";

/**
 * Maps ObjRefs (indicies) to full-file-offsets pointing to objects.
 * Every entry is checked to point inside the object area `[8, offsetTableOffset)`.
 */
export class OffsetTable extends BaseReader {
  readonly offsetTableOffset: number;
  readonly offsetIntSize: number;
  readonly offsetTableByteLength: number;
  readonly count: number;

  private readonly _table: readonly ObjectTableOffset[];

  constructor(input: Uint8Array | ArrayBuffer, trailer: Trailer, logger: ILogger) {
    super(input, logger);

    const { offsetTableOffset, offsetIntSize, numObjects, _trailerOffset: trailerOffset } = trailer;

    this.offsetTableOffset = offsetTableOffset;
    this.offsetIntSize = offsetIntSize;
    this.count = numObjects;
    this.offsetTableByteLength = numObjects * offsetIntSize;

    if (numObjects < 1) {
      throw new DecodeError(DecodeErrorKind.InvalidOffsetTable, 'trailer declares no objects', { offset: trailerOffset });
    }
    if (offsetTableOffset < headerByteLength) {
      throw new DecodeError(DecodeErrorKind.InvalidOffsetTable, `offset table at ${offsetTableOffset} overlaps the header`, { offset: offsetTableOffset });
    }
    // before any indexed access: the declared table must fit between its offset and the trailer
    if (offsetTableOffset + this.offsetTableByteLength > trailerOffset) {
      throw new DecodeError(
        DecodeErrorKind.InvalidOffsetTable,
        `${numObjects} offsets of ${offsetIntSize} bytes at ${offsetTableOffset} run past the trailer at ${trailerOffset}`,
        { offset: offsetTableOffset },
      );
    }

    const table = this.readObjRefs(offsetTableOffset, numObjects, offsetIntSize);
    table.forEach((objectOffset, objRef) => {
      if (objectOffset < headerByteLength || objectOffset >= offsetTableOffset) {
        throw new DecodeError(
          DecodeErrorKind.InvalidOffsetTable,
          `object offset ${objectOffset} is outside the object area [${headerByteLength}, ${offsetTableOffset})`,
          { objRef, offset: offsetTableOffset + objRef * offsetIntSize },
        );
      }
    });
    this._table = table;
  }

  getObjectTableOffsetByObjRef(ref: ObjRef): ObjectTableOffset {
    if (!Number.isInteger(ref) || ref < 0 || ref >= this._table.length) {
      throw new DecodeError(DecodeErrorKind.DanglingReference, `object ref ${ref} is outside [0, ${this._table.length})`, { objRef: ref });
    }

    return this._table[ref];
  }
}
