import { deStruct } from "../de-struct";
import { DecodeError, DecodeErrorKind } from "../errors/decode-error";
import { headerByteLength } from "../constants/magic-number";
import { isByteWidth } from "../widths";
import type { ByteWidth } from "../widths";
import type { ILogger } from "../../shared/logger";

function toSafeNumber(field: string, value: bigint, offset: number) {
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new DecodeError(DecodeErrorKind.IntegerOverflow, `trailer ${field} ${value} cannot be represented`, { offset });
  }
  return Number(value);
}

export class Trailer {
  static readonly trailerByteLength = 32;
  static readonly unusedLeadingBytes = 5;

  constructor(
    readonly sortVersion: number,
    /** size of offsets found in offsetTable that point to objects in object table */
    readonly offsetIntSize: ByteWidth,
    /** size of objectRefs that are found in arrays/sets/dicts */
    readonly objectRefSize: ByteWidth,
    readonly numObjects: number,
    readonly topObject: number,
    readonly offsetTableOffset: number,
    readonly _trailerOffset: number,
  ) { }

  /**
   * Reads the last 32 bytes. A trailer with non-zero unused bytes or impossible widths is
   * what a truncated (or shifted) file looks like, so both report TruncatedTrailer.
   */
  static fromBuffer(bytes: Uint8Array, logger: ILogger) {
    if (bytes.byteLength < headerByteLength + this.trailerByteLength) {
      throw new DecodeError(DecodeErrorKind.TruncatedTrailer, `buffer of ${bytes.byteLength} bytes cannot hold a header and a ${this.trailerByteLength}-byte trailer`, { offset: bytes.byteLength });
    }

    const trailerOffset = bytes.byteLength - this.trailerByteLength;

    const unused = bytes.subarray(trailerOffset, trailerOffset + this.unusedLeadingBytes);
    if (unused.some(b => b !== 0)) {
      throw new DecodeError(DecodeErrorKind.TruncatedTrailer, 'unused trailer bytes are not zero', { offset: trailerOffset });
    }

    const trailerView = new DataView(bytes.buffer, bytes.byteOffset + trailerOffset + this.unusedLeadingBytes, this.trailerByteLength - this.unusedLeadingBytes);
    const [sortVersion, offsetIntSize, objectRefSize, numObjects, topObject, offsetTableOffset] = deStruct([8, 8, 8, 64, 64, 64], trailerView);

    if (!isByteWidth(offsetIntSize) || !isByteWidth(objectRefSize)) {
      throw new DecodeError(DecodeErrorKind.TruncatedTrailer, `invalid trailer widths offsetIntSize=${offsetIntSize} objectRefSize=${objectRefSize}`, { offset: trailerOffset });
    }
    if (sortVersion !== 0) {
      logger.warn('WARN: trailer sortVersion is %d, expected 0', sortVersion);
    }

    return new Trailer(
      sortVersion,
      offsetIntSize,
      objectRefSize,
      toSafeNumber('numObjects', numObjects, trailerOffset),
      toSafeNumber('topObject', topObject, trailerOffset),
      toSafeNumber('offsetTableOffset', offsetTableOffset, trailerOffset),
      trailerOffset,
    );
  }

  /** Serializes the trailer into the last 32 bytes of `view`. */
  writeTo(view: DataView) {
    const start = view.byteLength - Trailer.trailerByteLength;
    for (let i = 0; i < Trailer.unusedLeadingBytes; ++i) {
      view.setUint8(start + i, 0);
    }
    view.setUint8(start + 5, this.sortVersion);
    view.setUint8(start + 6, this.offsetIntSize);
    view.setUint8(start + 7, this.objectRefSize);
    view.setBigUint64(start + 8, BigInt(this.numObjects));
    view.setBigUint64(start + 16, BigInt(this.topObject));
    view.setBigUint64(start + 24, BigInt(this.offsetTableOffset));
  }
}
