import { deStructWith, getDeStructReaderBySize, repeatReader } from "./de-struct";
import { DecodeError, DecodeErrorKind } from "./errors/decode-error";
import { Marker, byteToMarker, trailingCountNibble } from "./markers";
import { bytesToBinaryString, readUtf16BE } from "./text";
import { toBitLength } from "./widths";
import type { IParseContext } from "./parse-context";
import type { ObjRef } from "./types/bplist-index-aliases";
import type { ByteWidth } from "./widths";
import type { ILogger } from "../shared/logger";

export type IntByteLength = 1 | 2 | 4 | 8 | 16;

/** indexed by the int marker's lower nibble */
const countIntByteLengths = [1, 2, 4, 8] as const;

function toBytes(input: Uint8Array | ArrayBuffer) {
  return input instanceof Uint8Array ? input : new Uint8Array(input);
}

/**
 * Bounds-checked big-endian reads over one buffer.
 * Every read is checked against an explicit end before touching the DataView.
 */
export class BaseReader {
  readonly bytes: Uint8Array;
  protected readonly view: DataView;

  constructor(input: Uint8Array | ArrayBuffer, readonly logger: ILogger) {
    this.bytes = toBytes(input);
    this.view = new DataView(this.bytes.buffer, this.bytes.byteOffset, this.bytes.byteLength);
  }

  /**
   * @throws DecodeError TruncatedObject if `[offset, offset + byteLength)` is not inside `[0, end)`
   */
  protected ensureReadable(offset: number, byteLength: number, end: number, pc: IParseContext) {
    if (!Number.isSafeInteger(byteLength) || byteLength < 0 || offset < 0 || offset + byteLength > end) {
      throw new DecodeError(DecodeErrorKind.TruncatedObject, `${byteLength} bytes at ${offset} run past ${end}`, pc);
    }
  }

  /**
   * According to the comments in CFBinaryPList.c, in version='00', ints of size
   * 1|2|4 are always unsigned while ints of size 8|16 are always signed.
   */
  readInt(offset: number, bytes: IntByteLength) {
    switch (bytes) {
      case 1:
      case 2:
      case 4:
        return BigInt(getDeStructReaderBySize(toBitLength(bytes))(this.view, offset).value);
      case 8:
        return getDeStructReaderBySize(-64)(this.view, offset).value;
      case 16:
        return getDeStructReaderBySize(-128)(this.view, offset).value;
    }
  }

  /** uids are unsigned at every width */
  readUid(offset: number, width: ByteWidth) {
    return BigInt(getDeStructReaderBySize(toBitLength(width))(this.view, offset).value);
  }

  readReal(offset: number, bytes: 4 | 8) {
    return bytes === 4 ? this.view.getFloat32(offset) : this.view.getFloat64(offset);
  }

  readData(offset: number, size: number) {
    return this.bytes.subarray(offset, offset + size);
  }

  readAscii(offset: number, bytes: number) {
    return bytesToBinaryString(this.bytes.subarray(offset, offset + bytes));
  }

  readUnicode16(offset: number, count: number) {
    return readUtf16BE(this.view, offset, count);
  }

  /**
   * Reads the count that follows a marker whose lower nibble is 0xF.
   * That count is itself an int object (marker 0x1n then 2^n bytes).
   * Returns the count and the number of bytes the int object took.
   */
  readDynamicInt(offset: number, end: number, pc: IParseContext) {
    this.ensureReadable(offset, 1, end, pc);
    const markerByte = this.bytes[offset];
    const { marker, lowerNibble } = byteToMarker(markerByte, { ...pc, offset });
    if (marker !== Marker.int) {
      throw new DecodeError(DecodeErrorKind.UnknownTypeTag, `count after a 0x${trailingCountNibble.toString(16)} nibble must be an int, found marker ${Marker[marker]}`, { ...pc, offset });
    }
    if (lowerNibble > 3) {
      throw new DecodeError(DecodeErrorKind.IntegerOverflow, `count int of 2^${lowerNibble} bytes cannot be represented`, { ...pc, offset });
    }
    const bytes = countIntByteLengths[lowerNibble];
    this.ensureReadable(offset + 1, bytes, end, pc);

    const entry = this.readInt(offset + 1, bytes);
    if (entry < 0n || entry > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new DecodeError(DecodeErrorKind.IntegerOverflow, `count ${entry} cannot be represented`, { ...pc, offset });
    }
    return {
      entry: Number(entry),
      bytesRead: bytes + 1,
    };
  }

  /**
   * Reads `count` consecutive unsigned refs (object refs, or offsets in the offset table).
   * Callers bounds-check `count * width` first. 8-byte values past 2^53 lose precision,
   * but they are past any valid index or offset, so callers' range checks still reject them.
   */
  readObjRefs(offset: number, count: number, width: ByteWidth): ObjRef[] {
    const view = new DataView(this.bytes.buffer, this.bytes.byteOffset + offset, count * width);
    const reader = getDeStructReaderBySize(toBitLength(width));

    return deStructWith([...repeatReader(reader, count)], view).map(Number);
  }
}
