import { BaseReader } from "../base-reader";
import { DecodeError, DecodeErrorKind } from "../errors/decode-error";
import { Marker, byteToMarker, hexByte, isPrimitiveMarker, markerPrimitives, trailingCountNibble } from "../markers";
import { isByteWidth } from "../widths";
import { ObjectTableArrayLike, ObjectTableDict } from "./object-table-entries";
import { bool, data, date, integer, isIntegerInRange, nullValue, real, string, uid } from "../../value/value";
import type { IntByteLength } from "../base-reader";
import type { IParseContext } from "../parse-context";
import type { ObjRef } from "../types/bplist-index-aliases";
import type { ByteWidth } from "../widths";
import type { ObjectTableEntry } from "./object-table-entries";
import type { OffsetTable } from "./offset-table";
import type { Trailer } from "./trailer";
import type { ILogger } from "../../shared/logger";

/** indexed by the int marker's lower nibble */
const intByteLengths: readonly IntByteLength[] = [1, 2, 4, 8, 16];

/**
 * Parses object-table entries on demand, by object ref.
 * Scalars come back as finished value nodes; containers as their raw refs,
 * which the {@link Reader} resolves.
 */
export class ObjectTable extends BaseReader {
  /** objects live in `[8, objectAreaEnd)`; nothing may be read past it */
  readonly objectAreaEnd: number;
  readonly objectRefSize: ByteWidth;

  private readonly _table = new Map<ObjRef, ObjectTableEntry>();

  constructor(
    input: Uint8Array | ArrayBuffer,
    private readonly offsetTable: OffsetTable,
    trailer: Trailer,
    logger: ILogger,
  ) {
    super(input, logger);

    this.objectAreaEnd = trailer.offsetTableOffset;
    this.objectRefSize = trailer.objectRefSize;
  }

  get size() {
    return this._table.size;
  }

  /**
   * @throws DecodeError DanglingReference if `ref` has no offset-table entry
   */
  getEntryByObjRef(ref: ObjRef): ObjectTableEntry {
    const existing = this._table.get(ref);
    if (existing !== undefined) {
      return existing;
    }

    const offset = this.offsetTable.getObjectTableOffsetByObjRef(ref);
    const entry = this.parseObjectTableEntry(offset, { objRef: ref, offset });
    this._table.set(ref, entry);
    return entry;
  }

  /** Lower nibble as a count, or the int object that follows when it is 0xF. */
  private readCount(lowerNibble: number, offset: number, pc: IParseContext) {
    if (lowerNibble !== trailingCountNibble) {
      return { count: lowerNibble, bytesRead: 0 };
    }
    const { entry, bytesRead } = this.readDynamicInt(offset, this.objectAreaEnd, pc);
    return { count: entry, bytesRead };
  }

  private parseObjectTableEntry(offset: number, pc: IParseContext): ObjectTableEntry {
    const end = this.objectAreaEnd;
    this.ensureReadable(offset, 1, end, pc);

    const markerByte = this.bytes[offset];
    const { marker, lowerNibble } = byteToMarker(markerByte, pc);
    this.logger.debug('DBG: objRef=%d offset=%d found marker=%s with lowerNibble=0x%s', pc.objRef, offset, Marker[marker], lowerNibble.toString(16));

    if (isPrimitiveMarker(marker)) {
      const primitive = markerPrimitives.get(marker);
      return typeof primitive === 'boolean' ? bool(primitive) : nullValue();
    }

    const bodyOffset = offset + 1;
    const badNibble = () => new DecodeError(
      DecodeErrorKind.UnknownTypeTag,
      `marker byte 0x${hexByte(markerByte)} has an invalid size nibble for ${Marker[marker]}`,
      pc,
    );

    switch (marker) {
      case Marker.int: {
        const bytes = intByteLengths[lowerNibble];
        if (bytes === undefined) {
          throw badNibble();
        }
        this.ensureReadable(bodyOffset, bytes, end, pc);
        const value = this.readInt(bodyOffset, bytes);
        if (!isIntegerInRange(value)) {
          throw new DecodeError(DecodeErrorKind.IntegerOverflow, `integer ${value} is outside [-2^63, 2^64)`, pc);
        }
        return integer(value);
      }

      case Marker.real: {
        if (lowerNibble !== 2 && lowerNibble !== 3) {
          throw badNibble();
        }
        const bytes = lowerNibble === 2 ? 4 : 8;
        this.ensureReadable(bodyOffset, bytes, end, pc);
        return real(this.readReal(bodyOffset, bytes));
      }

      case Marker.date: {
        if (lowerNibble !== 2 && lowerNibble !== 3) {
          throw badNibble();
        }
        // always 8 bytes when written by CoreFoundation, but 4-byte dates turn up in the wild
        const bytes = lowerNibble === 2 ? 4 : 8;
        if (bytes !== 8) {
          this.logger.warn('WARN: non-standard %d-byte date at offset %d', bytes, offset);
        }
        this.ensureReadable(bodyOffset, bytes, end, pc);
        return date(this.readReal(bodyOffset, bytes));
      }

      case Marker.data: {
        const { count, bytesRead } = this.readCount(lowerNibble, bodyOffset, pc);
        const start = bodyOffset + bytesRead;
        this.ensureReadable(start, count, end, pc);
        return data(this.readData(start, count));
      }

      case Marker.ascii: {
        const { count, bytesRead } = this.readCount(lowerNibble, bodyOffset, pc);
        const start = bodyOffset + bytesRead;
        this.ensureReadable(start, count, end, pc);
        return string(this.readAscii(start, count));
      }

      case Marker.unicode: {
        const { count, bytesRead } = this.readCount(lowerNibble, bodyOffset, pc);
        const start = bodyOffset + bytesRead;
        this.ensureReadable(start, count * 2, end, pc);
        return string(this.readUnicode16(start, count));
      }

      case Marker.uid: {
        const width = lowerNibble + 1;
        if (!isByteWidth(width)) {
          throw badNibble();
        }
        this.ensureReadable(bodyOffset, width, end, pc);
        return uid(this.readUid(bodyOffset, width));
      }

      case Marker.array:
      case Marker.set:
      case Marker.orderedSet: {
        const { count, bytesRead } = this.readCount(lowerNibble, bodyOffset, pc);
        const start = bodyOffset + bytesRead;
        this.ensureReadable(start, count * this.objectRefSize, end, pc);
        return new ObjectTableArrayLike(marker, this.readObjRefs(start, count, this.objectRefSize));
      }

      case Marker.dict: {
        const { count, bytesRead } = this.readCount(lowerNibble, bodyOffset, pc);
        const start = bodyOffset + bytesRead;
        this.ensureReadable(start, count * this.objectRefSize * 2, end, pc);
        const keyRefs = this.readObjRefs(start, count, this.objectRefSize);
        const valueRefs = this.readObjRefs(start + count * this.objectRefSize, count, this.objectRefSize);
        return new ObjectTableDict(keyRefs.map((key, i) => [key, valueRefs[i]] as const));
      }

      default:
        throw new DecodeError(DecodeErrorKind.UnknownTypeTag, `marker byte 0x${hexByte(markerByte)} is not a known object type`, pc);
    }
  }
}
