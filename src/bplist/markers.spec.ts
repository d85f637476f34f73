import { describe, expect, it } from "vitest";
import { deStruct } from "./de-struct";
import { DecodeError } from "./errors/decode-error";
import { Marker, byteToMarker } from "./markers";
import { widthForUnsigned } from "./widths";

describe('byteToMarker', () => {
  it('splits typed markers into type and nibble', () => {
    expect(byteToMarker(0x5F, {})).toEqual({ marker: Marker.ascii, lowerNibble: 0xF });
    expect(byteToMarker(0xB3, {})).toEqual({ marker: Marker.orderedSet, lowerNibble: 3 });
    expect(byteToMarker(0x09, {})).toEqual({ marker: Marker.true, lowerNibble: 9 });
  });

  it('rejects unknown markers', () => {
    expect(() => byteToMarker(0x70, { offset: 12 })).toThrow(DecodeError);
    expect(() => byteToMarker(0x0C, {})).toThrow('UnknownTypeTag: marker byte 0x0c has a zero upper nibble but is unknown');
  });
});

describe('deStruct', () => {
  it('reads consecutive big-endian fields', () => {
    const view = new DataView(Uint8Array.of(0x01, 0x02, 0x03, 0xFF, 0xFF, 0xFF, 0xFE).buffer);
    expect(deStruct([8, 16, 32], view)).toEqual([1, 0x0203, 0xFFFF_FFFE]);
  });

  it('reads 16-byte signed ints', () => {
    const bytes = new Uint8Array(16).fill(0xFF);
    expect(deStruct([-128], new DataView(bytes.buffer))).toEqual([-1n]);
  });
});

describe('widthForUnsigned', () => {
  it('picks the smallest of 1, 2, 4 and 8 bytes', () => {
    expect([0, 255, 256, 65535, 65536, 2 ** 32].map(widthForUnsigned)).toEqual([1, 1, 2, 2, 4, 8]);
  });
});
