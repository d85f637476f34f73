import { describe, expect, it } from "vitest";
import { DecodeError, DecodeErrorKind } from "./errors/decode-error";
import { Reader, decodeBinaryPlist } from "./reader";
import { encodeBinaryPlist } from "./writer";
import { assembleBplist, mockLogger } from "../testing/bplist-fixture";
import { EQUAL } from "../compare/discrepancy";
import { compare } from "../compare/comparator";
import { silentLogger } from "../shared/logger";
import { array, bool, data, date, dateToJs, dictionary, integer, nullValue, real, string, uid } from "../value/value";
import type { DecodeOptions } from "./reader";
import type { FixtureOptions } from "../testing/bplist-fixture";

function decode(fixture: FixtureOptions, options?: DecodeOptions) {
  return decodeBinaryPlist(assembleBplist(fixture), { logger: silentLogger, ...options });
}

/** `levels` dictionaries, each holding the one below under both `a` and `b`. */
function doublingDictionaries(levels: number): FixtureOptions {
  const objects = [[0x51, 0x61], [0x51, 0x62], [0x10, 0x00]];
  for (let level = 0; level < levels; ++level) {
    const below = objects.length - 1;
    objects.push([0xD2, 0x00, 0x01, below, below]);
  }
  return { objects, topObject: objects.length - 1 };
}

function decodeFailure(input: FixtureOptions | Uint8Array, options?: DecodeOptions) {
  const bytes = input instanceof Uint8Array ? input : assembleBplist(input);
  try {
    decodeBinaryPlist(bytes, { logger: silentLogger, ...options });
  }
  catch (error) {
    if (error instanceof DecodeError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected decoding to fail');
}

describe('decodeBinaryPlist', () => {
  describe('scalars', () => {
    it('reads 1, 2 and 4 byte ints as unsigned', () => {
      expect(decode({ objects: [[0x10, 0xFF]] })).toEqual(integer(255));
      expect(decode({ objects: [[0x11, 0xFF, 0xFF]] })).toEqual(integer(65535));
      expect(decode({ objects: [[0x12, 0xFF, 0xFF, 0xFF, 0xFF]] })).toEqual(integer(4294967295));
    });

    it('reads 8 byte ints as signed', () => {
      expect(decode({ objects: [[0x13, 0xFF, 0xFF, 0xFF, 0xFF, 0xFF, 0xFF, 0xFF, 0xFF]] })).toEqual(integer(-1));
    });

    it('reads 16 byte ints up to 2^64 - 1', () => {
      const bytes = [0x14, 0, 0, 0, 0, 0, 0, 0, 0, 0xFF, 0xFF, 0xFF, 0xFF, 0xFF, 0xFF, 0xFF, 0xFF];
      expect(decode({ objects: [bytes] })).toEqual(integer(2n ** 64n - 1n));
    });

    it('reads reals, dates and uids', () => {
      expect(decode({ objects: [[0x22, 0x3F, 0xC0, 0x00, 0x00]] })).toEqual(real(1.5));
      expect(decode({ objects: [[0x80, 0x05]] })).toEqual(uid(5));

      const when = decode({ objects: [[0x33, 0, 0, 0, 0, 0, 0, 0, 0]] });
      expect(when).toEqual(date(0));
      if (when.kind === 'date') {
        expect(dateToJs(when).toISOString()).toBe('2001-01-01T00:00:00.000Z');
      }
    });

    it('reads null, fill, booleans and data', () => {
      expect(decode({ objects: [[0x00]] })).toBe(nullValue());
      expect(decode({ objects: [[0x0F]] })).toBe(nullValue());
      expect(decode({ objects: [[0x08]] })).toBe(bool(false));
      expect(decode({ objects: [[0x43, 1, 2, 3]] })).toEqual(data(Uint8Array.of(1, 2, 3)));
    });

    it('keeps unpaired surrogates in UTF-16 strings', () => {
      expect(decode({ objects: [[0x62, 0x00, 0xE9, 0xD8, 0x3D]] })).toEqual(string('é\uD83D'));
    });

    it('does not alias the input buffer', () => {
      const bytes = assembleBplist({ objects: [[0x42, 7, 8]] });
      const value = decodeBinaryPlist(bytes, { logger: silentLogger });
      bytes[9] = 0;
      expect(value).toEqual(data(Uint8Array.of(7, 8)));
    });

    it('does not alias an input Buffer', () => {
      const bytes = Buffer.from(assembleBplist({ objects: [[0x42, 7, 8]] }));
      const value = decodeBinaryPlist(bytes, { logger: silentLogger });
      bytes[9] = 0;
      expect(value).toEqual(data(Uint8Array.of(7, 8)));
    });
  });

  describe('containers', () => {
    it('decodes sets as arrays', () => {
      expect(decode({ objects: [[0xC1, 0x01], [0x10, 0x07]] })).toEqual(array([integer(7)]));
    });

    it('reads 2-byte object refs', () => {
      expect(decode({ objects: [[0xA1, 0x00, 0x01], [0x09]], objectRefSize: 2 })).toEqual(array([bool(true)]));
    });

    it('decodes a string stored once or twice to equal trees', () => {
      const shared = decode({ objects: [[0x51, 0x78], [0xA2, 0x00, 0x00]], topObject: 1 });
      const repeated = decode({ objects: [[0x51, 0x78], [0x51, 0x78], [0xA2, 0x00, 0x01]], topObject: 2 });

      expect(shared).toEqual(array([string('x'), string('x')]));
      expect(compare(shared, repeated)).toBe(EQUAL);
    });

    it('accepts a shared subtree that fits the depth bound everywhere', () => {
      const objects = [[0xA2, 0x01, 0x02], [0xA1, 0x03], [0xA1, 0x01], [0x09]];
      expect(decode({ objects }, { maxDepth: 3 })).toEqual(array([
        array([bool(true)]),
        array([array([bool(true)])]),
      ]));
    });

    it('gives every place a shared data object appears its own bytes', () => {
      const tree = decode({ objects: [[0x41, 0x01], [0xA2, 0x00, 0x00]], topObject: 1 });
      if (tree.kind !== 'array') {
        throw new Error('expected an array');
      }
      const [first, second] = tree.value;
      if (first.kind !== 'data' || second.kind !== 'data') {
        throw new Error('expected data');
      }
      first.value[0] = 99;
      expect(Array.from(second.value)).toEqual([1]);
    });

    it('copies a shared container that holds data', () => {
      const tree = decode({ objects: [[0x41, 0x01], [0xA1, 0x00], [0xA2, 0x01, 0x01]], topObject: 2 });
      expect(tree).toEqual(array([array([data(Uint8Array.of(1))]), array([data(Uint8Array.of(1))])]));
      if (tree.kind !== 'array') {
        throw new Error('expected an array');
      }
      expect(tree.value[0]).not.toBe(tree.value[1]);
    });

    it('shares a container without data', () => {
      const tree = decode({ objects: [[0x10, 0x01], [0xA1, 0x00], [0xA2, 0x01, 0x01]], topObject: 2 });
      if (tree.kind !== 'array') {
        throw new Error('expected an array');
      }
      expect(tree.value[0]).toBe(tree.value[1]);
    });

    it('counts a shared subtree at every place it appears', () => {
      const inner = dictionary({ a: integer(0), b: integer(0) });
      expect(decode(doublingDictionaries(2), { maxNodes: 7 })).toEqual(dictionary({ a: inner, b: inner }));
    });
  });

  describe('header and trailer', () => {
    it('warns on a version other than 00', () => {
      const logger = mockLogger();
      const value = decodeBinaryPlist(assembleBplist({ objects: [[0x09]], header: 'bplist01' }), { logger });

      expect(value).toBe(bool(true));
      expect(logger.warn).toHaveBeenCalledWith('WARN: version is not 00 and may not decode as expected! version = %s', '01');
    });

    it('warns on a non-zero sort version', () => {
      const logger = mockLogger();
      decodeBinaryPlist(assembleBplist({ objects: [[0x09]], sortVersion: 1 }), { logger });

      expect(logger.warn).toHaveBeenCalledWith('WARN: trailer sortVersion is %d, expected 0', 1);
    });

    it('exposes the trailer', () => {
      const reader = new Reader(assembleBplist({ objects: [[0x09]] }), { logger: silentLogger });

      expect(reader.version).toBe('00');
      expect(reader.trailer.numObjects).toBe(1);
      expect(reader.trailer.topObject).toBe(0);
      expect(reader.trailer.offsetTableOffset).toBe(9);
    });
  });

  describe('errors', () => {
    it('BadMagic', () => {
      expect(decodeFailure({ objects: [[0x09]], header: 'xplist00' }).kind).toBe(DecodeErrorKind.BadMagic);
      expect(decodeFailure({ objects: [[0x09]], header: 'bplist10' }).kind).toBe(DecodeErrorKind.BadMagic);
      expect(decodeFailure(new Uint8Array(0)).kind).toBe(DecodeErrorKind.BadMagic);
    });

    it('TruncatedTrailer', () => {
      const sixteenBytes = Uint8Array.from([...'bplist00'].map(c => c.charCodeAt(0)).concat([0, 0, 0, 0, 0, 0, 0, 0]));
      expect(decodeFailure(sixteenBytes).kind).toBe(DecodeErrorKind.TruncatedTrailer);
      expect(decodeFailure({ objects: [[0x09]], offsetIntSize: 3 }).kind).toBe(DecodeErrorKind.TruncatedTrailer);
      expect(decodeFailure({ objects: [[0x09]], unusedTrailerBytes: [0, 0, 0, 0, 1] }).kind).toBe(DecodeErrorKind.TruncatedTrailer);
    });

    it('TruncatedTrailer for a buffer cut 4 bytes short', () => {
      const bytes = encodeBinaryPlist(array([string('/bin/sh'), string('-c'), string('id')]), { logger: silentLogger });
      expect(decodeFailure(bytes.subarray(0, bytes.byteLength - 4)).kind).toBe(DecodeErrorKind.TruncatedTrailer);
    });

    it('InvalidOffsetTable', () => {
      const millionObjects = decodeFailure({ objects: [[0x09]], numObjects: 1_000_000 });
      expect(millionObjects.kind).toBe(DecodeErrorKind.InvalidOffsetTable);

      expect(decodeFailure({ objects: [[0x09]], offsetTableOffset: 4 }).kind).toBe(DecodeErrorKind.InvalidOffsetTable);
      expect(decodeFailure({ objects: [[0x09]], offsets: [200] }).kind).toBe(DecodeErrorKind.InvalidOffsetTable);
      expect(decodeFailure({ objects: [[0x09]], numObjects: 0 }).kind).toBe(DecodeErrorKind.InvalidOffsetTable);
    });

    it('DanglingReference', () => {
      expect(decodeFailure({ objects: [[0x09]], topObject: 5 }).kind).toBe(DecodeErrorKind.DanglingReference);

      const error = decodeFailure({ objects: [[0xA1, 0x03]] });
      expect(error.kind).toBe(DecodeErrorKind.DanglingReference);
      expect(error.pc.objRef).toBe(3);
    });

    it('CyclicReference', () => {
      expect(decodeFailure({ objects: [[0xA1, 0x00]] }).kind).toBe(DecodeErrorKind.CyclicReference);
      expect(decodeFailure({ objects: [[0xA1, 0x01], [0xA1, 0x00]] }).kind).toBe(DecodeErrorKind.CyclicReference);
    });

    it('UnknownTypeTag', () => {
      const error = decodeFailure({ objects: [[0x70]] });
      expect(error.kind).toBe(DecodeErrorKind.UnknownTypeTag);
      expect(error.pc).toEqual({ objRef: 0, offset: 8 });

      expect(decodeFailure({ objects: [[0x15, 0]] }).kind).toBe(DecodeErrorKind.UnknownTypeTag);
      expect(decodeFailure({ objects: [[0x82, 0, 0, 0]] }).kind).toBe(DecodeErrorKind.UnknownTypeTag);
      expect(decodeFailure({ objects: [[0x5F, 0x51, 0x61]] }).kind).toBe(DecodeErrorKind.UnknownTypeTag);
    });

    it('DepthExceeded', () => {
      const chain = [[0xA1, 0x01], [0xA1, 0x02], [0xA1, 0x03], [0x09]];
      expect(decodeFailure({ objects: chain }, { maxDepth: 2 }).kind).toBe(DecodeErrorKind.DepthExceeded);
      expect(decode({ objects: chain }, { maxDepth: 3 })).toEqual(array([array([array([bool(true)])])]));
    });

    it('DepthExceeded for a shared subtree reused deeper', () => {
      const objects = [[0xA2, 0x01, 0x02], [0xA1, 0x03], [0xA1, 0x01], [0x09]];
      expect(decodeFailure({ objects }, { maxDepth: 2 }).kind).toBe(DecodeErrorKind.DepthExceeded);
    });

    it('IntegerOverflow', () => {
      expect(decodeFailure({ objects: [[0x09]], numObjects: 2n ** 60n }).kind).toBe(DecodeErrorKind.IntegerOverflow);
      expect(decodeFailure({ objects: [[0x4F, 0x14]] }).kind).toBe(DecodeErrorKind.IntegerOverflow);

      const twoTo64 = [0x14, 0, 0, 0, 0, 0, 0, 0, 1, 0, 0, 0, 0, 0, 0, 0, 0];
      expect(decodeFailure({ objects: [twoTo64] }).kind).toBe(DecodeErrorKind.IntegerOverflow);
    });

    it('TruncatedObject', () => {
      expect(decodeFailure({ objects: [[0x55, 0x61, 0x62]] }).kind).toBe(DecodeErrorKind.TruncatedObject);

      const millionRefs = decodeFailure({ objects: [[0xAF, 0x12, 0x00, 0x0F, 0x42, 0x40]] });
      expect(millionRefs.kind).toBe(DecodeErrorKind.TruncatedObject);
      expect(millionRefs.message).toBe('TruncatedObject: 1000000 bytes at 14 run past 14 (objRef=0, offset=8)');
    });

    it('InvalidDictionaryKey', () => {
      const objects = [[0xD1, 0x01, 0x02], [0x10, 0x05], [0x09]];
      expect(decodeFailure({ objects }).kind).toBe(DecodeErrorKind.InvalidDictionaryKey);
    });

    it('NodeLimitExceeded', () => {
      expect(decodeFailure(doublingDictionaries(2), { maxNodes: 6 }).kind).toBe(DecodeErrorKind.NodeLimitExceeded);
    });

    it('NodeLimitExceeded for nested shared dictionaries under the default bound', () => {
      const error = decodeFailure(doublingDictionaries(22));
      expect(error.kind).toBe(DecodeErrorKind.NodeLimitExceeded);
      // level 19 is the first to expand past 2^20 nodes
      expect(error.pc.objRef).toBe(22);
    });

    it('DuplicateDictionaryKey', () => {
      const objects = [[0xD2, 0x01, 0x01, 0x02, 0x02], [0x51, 0x61], [0x09]];
      expect(decodeFailure({ objects }).kind).toBe(DecodeErrorKind.DuplicateDictionaryKey);
    });
  });
});
