import { vi } from "vitest";
import type { ILogger } from "../shared/logger";

export interface FixtureOptions {
  /** raw object bodies, laid out back to back after the header */
  readonly objects: readonly (readonly number[])[];
  /** 8 ASCII chars; defaults to `bplist00` */
  readonly header?: string;
  readonly topObject?: number | bigint;
  readonly objectRefSize?: number;
  readonly offsetIntSize?: number;
  readonly numObjects?: number | bigint;
  readonly offsetTableOffset?: number | bigint;
  /** defaults to where each object landed */
  readonly offsets?: readonly number[];
  readonly sortVersion?: number;
  readonly unusedTrailerBytes?: readonly number[];
}

function bigEndian(value: number, width: number) {
  const out: number[] = [];
  let rest = BigInt(value);
  for (let i = 0; i < width; ++i) {
    out.unshift(Number(rest & 0xFFn));
    rest >>= 8n;
  }
  return out;
}

/**
 * Hand-assembles a binary plist, with every trailer field open to tampering.
 */
export function assembleBplist({
  objects,
  header = 'bplist00',
  topObject = 0,
  objectRefSize = 1,
  offsetIntSize = 1,
  numObjects = objects.length,
  offsetTableOffset,
  offsets,
  sortVersion = 0,
  unusedTrailerBytes = [0, 0, 0, 0, 0],
}: FixtureOptions): Uint8Array {
  const bytes: number[] = [...header].map(c => c.charCodeAt(0));

  const placed: number[] = [];
  for (const body of objects) {
    placed.push(bytes.length);
    bytes.push(...body);
  }

  const tableOffset = offsetTableOffset ?? bytes.length;
  for (const offset of offsets ?? placed) {
    bytes.push(...bigEndian(offset, offsetIntSize));
  }

  const trailer = new Uint8Array(32);
  const view = new DataView(trailer.buffer);
  trailer.set(unusedTrailerBytes, 0);
  view.setUint8(5, sortVersion);
  view.setUint8(6, offsetIntSize);
  view.setUint8(7, objectRefSize);
  view.setBigUint64(8, BigInt(numObjects));
  view.setBigUint64(16, BigInt(topObject));
  view.setBigUint64(24, BigInt(tableOffset));

  return Uint8Array.from([...bytes, ...trailer]);
}

/** The object area `[8, offsetTableOffset)` of a well-formed buffer. */
export function objectArea(bytes: Uint8Array) {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  return Array.from(bytes.subarray(8, Number(view.getBigUint64(bytes.byteLength - 8))));
}

export function mockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    group: vi.fn(),
    groupEnd: vi.fn(),
  } satisfies ILogger;
}
