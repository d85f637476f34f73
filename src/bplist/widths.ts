/** Byte widths the trailer allows for offsets and object refs. */
export type ByteWidth = 1 | 2 | 4 | 8;

export function isByteWidth(n: number): n is ByteWidth {
  return n === 1 || n === 2 || n === 4 || n === 8;
}

const bitLengths = { 1: 8, 2: 16, 4: 32, 8: 64 } as const;

export function toBitLength(width: ByteWidth) {
  return bitLengths[width];
}

/** Smallest width that holds `max` as an unsigned big-endian integer. */
export function widthForUnsigned(max: number | bigint): ByteWidth {
  const value = BigInt(max);
  if (value < 0n) {
    throw new RangeError(`widthForUnsigned takes a non-negative value, got ${value}`);
  }
  if (value <= 0xFFn) {
    return 1;
  }
  if (value <= 0xFFFFn) {
    return 2;
  }
  if (value <= 0xFFFF_FFFFn) {
    return 4;
  }
  return 8;
}
