// String.fromCharCode takes its units as arguments, so large runs go in chunks
const chunkSize = 0x2000;

/** One code unit per byte; used for ASCII strings and as a map key for blobs. */
export function bytesToBinaryString(bytes: Uint8Array) {
  let out = '';
  for (let i = 0; i < bytes.length; i += chunkSize) {
    out += String.fromCharCode(...bytes.subarray(i, i + chunkSize));
  }
  return out;
}

/**
 * Decodes `count` big-endian UTF-16 code units.
 * Unpaired surrogates are kept as-is, unlike TextDecoder which replaces them.
 */
export function readUtf16BE(view: DataView, offset: number, count: number) {
  let out = '';
  const units: number[] = [];
  for (let i = 0; i < count; ++i) {
    units.push(view.getUint16(offset + i * 2));
    if (units.length === chunkSize) {
      out += String.fromCharCode(...units);
      units.length = 0;
    }
  }
  return out + String.fromCharCode(...units);
}

export function isAscii(value: string) {
  for (let i = 0; i < value.length; ++i) {
    if (value.charCodeAt(i) > 0x7F) {
      return false;
    }
  }
  return true;
}
