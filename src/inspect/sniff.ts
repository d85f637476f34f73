import { bplistMagicNumber } from "../bplist/constants/magic-number";

export type PlistFormat = 'binary' | 'xml' | 'unknown';

const utf8Bom = [0xEF, 0xBB, 0xBF] as const;
const xmlPrefixes = ['<?xml', '<plist', '<!DOCTYPE plist'] as const;

function isXmlWhitespace(byte: number) {
  return byte === 0x20 || byte === 0x09 || byte === 0x0A || byte === 0x0D;
}

function startsWithAscii(bytes: Uint8Array, offset: number, prefix: string) {
  if (offset + prefix.length > bytes.byteLength) {
    return false;
  }
  for (let i = 0; i < prefix.length; ++i) {
    if (bytes[offset + i] !== prefix.charCodeAt(i)) {
      return false;
    }
  }
  return true;
}

/**
 * Guesses the encoding from the leading bytes only; nothing is validated.
 * XML may start with a UTF-8 BOM and whitespace.
 */
export function sniffFormat(input: Uint8Array | ArrayBuffer): PlistFormat {
  const bytes = input instanceof Uint8Array ? input : new Uint8Array(input);

  if (startsWithAscii(bytes, 0, bplistMagicNumber)) {
    return 'binary';
  }

  let offset = utf8Bom.every((byte, i) => bytes[i] === byte) ? utf8Bom.length : 0;
  while (offset < bytes.byteLength && isXmlWhitespace(bytes[offset])) {
    ++offset;
  }

  return xmlPrefixes.some(prefix => startsWithAscii(bytes, offset, prefix)) ? 'xml' : 'unknown';
}
