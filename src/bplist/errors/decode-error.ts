import type { IParseContext } from "../parse-context";

export enum DecodeErrorKind {
  BadMagic = 'BadMagic',
  TruncatedTrailer = 'TruncatedTrailer',
  /** offset table offset/width inconsistent with the buffer, or an entry pointing outside the object area */
  InvalidOffsetTable = 'InvalidOffsetTable',
  /** object ref out of range */
  DanglingReference = 'DanglingReference',
  CyclicReference = 'CyclicReference',
  UnknownTypeTag = 'UnknownTypeTag',
  DepthExceeded = 'DepthExceeded',
  /** the tree, with shared subtrees expanded, has more nodes than allowed */
  NodeLimitExceeded = 'NodeLimitExceeded',
  /** a length, count or integer that cannot be represented */
  IntegerOverflow = 'IntegerOverflow',
  /** an object whose declared length runs past the end of the object area */
  TruncatedObject = 'TruncatedObject',
  InvalidDictionaryKey = 'InvalidDictionaryKey',
  DuplicateDictionaryKey = 'DuplicateDictionaryKey',
}

function describeContext({ offset, objRef }: IParseContext) {
  const parts: string[] = [];
  if (objRef !== undefined) {
    parts.push(`objRef=${objRef}`);
  }
  if (offset !== undefined) {
    parts.push(`offset=${offset}`);
  }
  return parts.length ? ` (${parts.join(', ')})` : '';
}

export class DecodeError extends Error {
  readonly name = 'DecodeError';

  constructor(readonly kind: DecodeErrorKind, readonly detail: string, readonly pc: IParseContext = {}) {
    super(`${kind}: ${detail}${describeContext(pc)}`);
  }
}
