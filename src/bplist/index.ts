export * from './constants/magic-number';

export * from './errors/decode-error';
export * from './errors/encode-error';

export * from './models/object-table-entries';
export * from './models/object-table';
export * from './models/offset-table';
export * from './models/trailer';

export type { IParseContext } from './parse-context';
export type { ObjRef, ObjectTableOffset } from './types/bplist-index-aliases';

export * from './de-struct';

export * from './markers';

export { Reader, decodeBinaryPlist } from './reader';
export type { DecodeOptions } from './reader';
export { Writer, encodeBinaryPlist, DEFAULT_MAX_OBJECT_COUNT } from './writer';
export type { EncodeOptions } from './writer';
