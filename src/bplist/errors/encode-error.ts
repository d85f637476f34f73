import { formatPath } from "../../value/path";
import type { ValuePath } from "../../value/path";

export enum EncodeErrorKind {
  /** a value the binary format cannot hold, e.g. an integer outside [-2^63, 2^64) */
  UnsupportedValue = 'UnsupportedValue',
  CountOverflow = 'CountOverflow',
  DepthExceeded = 'DepthExceeded',
  /** a container that (transitively) contains itself */
  CyclicValue = 'CyclicValue',
}

export class EncodeError extends Error {
  readonly name = 'EncodeError';

  constructor(readonly kind: EncodeErrorKind, readonly detail: string, readonly path: ValuePath) {
    super(`${kind}: ${detail} at ${formatPath(path)}`);
  }
}
