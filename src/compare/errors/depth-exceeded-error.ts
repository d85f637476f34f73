import { formatPath } from "../../value/path";
import type { ValuePath } from "../../value/path";

export class DepthExceededError extends Error {
  readonly name = 'DepthExceededError';

  constructor(readonly path: ValuePath, readonly maxDepth: number) {
    super(`Nesting deeper than ${maxDepth} at ${formatPath(path)}`);
  }
}
