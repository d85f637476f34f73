export { compare, isEqual } from './comparator';
export type { CompareOptions } from './comparator';
export { DiscrepancyKind, EQUAL } from './discrepancy';
export type { CompareResult, Discrepancy } from './discrepancy';
export { DepthExceededError } from './errors/depth-exceeded-error';
