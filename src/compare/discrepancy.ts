import type { ValuePath } from "../value/path";

export enum DiscrepancyKind {
  /** the two nodes are different kinds; nothing below them is compared */
  typeMismatch = 'type-mismatch',
  valueMismatch = 'value-mismatch',
  /** key only in the reference */
  missingKey = 'missing-key',
  /** key only in the candidate */
  extraKey = 'extra-key',
  lengthMismatch = 'length-mismatch',
}

export interface Discrepancy {
  readonly path: ValuePath;
  readonly kind: DiscrepancyKind;
  readonly detail?: string;
  /** length-mismatch only: reference indices the candidate lacks */
  readonly missingIndices?: readonly number[];
  /** length-mismatch only: candidate indices past the reference's end */
  readonly extraIndices?: readonly number[];
}

export type CompareResult =
  | { readonly equal: true }
  | { readonly equal: false; readonly discrepancies: readonly Discrepancy[] };

/** Shared result for equal trees. */
export const EQUAL: CompareResult = Object.freeze({ equal: true });
