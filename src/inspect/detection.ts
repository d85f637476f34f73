import { DecodeError } from "../bplist/errors/decode-error";
import { Plist } from "./plist";
import type { PlistFromBinaryOptions } from "./plist";
import type { CompareOptions } from "../compare/comparator";
import type { CompareResult } from "../compare/discrepancy";

/** What a detection layer gets to judge: a decoded candidate and its diff against a known-good reference. */
export interface DetectionInput {
  readonly candidate: Plist;
  readonly reference: Plist;
  readonly result: CompareResult;
}

/**
 * Implemented outside this library; verdict policy (which keys matter, how much) lives there.
 */
export interface IDetectionHook<TVerdict> {
  evaluate(input: DetectionInput): TVerdict;
}

export type InspectOutcome =
  | { readonly ok: true; readonly candidate: Plist; readonly result: CompareResult }
  | { readonly ok: false; readonly error: DecodeError };

export interface InspectOptions extends PlistFromBinaryOptions, CompareOptions { }

/**
 * Decodes `input` and diffs it against `reference`.
 * Malformed input comes back as `{ ok: false }` so a caller can treat it as a signal;
 * anything other than a {@link DecodeError} still throws.
 */
export function inspectCandidate(input: Uint8Array | ArrayBuffer, reference: Plist, { maxDepth, ...options }: InspectOptions = {}): InspectOutcome {
  let candidate: Plist;
  try {
    candidate = Plist.fromBinary(input, { maxDepth, ...options });
  }
  catch (error) {
    if (error instanceof DecodeError) {
      return { ok: false, error };
    }
    throw error;
  }

  return { ok: true, candidate, result: reference.diff(candidate, { maxDepth }) };
}
