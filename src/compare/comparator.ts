import { DiscrepancyKind, EQUAL } from "./discrepancy";
import { DepthExceededError } from "./errors/depth-exceeded-error";
import { isContainer } from "../value/value";
import { DEFAULT_MAX_DEPTH } from "../shared/limits";
import type { CompareResult, Discrepancy } from "./discrepancy";
import type { PathSegment } from "../value/path";
import type { PlistArray, PlistDictionary, PlistScalar, PlistValue } from "../value/value";

export interface CompareOptions {
  /** deepest nesting compared, the root being at depth 0; defaults to {@link DEFAULT_MAX_DEPTH} */
  readonly maxDepth?: number;
}

/** NaN equals NaN; 0 equals -0. */
function numbersEqual(a: number, b: number) {
  return a === b || (Number.isNaN(a) && Number.isNaN(b));
}

function bytesEqual(a: Uint8Array, b: Uint8Array) {
  if (a.byteLength !== b.byteLength) {
    return false;
  }
  for (let i = 0; i < a.byteLength; ++i) {
    if (a[i] !== b[i]) {
      return false;
    }
  }
  return true;
}

function scalarsEqual(a: PlistScalar, b: PlistScalar) {
  switch (a.kind) {
    case 'null':
      return b.kind === 'null';
    case 'boolean':
      return b.kind === 'boolean' && a.value === b.value;
    case 'integer':
      return b.kind === 'integer' && a.value === b.value;
    case 'real':
      return b.kind === 'real' && numbersEqual(a.value, b.value);
    case 'date':
      return b.kind === 'date' && numbersEqual(a.value, b.value);
    case 'data':
      return b.kind === 'data' && bytesEqual(a.value, b.value);
    case 'string':
      return b.kind === 'string' && a.value === b.value;
    case 'uid':
      return b.kind === 'uid' && a.value === b.value;
  }
}

function describeScalar(value: PlistScalar) {
  switch (value.kind) {
    case 'null':
      return 'null';
    case 'data':
      return `<${value.value.byteLength} bytes>`;
    case 'string':
      return JSON.stringify(value.value);
    case 'date':
      return `date(${value.value})`;
    case 'uid':
      return `uid(${value.value})`;
    default:
      return String(value.value);
  }
}

function range(from: number, to: number) {
  return Array.from({ length: to - from }, (_, i) => from + i);
}

/**
 * Allocation-free equality check. Gives up (false) when it reaches the depth bound,
 * leaving the reporting pass to raise the error with a path.
 */
function structurallyEqual(a: PlistValue, b: PlistValue, depth: number, maxDepth: number): boolean {
  if (depth > maxDepth) {
    return false;
  }
  if (a === b) {
    return true;
  }
  if (a.kind === 'array') {
    if (b.kind !== 'array' || a.value.length !== b.value.length) {
      return false;
    }
    for (let i = 0; i < a.value.length; ++i) {
      if (!structurallyEqual(a.value[i], b.value[i], depth + 1, maxDepth)) {
        return false;
      }
    }
    return true;
  }
  if (a.kind === 'dictionary') {
    if (b.kind !== 'dictionary' || a.value.size !== b.value.size) {
      return false;
    }
    for (const [key, child] of a.value) {
      const other = b.value.get(key);
      if (other === undefined || !structurallyEqual(child, other, depth + 1, maxDepth)) {
        return false;
      }
    }
    return true;
  }
  return !isContainer(b) && scalarsEqual(a, b);
}

class DiscrepancyCollector {
  readonly discrepancies: Discrepancy[] = [];
  private readonly path: PathSegment[] = [];

  constructor(private readonly maxDepth: number) { }

  visit(reference: PlistValue, candidate: PlistValue, depth: number) {
    if (depth > this.maxDepth) {
      throw new DepthExceededError([...this.path], this.maxDepth);
    }
    if (reference === candidate) {
      return;
    }
    if (reference.kind !== candidate.kind) {
      this.report(DiscrepancyKind.typeMismatch, `expected ${reference.kind}, found ${candidate.kind}`);
      return;
    }

    if (reference.kind === 'array' && candidate.kind === 'array') {
      this.visitArray(reference, candidate, depth);
    }
    else if (reference.kind === 'dictionary' && candidate.kind === 'dictionary') {
      this.visitDictionary(reference, candidate, depth);
    }
    else if (!isContainer(reference) && !isContainer(candidate) && !scalarsEqual(reference, candidate)) {
      this.report(DiscrepancyKind.valueMismatch, `expected ${describeScalar(reference)}, found ${describeScalar(candidate)}`);
    }
  }

  private visitArray(reference: PlistArray, candidate: PlistArray, depth: number) {
    const referenceLength = reference.value.length;
    const candidateLength = candidate.value.length;

    if (referenceLength > candidateLength) {
      this.discrepancies.push({
        path: [...this.path],
        kind: DiscrepancyKind.lengthMismatch,
        detail: `expected ${referenceLength} elements, found ${candidateLength}`,
        missingIndices: range(candidateLength, referenceLength),
      });
    }
    else if (referenceLength < candidateLength) {
      this.discrepancies.push({
        path: [...this.path],
        kind: DiscrepancyKind.lengthMismatch,
        detail: `expected ${referenceLength} elements, found ${candidateLength}`,
        extraIndices: range(referenceLength, candidateLength),
      });
    }

    const common = Math.min(referenceLength, candidateLength);
    for (let i = 0; i < common; ++i) {
      this.path.push(i);
      this.visit(reference.value[i], candidate.value[i], depth + 1);
      this.path.pop();
    }
  }

  private visitDictionary(reference: PlistDictionary, candidate: PlistDictionary, depth: number) {
    for (const [key, child] of reference.value) {
      this.path.push(key);
      const other = candidate.value.get(key);
      if (other === undefined) {
        this.report(DiscrepancyKind.missingKey);
      }
      else {
        this.visit(child, other, depth + 1);
      }
      this.path.pop();
    }

    for (const key of candidate.value.keys()) {
      if (!reference.value.has(key)) {
        this.path.push(key);
        this.report(DiscrepancyKind.extraKey);
        this.path.pop();
      }
    }
  }

  private report(kind: DiscrepancyKind, detail?: string) {
    this.discrepancies.push(detail === undefined ? { path: [...this.path], kind } : { path: [...this.path], kind, detail });
  }
}

/**
 * Diffs `candidate` against `reference`. Dictionaries compare as unordered key sets;
 * integers and reals never equal each other.
 * Discrepancies come in walk order: an array's length-mismatch before its elements,
 * reference keys in their order, then candidate-only keys.
 *
 * @throws DepthExceededError if a tree nests deeper than `maxDepth`
 */
export function compare(reference: PlistValue, candidate: PlistValue, { maxDepth = DEFAULT_MAX_DEPTH }: CompareOptions = {}): CompareResult {
  if (structurallyEqual(reference, candidate, 0, maxDepth)) {
    return EQUAL;
  }

  const collector = new DiscrepancyCollector(maxDepth);
  collector.visit(reference, candidate, 0);

  const { discrepancies } = collector;
  return discrepancies.length ? { equal: false, discrepancies } : EQUAL;
}

export function isEqual(reference: PlistValue, candidate: PlistValue, options?: CompareOptions) {
  return compare(reference, candidate, options).equal;
}
