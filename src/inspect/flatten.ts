import { DepthExceededError } from "../compare/errors/depth-exceeded-error";
import { DEFAULT_MAX_DEPTH } from "../shared/limits";
import type { PlistDictionary, PlistValue } from "../value/value";

export const flattenSeparator = '.';

/** Shorter key paths first, then by key, segment by segment. */
function precedes(a: readonly string[], b: readonly string[]) {
  if (a.length !== b.length) {
    return a.length < b.length;
  }
  for (let i = 0; i < a.length; ++i) {
    if (a[i] !== b[i]) {
      return a[i] < b[i];
    }
  }
  return false;
}

/**
 * JSON-normalized view of a tree: nested dictionaries collapse into dot-joined keys
 * (`{ a: { b: 1 } }` becomes `a.b`), anything else is a leaf, empty dictionaries and arrays included.
 * A root that is not a dictionary flattens to one entry under the empty key.
 *
 * When keys collide (a literal `"a.b"` next to `a: { b }`), the entry reached through fewer keys wins,
 * ties going to the key path that sorts first; dictionary order never decides.
 *
 * @throws DepthExceededError if dictionaries nest deeper than `maxDepth`
 */
export function flatten(value: PlistValue, maxDepth = DEFAULT_MAX_DEPTH): ReadonlyMap<string, PlistValue> {
  const out = new Map<string, PlistValue>();
  if (value.kind !== 'dictionary') {
    out.set('', value);
    return out;
  }

  const path: string[] = [];
  const sources = new Map<string, readonly string[]>();
  const walk = (dict: PlistDictionary, prefix: string, depth: number) => {
    if (depth > maxDepth) {
      throw new DepthExceededError([...path], maxDepth);
    }
    for (const [key, child] of dict.value) {
      const joined = prefix + key;
      if (child.kind === 'dictionary' && child.value.size > 0) {
        path.push(key);
        walk(child, joined + flattenSeparator, depth + 1);
        path.pop();
      }
      else {
        const source = [...path, key];
        const taken = sources.get(joined);
        if (taken === undefined || precedes(source, taken)) {
          sources.set(joined, source);
          out.set(joined, child);
        }
      }
    }
  };
  walk(value, '', 0);

  return out;
}
