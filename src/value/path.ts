/** One step from a container to a child: an array index or a dictionary key. */
export type PathSegment = number | string;
export type ValuePath = readonly PathSegment[];

const identifierPattern = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/**
 * Renders a path for messages: `$`, `$[2]`, `$.Label`, `$["key with space"]`.
 */
export function formatPath(path: ValuePath) {
  let out = '$';
  for (const segment of path) {
    if (typeof segment === 'number') {
      out += `[${segment}]`;
    }
    else if (identifierPattern.test(segment)) {
      out += `.${segment}`;
    }
    else {
      out += `[${JSON.stringify(segment)}]`;
    }
  }
  return out;
}
