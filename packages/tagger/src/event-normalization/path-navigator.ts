/**
 * Path Navigator
 *
 * Walks decoded JSON one segment at a time through a structural view
 * (map / sequence / scalar / absent) instead of dynamic property access.
 */

import type { PathSegment, StructuredValue } from './types.js';

const ABSENT: StructuredValue = { kind: 'absent' };

/**
 * Classify a decoded JSON value
 */
export function classify(value: unknown): StructuredValue {
  if (Array.isArray(value)) {
    return { kind: 'sequence', items: value };
  }
  if (typeof value === 'object' && value !== null) {
    return { kind: 'map', fields: Object.fromEntries(Object.entries(value)) };
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return { kind: 'scalar', value };
  }
  return ABSENT;
}

/**
 * Resolve a single segment against a node.
 *
 * Field names resolve on maps, integer indexes on sequences; anything else
 * is absent.
 */
export function step(node: StructuredValue, segment: PathSegment): StructuredValue {
  switch (node.kind) {
    case 'map':
      return typeof segment === 'string' && Object.prototype.hasOwnProperty.call(node.fields, segment)
        ? classify(node.fields[segment])
        : ABSENT;
    case 'sequence':
      return typeof segment === 'number' && Number.isInteger(segment) && segment >= 0 && segment < node.items.length
        ? classify(node.items[segment])
        : ABSENT;
    case 'scalar':
    case 'absent':
      return ABSENT;
  }
}

/**
 * Follow a path from the root; absent as soon as a segment cannot be resolved.
 */
export function navigate(root: unknown, path: readonly PathSegment[]): StructuredValue {
  let current = classify(root);

  for (const segment of path) {
    current = step(current, segment);
    if (current.kind === 'absent') {
      return ABSENT;
    }
  }

  return current;
}

/**
 * Collect resource ids from the value at the end of an id path.
 *
 * - sequence with `idKey`: the non-empty string `idKey` field of each map element
 * - sequence without `idKey`: each non-empty string element
 * - non-empty string scalar: that string
 * - anything else: nothing
 */
export function collectIds(terminal: StructuredValue, idKey?: string): string[] {
  switch (terminal.kind) {
    case 'sequence':
      return terminal.items.flatMap((item) => {
        const node = idKey === undefined ? classify(item) : step(classify(item), idKey);
        return node.kind === 'scalar' && typeof node.value === 'string' && node.value.length > 0
          ? [node.value]
          : [];
      });
    case 'scalar':
      return typeof terminal.value === 'string' && terminal.value.length > 0 ? [terminal.value] : [];
    case 'map':
    case 'absent':
      return [];
  }
}
