/**
 * Ordered collection helpers.
 */

/**
 * String pair (key/value, name/path, ...).
 */
export type StrPair = readonly [string, string];

function itemsEqual(a: string | StrPair, b: string | StrPair): boolean {
  if (typeof a === 'string' || typeof b === 'string') {
    return a === b;
  }
  return a[0] === b[0] && a[1] === b[1];
}

/**
 * Append a value unless an equal element is already present.
 * Keeps first-occurrence order; pairs compare element-wise.
 *
 * @param list - Collection to append to (mutated)
 * @param value - Value to add
 * @param isEqual - Equality override
 * @returns True if the value was appended
 */
export function pushBackUniquely<T extends string | StrPair>(
  list: T[],
  value: T,
  isEqual: (a: T, b: T) => boolean = itemsEqual
): boolean {
  if (list.some((item) => isEqual(item, value))) {
    return false;
  }
  list.push(value);
  return true;
}
