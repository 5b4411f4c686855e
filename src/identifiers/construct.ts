/**
 * Identifier canonicalization.
 */

/**
 * One identifier field: leading delimiter and (possibly absent) value.
 */
export type IdElement = readonly [delimiter: string, value: string | undefined];

/**
 * Concatenate `delimiter + value` for every non-empty value, in list order.
 * Empty values contribute nothing, not even their delimiter.
 *
 * @param elements - Ordered field list
 * @returns Canonical identifier
 */
export function constructId(elements: readonly IdElement[]): string {
  let id = '';
  for (const [delimiter, value] of elements) {
    if (value) {
      id += delimiter + value;
    }
  }
  return id;
}

/**
 * Append a suffix to a non-empty value (vendor `::`).
 */
export function withSuffix(value: string | undefined, suffix: string): string {
  return value ? value + suffix : '';
}
