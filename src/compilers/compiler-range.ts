/**
 * Compiler specifier algebra.
 *
 * Specifier format: `name[@[>=]version]`, plus `name@min..max` for a
 * two-sided range. Specifiers are merged pairwise while resolving a build,
 * so compatibility is symmetric and intersection order-independent.
 */

import type { CompilerRange } from '../types/compiler.js';
import type { CompilerAlgebraOptions } from '../types/options.js';
import { resolveCompilerOptions } from '../policies/default-options.js';

export const VERSION_SEPARATOR = '@';
export const MIN_VERSION_OPERATOR = '>=';
export const RANGE_SEPARATOR = '..';

function splitFirst(value: string, delimiter: string): [string, string] {
  const index = value.indexOf(delimiter);
  return index === -1
    ? [value, '']
    : [value.slice(0, index), value.slice(index + delimiter.length)];
}

function expand(specifier: string, options: CompilerAlgebraOptions): CompilerRange {
  const [name, clause] = splitFirst(specifier, VERSION_SEPARATOR);

  if (!clause) {
    // Any version
    return { name, minVersion: options.lowestVersion };
  }

  if (clause.startsWith(MIN_VERSION_OPERATOR)) {
    // Minimum version
    return { name, minVersion: clause.slice(MIN_VERSION_OPERATOR.length) };
  }

  if (clause.includes(RANGE_SEPARATOR)) {
    const [min, max] = splitFirst(clause, RANGE_SEPARATOR);
    return max
      ? { name, minVersion: min || options.lowestVersion, maxVersion: max }
      : { name, minVersion: min || options.lowestVersion };
  }

  // Fixed version
  return { name, minVersion: clause, maxVersion: clause };
}

/**
 * A range whose upper bound lies below its own lower bound matches nothing.
 */
function isEmptyRange(range: CompilerRange, options: CompilerAlgebraOptions): boolean {
  return Boolean(
    range.maxVersion &&
    range.minVersion &&
    options.compareVersions(range.maxVersion, range.minVersion) < 0
  );
}

function compatible(first: string, second: string, options: CompilerAlgebraOptions): boolean {
  if (!first || !second) {
    return true;
  }

  const a = expand(first, options);
  const b = expand(second, options);
  const { compareVersions } = options;

  if (a.name !== b.name) {
    return false;
  }
  if (isEmptyRange(a, options) || isEmptyRange(b, options)) {
    return false;
  }
  if (a.maxVersion && b.minVersion && compareVersions(a.maxVersion, b.minVersion) < 0) {
    return false;
  }
  if (b.maxVersion && a.minVersion && compareVersions(b.maxVersion, a.minVersion) < 0) {
    return false;
  }
  return true;
}

/**
 * Expand a compiler specifier into name and version bounds.
 *
 * @param specifier - `name`, `name@1.2.3`, `name@>=1.2.3` or `name@1.2.3..2.0.0`
 * @param options - Algebra options (lowest version sentinel)
 * @returns Expanded range
 */
export function expandCompilerId(
  specifier: string,
  options?: Partial<CompilerAlgebraOptions>
): CompilerRange {
  return expand(specifier, resolveCompilerOptions(options));
}

/**
 * Check whether two compiler specifiers can be satisfied at once.
 * An empty specifier is compatible with anything; an inverted range
 * (`name@9.0.0..5.0.0`) with no non-empty specifier.
 *
 * @param first - First specifier
 * @param second - Second specifier
 * @param options - Algebra options (comparator)
 * @returns True if compatible
 */
export function areCompilersCompatible(
  first: string,
  second: string,
  options?: Partial<CompilerAlgebraOptions>
): boolean {
  return compatible(first, second, resolveCompilerOptions(options));
}

/**
 * Intersect two compiler specifiers.
 *
 * Returns '' when both are empty or they are incompatible; callers treat ''
 * as "no usable intersection". A two-sided result (min != max) is written as
 * `name@min..max` under the `bounded` encoding and dropped (with a warning)
 * under `exact-only`.
 *
 * @param first - First specifier
 * @param second - Second specifier
 * @param options - Algebra options
 * @returns Intersection specifier, or ''
 */
export function compilersIntersect(
  first: string,
  second: string,
  options?: Partial<CompilerAlgebraOptions>
): string {
  const resolved = resolveCompilerOptions(options);
  if ((!first && !second) || !compatible(first, second, resolved)) {
    return '';
  }

  const { compareVersions, lowestVersion, rangeEncoding } = resolved;
  const a = expand(first, resolved);
  const b = expand(second, resolved);

  // A missing upper bound inherits the other side's
  const firstMax = a.maxVersion ?? b.maxVersion;
  const secondMax = b.maxVersion ?? a.maxVersion;

  const name = a.name || b.name;
  const min = compareVersions(a.minVersion, b.minVersion) < 0 ? b.minVersion : a.minVersion;

  if (firstMax === undefined || secondMax === undefined) {
    return compareVersions(min, lowestVersion) === 0
      ? name                                  // any version
      : `${name}${VERSION_SEPARATOR}${MIN_VERSION_OPERATOR}${min}`;
  }

  const max = compareVersions(firstMax, secondMax) > 0 ? secondMax : firstMax;
  const order = compareVersions(min, max);
  if (order > 0) {
    // Nothing satisfies an inverted range
    return '';
  }
  if (order === 0) {
    return `${name}${VERSION_SEPARATOR}${min}`;
  }

  if (rangeEncoding === 'bounded') {
    return `${name}${VERSION_SEPARATOR}${min}${RANGE_SEPARATOR}${max}`;
  }

  console.warn(
    `[CompilerRange] Intersection of '${first}' and '${second}' is the range ${min}..${max}, ` +
    `which exact-only encoding cannot express`
  );
  return '';
}
