/**
 * Default compiler algebra options.
 *
 * - Comparator: dotted numeric precedence
 * - Lowest version sentinel: 0.0.0
 * - Range encoding: exact-only, so intersections never emit a two-sided range
 */

import { CompilerAlgebraSettingsSchema } from '../types/options.js';
import type { CompilerAlgebraOptions } from '../types/options.js';
import { compareVersions } from '../compilers/version-compare.js';

/**
 * Version meaning "no lower bound".
 */
export const LOWEST_VERSION = '0.0.0';

/**
 * Default options.
 *
 * @example
 * ```typescript
 * import { compilersIntersect } from '@projmgr/core';
 *
 * compilersIntersect('GCC@5.0.0..9.0.0', 'GCC@>=6.0.0', {
 *   rangeEncoding: 'bounded',
 * }); // 'GCC@6.0.0..9.0.0'
 * ```
 */
export const DEFAULT_COMPILER_OPTIONS: Readonly<CompilerAlgebraOptions> = Object.freeze<CompilerAlgebraOptions>({
  compareVersions,
  lowestVersion: LOWEST_VERSION,
  rangeEncoding: 'exact-only',
});

/**
 * Merge caller options over the defaults and validate them.
 * Throws on an invalid setting (unknown range encoding, empty sentinel).
 *
 * @param options - Partial options
 * @returns Complete options
 */
export function resolveCompilerOptions(
  options: Partial<CompilerAlgebraOptions> = {}
): CompilerAlgebraOptions {
  const settings = CompilerAlgebraSettingsSchema.parse({
    lowestVersion: options.lowestVersion ?? DEFAULT_COMPILER_OPTIONS.lowestVersion,
    rangeEncoding: options.rangeEncoding ?? DEFAULT_COMPILER_OPTIONS.rangeEncoding,
  });

  return {
    ...settings,
    compareVersions: options.compareVersions ?? DEFAULT_COMPILER_OPTIONS.compareVersions,
  };
}
