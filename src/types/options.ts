/**
 * Compiler algebra configuration.
 */

import { z } from 'zod';
import type { VersionComparator } from './compiler.js';

/**
 * How a two-sided intersection (min != max) is written out.
 * - 'exact-only': only open-ended and exact ranges; two-sided yields ''
 * - 'bounded': two-sided ranges written as `name@min..max`
 */
export const RANGE_ENCODINGS = ['exact-only', 'bounded'] as const;

export type RangeEncoding = (typeof RANGE_ENCODINGS)[number];

/**
 * Serializable part of the options (everything but the comparator).
 */
export const CompilerAlgebraSettingsSchema = z.object({
  /** Sentinel for "no lower bound" */
  lowestVersion: z.string().min(1),

  /** Two-sided range encoding */
  rangeEncoding: z.enum(RANGE_ENCODINGS),
});

export type CompilerAlgebraSettings = z.infer<typeof CompilerAlgebraSettingsSchema>;

/**
 * Full options accepted by the compiler algebra.
 */
export interface CompilerAlgebraOptions extends CompilerAlgebraSettings {
  /** Total-order version comparator */
  compareVersions: VersionComparator;
}
