/**
 * Lenient integer parsing.
 */

const UNSIGNED_INT = /^\+?([0-9]+)$/;

/** Largest value that fits a signed 32-bit integer */
export const INT32_MAX = 2_147_483_647;

/**
 * Convert a string to an integer.
 * Empty, non-numeric, signed-negative and out-of-range input all give 0.
 *
 * @param value - e.g. `42` or `+42`
 * @returns Parsed value, or 0
 */
export function stringToInt(value: string): number {
  const match = UNSIGNED_INT.exec(value);
  if (!match) {
    return 0;
  }
  const parsed = Number(match[1]);
  return parsed > INT32_MAX ? 0 : parsed;
}
