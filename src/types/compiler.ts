/**
 * Compiler specifier types.
 */

/**
 * Version comparator: negative, zero or positive for less, equal, greater.
 */
export type VersionComparator = (a: string, b: string) => number;

/**
 * Expanded compiler specifier (`name[@[>=]version]`).
 */
export interface CompilerRange {
  /** Compiler name (text before `@`) */
  name: string;

  /** Lower bound; the lowest version sentinel when unconstrained */
  minVersion: string;

  /** Upper bound; undefined when unconstrained */
  maxVersion?: string;
}
