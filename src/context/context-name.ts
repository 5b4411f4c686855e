/**
 * Context entry parsing: `<project>[.<build-type>][+<target-type>]`.
 *
 * The build and target parts may appear in either order or be omitted.
 */

import type { ContextName } from '../types/context.js';

/**
 * Extraction rules. Each pattern has two mutually exclusive capture groups;
 * at most one of them matches for any input.
 */
const CONTEXT_PATTERNS: ReadonlyArray<readonly [keyof ContextName, RegExp]> = [
  // Project name comes before dot (.) or plus (+), or stands alone
  ['project', /^(.*?)[.+].*$|^(.*)$/],
  // Build type comes after dot (.) and may be followed by plus (+)
  ['build', /^.*\.(.*)\+.*$|^.*\.(.*).*$/],
  // Target type comes after plus (+) and may be followed by dot (.)
  ['target', /^.*\+(.*)\..*$|^.*\+(.*).*$/],
];

/**
 * Parse a context entry into project, build type and target type.
 * Every rule runs against the full input; unmatched parts are ''.
 *
 * @param contextEntry - e.g. `blinky.Debug+Board`
 * @returns Context name parts
 */
export function parseContextEntry(contextEntry: string): ContextName {
  const context: ContextName = { project: '', build: '', target: '' };

  for (const [field, pattern] of CONTEXT_PATTERNS) {
    const match = pattern.exec(contextEntry);
    context[field] = match?.[1] ?? match?.[2] ?? '';
  }

  return context;
}
