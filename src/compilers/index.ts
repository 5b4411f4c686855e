/**
 * Compiler specifier algebra and version comparison.
 */

export * from './version-compare.js';
export * from './compiler-range.js';
