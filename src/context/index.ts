/**
 * Context entry parsing and output selection.
 */

export * from './context-name.js';
export * from './output-types.js';
