/**
 * Identifier codec: construction and decomposition of component and pack IDs.
 */

export * from './delimiters.js';
export * from './construct.js';
export * from './component-id.js';
export * from './decompose.js';
