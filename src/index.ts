/**
 * @projmgr/core - Identifier and compiler-constraint core for project tooling
 *
 * Identifiers: component, aggregate, partial, condition and pack IDs
 * Compilers: specifier expansion, compatibility and intersection
 * Context: context entry parsing and output selection
 */

// Core types
export * from './types/index.js';

// Identifier codec
export * from './identifiers/index.js';

// Compiler specifier algebra
export * from './compilers/index.js';

// Context entries and output types
export * from './context/index.js';

// Supporting helpers
export * from './utils/index.js';

// Collaborator adapters
export * from './adapters/index.js';

// Option presets
export * from './policies/index.js';
