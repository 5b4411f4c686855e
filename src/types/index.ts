/**
 * Core types for @projmgr/core
 */

export * from './component.js';
export * from './compiler.js';
export * from './context.js';
export * from './options.js';
