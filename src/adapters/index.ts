/**
 * Collaborator adapters (compiler root lookup, shell execution)
 */

export * from './compiler-root.js';
export * from './exec-command.js';
