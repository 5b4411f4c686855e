/**
 * Supporting helpers
 */

export * from './collections.js';
export * from './string-to-int.js';
export * from './file-category.js';
