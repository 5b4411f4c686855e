/**
 * Option presets
 */

export * from './default-options.js';
