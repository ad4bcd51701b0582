/**
 * opticgen - derive optics from TypeScript type declarations
 *
 * Reads classes, enums, union aliases and optics spec interfaces, and
 * generates lenses, prisms, traversals, folds and focus navigators for them.
 */

export * from './types/index.js';
export * from './utils/index.js';
export * from './parser/index.js';
export * from './introspection/index.js';
export * from './analysis/index.js';
export * from './strategy/index.js';
export * from './generator/index.js';
export * from './output/index.js';
