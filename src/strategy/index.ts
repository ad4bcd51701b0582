/**
 * Strategy resolver exports
 */

export { resolveCopyStrategy, resolveGetter, resolveSetter, lensExpression, memberAccess } from './copy-strategy.js';
export type { LensTarget, LensAccessors } from './copy-strategy.js';
export { resolvePrismHint, enumConstantPrism } from './prism-hint.js';
export type { PrismTarget } from './prism-hint.js';
export {
  resolveTraversalHint,
  referenceExpression,
  standardTraversal,
  STANDARD_TRAVERSALS,
} from './traversal-hint.js';
export type { TraversalTarget } from './traversal-hint.js';
