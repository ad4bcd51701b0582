/**
 * Optics runtime - the values generated code builds
 */

export { Option } from './option.js';
export { Lens } from './lens.js';
export { Prism } from './prism.js';
export { Traversal } from './traversal.js';
export { Fold } from './fold.js';
export { Getter } from './getter.js';
export { Iso } from './iso.js';
export { Affine } from './affine.js';
export { FocusPath } from './focus-path.js';
export { AffinePath } from './affine-path.js';
export { TraversalPath } from './traversal-path.js';
export { Traversals } from './traversals.js';
