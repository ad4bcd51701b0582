/**
 * Derived shape flags
 *
 * Computed from the tagged state on every call; shapes never store them.
 */

import type { ContainerType, FieldDescriptor, TypeShape } from '../types/index.js';

export function supportsLens(shape: TypeShape): boolean {
  return shape.kind === 'Product' || shape.kind === 'CopyMutable';
}

export function supportsPrism(shape: TypeShape): boolean {
  return shape.kind === 'Sum' || shape.kind === 'Enumerated';
}

/**
 * True iff the declaration exposes at least one qualifying setter
 */
export function hasMutableFields(shape: TypeShape): boolean {
  switch (shape.kind) {
    case 'CopyMutable':
    case 'Unsupported':
      return shape.setters.length > 0;
    case 'Product':
    case 'Sum':
    case 'Enumerated':
      return false;
  }
}

export function hasTraversal(field: FieldDescriptor): boolean {
  return field.containerType !== undefined;
}

export function isMapContainer(container: ContainerType): boolean {
  return container.kind === 'Map';
}

export function fieldsOf(shape: TypeShape): readonly FieldDescriptor[] {
  return shape.kind === 'Product' || shape.kind === 'CopyMutable' ? shape.fields : [];
}
