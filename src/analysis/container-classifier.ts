/**
 * Container Classifier
 *
 * Recognises the five container families a Traversal can be derived for.
 * A family reference with the wrong number of type arguments (including a
 * raw reference) is not a container.
 */

import type { ContainerKind, ContainerType, TypeRef } from '../types/index.js';

interface ContainerFamily {
  readonly kind: Exclude<ContainerKind, 'Array'>;
  readonly arity: 1 | 2;
}

const FAMILIES: ReadonlyMap<string, ContainerFamily> = new Map<string, ContainerFamily>([
  ['Array', { kind: 'List', arity: 1 }],
  ['ReadonlyArray', { kind: 'List', arity: 1 }],
  ['Set', { kind: 'Set', arity: 1 }],
  ['ReadonlySet', { kind: 'Set', arity: 1 }],
  ['Map', { kind: 'Map', arity: 2 }],
  ['ReadonlyMap', { kind: 'Map', arity: 2 }],
  // The optics runtime's own Option; other optional wrappers are not traversable
  ['Option', { kind: 'Optional', arity: 1 }],
]);

/**
 * Classify a declared type as a container, or return undefined
 */
export function classifyContainer(type: TypeRef): ContainerType | undefined {
  if (type.kind === 'array') {
    return { kind: 'Array', elementType: type.elementType };
  }
  if (type.kind !== 'reference') {
    return undefined;
  }

  const family = FAMILIES.get(type.name);
  if (!family || type.typeArguments.length !== family.arity) {
    return undefined;
  }

  const [first, second] = type.typeArguments;
  if (first === undefined) return undefined;
  if (family.arity === 2) {
    return second === undefined ? undefined : { kind: family.kind, keyType: first, elementType: second };
  }
  return { kind: family.kind, elementType: first };
}

/**
 * Names recognised as container families (array syntax aside)
 */
export function containerFamilyNames(): readonly string[] {
  return [...FAMILIES.keys()];
}
