/**
 * Type registry - name lookups and nominal subtype queries
 */

import type { TypeDeclaration, TypeRef, TypeRegistry } from '../types/index.js';
import { typeRefEquals } from '../utils/type-utils.js';

/**
 * Build a registry over a set of declarations. Later declarations with a
 * duplicate name shadow earlier ones.
 */
export function createTypeRegistry(declarations: readonly TypeDeclaration[]): TypeRegistry {
  const byName = new Map<string, TypeDeclaration>();
  for (const declaration of declarations) {
    byName.set(declaration.name, declaration);
  }

  /** Direct supertypes declared through extends / implements */
  function supertypesOf(name: string): readonly TypeRef[] {
    const declaration = byName.get(name);
    if (!declaration) return [];
    switch (declaration.declarationKind) {
      case 'class':
        return declaration.superClass ? [declaration.superClass, ...declaration.interfaces] : declaration.interfaces;
      case 'interface':
        return declaration.extends;
      case 'enum':
      case 'typeAlias':
        return [];
    }
  }

  /** Members of a union alias, or undefined when `name` is not one */
  function unionMembersOf(name: string): readonly TypeRef[] | undefined {
    const declaration = byName.get(name);
    if (declaration?.declarationKind !== 'typeAlias') return undefined;
    return declaration.aliased.kind === 'union' ? declaration.aliased.members : undefined;
  }

  function reachesByHeritage(subName: string, supName: string, visited: Set<string>): boolean {
    if (subName === supName) return true;
    if (visited.has(subName)) return false;
    visited.add(subName);
    return supertypesOf(subName).some(
      (parent) => parent.kind === 'reference' && reachesByHeritage(parent.name, supName, visited)
    );
  }

  function isSubtype(sub: TypeRef, sup: TypeRef, visited = new Set<string>()): boolean {
    if (typeRefEquals(sub, sup)) return true;

    if (sub.kind === 'union') {
      return sub.members.every((member) => isSubtype(member, sup, visited));
    }
    if (sup.kind === 'union') {
      return sup.members.some((member) => isSubtype(sub, member, visited));
    }
    if (sup.kind === 'primitive' && sup.name === 'unknown') return true;
    if (sub.kind !== 'reference' || sup.kind !== 'reference') return false;

    if (reachesByHeritage(sub.name, sup.name, new Set())) return true;

    const members = unionMembersOf(sup.name);
    if (members && !visited.has(sup.name)) {
      visited.add(sup.name);
      return members.some((member) => isSubtype(sub, member, visited));
    }
    return false;
  }

  return {
    lookup: (name) => byName.get(name),
    isSubtype: (sub, sup) => isSubtype(sub, sup),
    all: () => [...byName.values()],
  };
}
