/**
 * Type reference utilities
 */

import type { TypeRef, TypeRefKind } from '../types/index.js';

/**
 * Check if a type reference is of a specific kind
 */
export function isRefKind<K extends TypeRefKind>(ref: TypeRef, kind: K): ref is Extract<TypeRef, { kind: K }> {
  return ref.kind === kind;
}

/**
 * Structural equality of two type references
 */
export function typeRefEquals(a: TypeRef, b: TypeRef): boolean {
  switch (a.kind) {
    case 'primitive':
      return b.kind === 'primitive' && a.name === b.name;
    case 'reference':
      return (
        b.kind === 'reference' &&
        a.name === b.name &&
        a.typeArguments.length === b.typeArguments.length &&
        a.typeArguments.every((arg, i) => {
          const other = b.typeArguments[i];
          return other !== undefined && typeRefEquals(arg, other);
        })
      );
    case 'array':
      return b.kind === 'array' && a.readonly === b.readonly && typeRefEquals(a.elementType, b.elementType);
    case 'union':
      return (
        b.kind === 'union' &&
        a.members.length === b.members.length &&
        a.members.every((member) => b.members.some((other) => typeRefEquals(member, other)))
      );
    case 'literal':
      return b.kind === 'literal' && a.text === b.text;
    case 'this':
      return b.kind === 'this';
    case 'other':
      return b.kind === 'other' && a.text === b.text;
  }
}

/**
 * Convert a type reference to TypeScript source text
 */
export function typeRefToString(ref: TypeRef): string {
  switch (ref.kind) {
    case 'primitive':
      return ref.name;
    case 'reference':
      return ref.typeArguments.length === 0
        ? ref.name
        : `${ref.name}<${ref.typeArguments.map(typeRefToString).join(', ')}>`;
    case 'array': {
      const element = typeRefToString(ref.elementType);
      const wrapped = ref.elementType.kind === 'union' ? `(${element})` : element;
      return `${ref.readonly ? 'readonly ' : ''}${wrapped}[]`;
    }
    case 'union':
      return ref.members.map(typeRefToString).join(' | ');
    case 'literal':
      return ref.text;
    case 'this':
      return 'this';
    case 'other':
      return ref.text;
  }
}

/**
 * Name of a reference, or undefined for non-references
 */
export function referenceName(ref: TypeRef): string | undefined {
  return ref.kind === 'reference' ? ref.name : undefined;
}

// ============================================================================
// Identifier helpers
// ============================================================================

export function capitalise(name: string): string {
  return name.length === 0 ? name : name.charAt(0).toUpperCase() + name.slice(1);
}

export function decapitalise(name: string): string {
  return name.length === 0 ? name : name.charAt(0).toLowerCase() + name.slice(1);
}

/**
 * Lower camel case of a type or constant name: `Circle` → `circle`,
 * `HTTP_ERROR` → `httpError`, `DARK_MODE` → `darkMode`
 */
export function toLowerCamel(name: string): string {
  if (!name.includes('_') && name !== name.toUpperCase()) {
    return decapitalise(name);
  }
  const parts = name.split('_').filter((part) => part.length > 0);
  return parts
    .map((part, i) => {
      const lower = part.toLowerCase();
      return i === 0 ? lower : capitalise(lower);
    })
    .join('');
}
