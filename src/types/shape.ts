/**
 * Type Shapes - structural classification of one declaration
 *
 * A shape is derived once per declaration per run and never mutated.
 * Flags such as `supportsLens` are functions over the tagged state
 * (see utils/shape-utils.ts), not stored fields.
 */

import type { ClassDeclaration, TypeDeclaration, TypeRef } from './declarations.js';

export type ContainerKind = 'List' | 'Set' | 'Map' | 'Optional' | 'Array';

export interface ContainerType {
  readonly kind: ContainerKind;
  /** Element type; the value type for maps */
  readonly elementType: TypeRef;
  /** Key type, maps only */
  readonly keyType?: TypeRef;
}

/**
 * How a field is read from an instance
 */
export type FieldAccess =
  | { readonly kind: 'property'; readonly name: string }
  | { readonly kind: 'method'; readonly name: string };

export interface FieldDescriptor {
  readonly name: string;
  readonly declaredType: TypeRef;
  readonly containerType: ContainerType | undefined;
  readonly access: FieldAccess;
}

/**
 * A getter paired with its wither, e.g. `year()` / `withYear(year)`
 */
export interface CopyOperation {
  readonly fieldName: string;
  readonly getter: FieldAccess;
  readonly witherName: string;
  readonly type: TypeRef;
}

export type ShapeKind = 'Product' | 'Sum' | 'Enumerated' | 'CopyMutable' | 'Unsupported';

export interface ProductShape {
  readonly kind: 'Product';
  readonly declaration: ClassDeclaration;
  readonly fields: readonly FieldDescriptor[];
}

export interface SumShape {
  readonly kind: 'Sum';
  readonly declaration: TypeDeclaration;
  readonly variants: readonly TypeRef[];
}

export interface EnumeratedShape {
  readonly kind: 'Enumerated';
  readonly declaration: TypeDeclaration;
  readonly constants: readonly string[];
}

export interface CopyMutableShape {
  readonly kind: 'CopyMutable';
  readonly declaration: ClassDeclaration;
  readonly fields: readonly FieldDescriptor[];
  readonly copyOperations: readonly CopyOperation[];
  /** Names of qualifying setters; `hasMutableFields` is derived from this */
  readonly setters: readonly string[];
}

export interface UnsupportedShape {
  readonly kind: 'Unsupported';
  readonly declaration: TypeDeclaration;
  readonly setters: readonly string[];
  /** Why none of the other kinds matched */
  readonly reason: string;
}

export type TypeShape = ProductShape | SumShape | EnumeratedShape | CopyMutableShape | UnsupportedShape;
