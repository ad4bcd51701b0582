/**
 * Declaration Model - what the introspection provider reports
 *
 * These types describe TypeScript type declarations as plain, immutable data.
 * The derivation engine reads nothing else: it never touches source text or
 * Babel nodes, so any provider able to fill these shapes can drive it.
 */

/**
 * Source position of a declaration or member
 */
export interface SourceLocation {
  /** Line number (1-based) */
  readonly line: number;
  /** Column number (0-based) */
  readonly column: number;
}

// ============================================================================
// Type references
// ============================================================================

export type PrimitiveName =
  | 'string'
  | 'number'
  | 'boolean'
  | 'bigint'
  | 'symbol'
  | 'object'
  | 'unknown'
  | 'any'
  | 'never'
  | 'void'
  | 'undefined'
  | 'null';

export interface PrimitiveRef {
  readonly kind: 'primitive';
  readonly name: PrimitiveName;
}

/**
 * A named type, possibly generic. An empty `typeArguments` list on a generic
 * family (`Array`, `Map`, ...) is a raw occurrence.
 */
export interface NamedRef {
  readonly kind: 'reference';
  readonly name: string;
  readonly typeArguments: readonly TypeRef[];
}

/** `T[]` or `readonly T[]` */
export interface ArrayRef {
  readonly kind: 'array';
  readonly elementType: TypeRef;
  readonly readonly: boolean;
}

export interface UnionRef {
  readonly kind: 'union';
  readonly members: readonly TypeRef[];
}

export interface LiteralRef {
  readonly kind: 'literal';
  /** Literal text as written, e.g. `'open'` or `42` */
  readonly text: string;
}

/** The polymorphic `this` type */
export interface ThisRef {
  readonly kind: 'this';
}

/** Anything the model does not break down (function types, mapped types...) */
export interface OtherRef {
  readonly kind: 'other';
  readonly text: string;
}

export type TypeRef = PrimitiveRef | NamedRef | ArrayRef | UnionRef | LiteralRef | ThisRef | OtherRef;

export type TypeRefKind = TypeRef['kind'];

// ============================================================================
// Annotations
// ============================================================================

/**
 * A user annotation attached to a declaration or member.
 *
 * Values are strings or string lists; `value` holds the positional argument
 * when one was given (`@wither withName` → `{ value: 'withName' }`).
 */
export interface Annotation {
  readonly name: string;
  readonly values: Readonly<Record<string, string | readonly string[]>>;
}

// ============================================================================
// Members
// ============================================================================

export type Accessibility = 'public' | 'protected' | 'private';

export interface ParameterDecl {
  readonly name: string;
  readonly type: TypeRef;
}

export interface MethodDecl {
  readonly name: string;
  /** Plain method, `get` accessor or `set` accessor */
  readonly kind: 'method' | 'get' | 'set';
  readonly accessibility: Accessibility;
  readonly isStatic: boolean;
  readonly isAbstract: boolean;
  readonly parameters: readonly ParameterDecl[];
  /** Declared return type; an omitted annotation is reported as `void` */
  readonly returnType: TypeRef;
  readonly annotations: readonly Annotation[];
  readonly location?: SourceLocation;
}

export interface PropertyDecl {
  readonly name: string;
  readonly type: TypeRef;
  readonly accessibility: Accessibility;
  readonly isStatic: boolean;
  readonly isReadonly: boolean;
  readonly isOptional: boolean;
}

export interface ConstructorParameterDecl {
  readonly name: string;
  readonly type: TypeRef;
  /** Declared with an accessibility or `readonly` modifier */
  readonly isParameterProperty: boolean;
  readonly isReadonly: boolean;
  readonly accessibility: Accessibility;
}

// ============================================================================
// Declarations
// ============================================================================

interface BaseDeclaration {
  readonly name: string;
  /** Module specifier the declaration is imported from */
  readonly module: string;
  readonly annotations: readonly Annotation[];
  readonly location?: SourceLocation;
}

export interface ClassDeclaration extends BaseDeclaration {
  readonly declarationKind: 'class';
  readonly typeParameters: readonly string[];
  readonly isAbstract: boolean;
  readonly superClass: TypeRef | undefined;
  readonly interfaces: readonly TypeRef[];
  /** `undefined` when the class declares no constructor */
  readonly constructorParameters: readonly ConstructorParameterDecl[] | undefined;
  readonly properties: readonly PropertyDecl[];
  readonly methods: readonly MethodDecl[];
}

export interface EnumDeclaration extends BaseDeclaration {
  readonly declarationKind: 'enum';
  readonly members: readonly string[];
}

export interface TypeAliasDeclaration extends BaseDeclaration {
  readonly declarationKind: 'typeAlias';
  readonly typeParameters: readonly string[];
  readonly aliased: TypeRef;
}

export interface InterfaceDeclaration extends BaseDeclaration {
  readonly declarationKind: 'interface';
  readonly typeParameters: readonly string[];
  readonly extends: readonly TypeRef[];
  readonly properties: readonly PropertyDecl[];
  readonly methods: readonly MethodDecl[];
}

export type TypeDeclaration = ClassDeclaration | EnumDeclaration | TypeAliasDeclaration | InterfaceDeclaration;

export type DeclarationKind = TypeDeclaration['declarationKind'];

/**
 * Name lookups and subtype queries over a set of declarations
 */
export interface TypeRegistry {
  lookup(name: string): TypeDeclaration | undefined;
  /** Reflexive, transitive subtype test */
  isSubtype(sub: TypeRef, sup: TypeRef): boolean;
  all(): readonly TypeDeclaration[];
}
