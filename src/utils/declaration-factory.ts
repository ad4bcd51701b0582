/**
 * Declaration factory functions
 *
 * Convenient builders for type references and declarations. The
 * introspection provider and the tests both build their models through here.
 */

import type {
  Accessibility,
  Annotation,
  ArrayRef,
  ClassDeclaration,
  ConstructorParameterDecl,
  EnumDeclaration,
  InterfaceDeclaration,
  LiteralRef,
  MethodDecl,
  NamedRef,
  OtherRef,
  ParameterDecl,
  PrimitiveName,
  PrimitiveRef,
  PropertyDecl,
  SourceLocation,
  ThisRef,
  TypeAliasDeclaration,
  TypeRef,
  UnionRef,
} from '../types/index.js';

const primitiveCache = new Map<PrimitiveName, PrimitiveRef>();

function primitive(name: PrimitiveName): PrimitiveRef {
  let ref = primitiveCache.get(name);
  if (!ref) {
    ref = { kind: 'primitive', name };
    primitiveCache.set(name, ref);
  }
  return ref;
}

const thisSingleton: ThisRef = { kind: 'this' };

/**
 * Type reference factory
 */
export const Refs = {
  string: primitive('string'),
  number: primitive('number'),
  boolean: primitive('boolean'),
  void: primitive('void'),
  unknown: primitive('unknown'),
  undefined: primitive('undefined'),
  this: thisSingleton,

  primitive,

  named(name: string, ...typeArguments: TypeRef[]): NamedRef {
    return { kind: 'reference', name, typeArguments };
  },

  array(elementType: TypeRef, readonly = false): ArrayRef {
    return { kind: 'array', elementType, readonly };
  },

  union(...members: TypeRef[]): UnionRef {
    return { kind: 'union', members };
  },

  literal(text: string): LiteralRef {
    return { kind: 'literal', text };
  },

  other(text: string): OtherRef {
    return { kind: 'other', text };
  },
};

export interface MethodInit {
  kind?: MethodDecl['kind'];
  accessibility?: Accessibility;
  isStatic?: boolean;
  isAbstract?: boolean;
  parameters?: readonly ParameterDecl[];
  returnType?: TypeRef;
  annotations?: readonly Annotation[];
  location?: SourceLocation;
}

export interface ClassInit {
  module?: string;
  typeParameters?: readonly string[];
  isAbstract?: boolean;
  superClass?: TypeRef;
  interfaces?: readonly TypeRef[];
  constructorParameters?: readonly ConstructorParameterDecl[];
  properties?: readonly PropertyDecl[];
  methods?: readonly MethodDecl[];
  annotations?: readonly Annotation[];
  location?: SourceLocation;
}

export interface InterfaceInit {
  module?: string;
  typeParameters?: readonly string[];
  extends?: readonly TypeRef[];
  properties?: readonly PropertyDecl[];
  methods?: readonly MethodDecl[];
  annotations?: readonly Annotation[];
  location?: SourceLocation;
}

const DEFAULT_MODULE = './model.js';

/**
 * Declaration factory
 */
export const Decls = {
  param(name: string, type: TypeRef): ParameterDecl {
    return { name, type };
  },

  annotation(name: string, values: Record<string, string | readonly string[]> = {}): Annotation {
    return { name, values };
  },

  method(name: string, init: MethodInit = {}): MethodDecl {
    return {
      name,
      kind: init.kind ?? 'method',
      accessibility: init.accessibility ?? 'public',
      isStatic: init.isStatic ?? false,
      isAbstract: init.isAbstract ?? false,
      parameters: init.parameters ?? [],
      returnType: init.returnType ?? Refs.void,
      annotations: init.annotations ?? [],
      location: init.location,
    };
  },

  property(name: string, type: TypeRef, init: Partial<Omit<PropertyDecl, 'name' | 'type'>> = {}): PropertyDecl {
    return {
      name,
      type,
      accessibility: init.accessibility ?? 'public',
      isStatic: init.isStatic ?? false,
      isReadonly: init.isReadonly ?? false,
      isOptional: init.isOptional ?? false,
    };
  },

  /** A `readonly` public constructor parameter property */
  component(name: string, type: TypeRef): ConstructorParameterDecl {
    return { name, type, isParameterProperty: true, isReadonly: true, accessibility: 'public' };
  },

  klass(name: string, init: ClassInit = {}): ClassDeclaration {
    return {
      declarationKind: 'class',
      name,
      module: init.module ?? DEFAULT_MODULE,
      typeParameters: init.typeParameters ?? [],
      isAbstract: init.isAbstract ?? false,
      superClass: init.superClass,
      interfaces: init.interfaces ?? [],
      constructorParameters: init.constructorParameters,
      properties: init.properties ?? [],
      methods: init.methods ?? [],
      annotations: init.annotations ?? [],
      location: init.location,
    };
  },

  /**
   * A record-like class: `class Name { constructor(readonly a: A, readonly b: B) {} }`
   */
  record(name: string, components: ReadonlyArray<readonly [string, TypeRef]>, init: ClassInit = {}): ClassDeclaration {
    return Decls.klass(name, {
      ...init,
      constructorParameters: components.map(([field, type]) => Decls.component(field, type)),
    });
  },

  enumeration(
    name: string,
    members: readonly string[],
    init: { module?: string; annotations?: readonly Annotation[] } = {}
  ): EnumDeclaration {
    return {
      declarationKind: 'enum',
      name,
      module: init.module ?? DEFAULT_MODULE,
      members,
      annotations: init.annotations ?? [],
    };
  },

  alias(
    name: string,
    aliased: TypeRef,
    init: { module?: string; typeParameters?: readonly string[]; annotations?: readonly Annotation[] } = {}
  ): TypeAliasDeclaration {
    return {
      declarationKind: 'typeAlias',
      name,
      module: init.module ?? DEFAULT_MODULE,
      typeParameters: init.typeParameters ?? [],
      aliased,
      annotations: init.annotations ?? [],
    };
  },

  iface(name: string, init: InterfaceInit = {}): InterfaceDeclaration {
    return {
      declarationKind: 'interface',
      name,
      module: init.module ?? DEFAULT_MODULE,
      typeParameters: init.typeParameters ?? [],
      extends: init.extends ?? [],
      properties: init.properties ?? [],
      methods: init.methods ?? [],
      annotations: init.annotations ?? [],
      location: init.location,
    };
  },
};
