/**
 * Type Shape Analyser
 *
 * Classifies one declaration into exactly one TypeShape. The checks run in a
 * fixed order (Product, Sum, Enumerated, CopyMutable) and the first match
 * wins; everything else is Unsupported.
 */

import type {
  ClassDeclaration,
  CopyOperation,
  FieldAccess,
  FieldDescriptor,
  MethodDecl,
  TypeDeclaration,
  TypeRef,
  TypeRegistry,
  TypeShape,
} from '../types/index.js';
import { capitalise, decapitalise, typeRefEquals } from '../utils/type-utils.js';
import { classifyContainer } from './container-classifier.js';

const WITHER_PREFIX = 'with';
const SETTER_PREFIX = 'set';

// ============================================================================
// Member predicates
// ============================================================================

function isPublicInstance(member: { accessibility: string; isStatic: boolean }): boolean {
  return member.accessibility === 'public' && !member.isStatic;
}

function isVoid(type: TypeRef): boolean {
  return type.kind === 'primitive' && type.name === 'void';
}

/**
 * `setX(value): void` with a name longer than the prefix, or a `set` accessor
 */
export function isSetter(method: MethodDecl): boolean {
  if (!isPublicInstance(method)) return false;
  if (method.kind === 'set') return true;
  return (
    method.kind === 'method' &&
    method.name.startsWith(SETTER_PREFIX) &&
    method.name.length > SETTER_PREFIX.length &&
    method.parameters.length === 1 &&
    isVoid(method.returnType)
  );
}

function returnsDeclaringType(method: MethodDecl, declaration: ClassDeclaration, registry?: TypeRegistry): boolean {
  const returned = method.returnType;
  if (returned.kind === 'this') return true;
  if (returned.kind !== 'reference') return false;
  if (returned.name === declaration.name) return true;
  const self: TypeRef = { kind: 'reference', name: declaration.name, typeArguments: [] };
  return registry?.isSubtype(returned, self) ?? false;
}

/**
 * `withX(value): Self` with a name longer than the prefix
 */
export function isWitherCandidate(
  method: MethodDecl,
  declaration: ClassDeclaration,
  registry?: TypeRegistry
): boolean {
  return (
    method.kind === 'method' &&
    isPublicInstance(method) &&
    method.name.startsWith(WITHER_PREFIX) &&
    method.name.length > WITHER_PREFIX.length &&
    method.parameters.length === 1 &&
    returnsDeclaringType(method, declaration, registry)
  );
}

/**
 * Find the zero-argument accessor for a field: `x()`, `getX()`, `isX()`,
 * a `get x()` accessor or a public property `x`, all of type `type`
 */
export function findGetter(declaration: ClassDeclaration, field: string, type: TypeRef): FieldAccess | undefined {
  const candidates = [field, `get${capitalise(field)}`, `is${capitalise(field)}`];

  for (const name of candidates) {
    const method = declaration.methods.find(
      (m) =>
        m.name === name &&
        (m.kind === 'method' || m.kind === 'get') &&
        isPublicInstance(m) &&
        m.parameters.length === 0 &&
        typeRefEquals(m.returnType, type)
    );
    if (method) {
      return method.kind === 'get' ? { kind: 'property', name } : { kind: 'method', name };
    }
  }

  const property = declaration.properties.find(
    (p) => p.name === field && isPublicInstance(p) && typeRefEquals(p.type, type)
  );
  if (property) return { kind: 'property', name: field };

  const parameter = declaration.constructorParameters?.find(
    (p) => p.name === field && p.isParameterProperty && p.accessibility === 'public' && typeRefEquals(p.type, type)
  );
  return parameter ? { kind: 'property', name: field } : undefined;
}

/**
 * Pair every qualifying wither with its getter, in method order
 */
export function findCopyOperations(declaration: ClassDeclaration, registry?: TypeRegistry): CopyOperation[] {
  const operations: CopyOperation[] = [];
  const seen = new Set<string>();

  for (const method of declaration.methods) {
    if (!isWitherCandidate(method, declaration, registry)) continue;
    const [parameter] = method.parameters;
    if (!parameter) continue;

    const fieldName = decapitalise(method.name.slice(WITHER_PREFIX.length));
    if (seen.has(fieldName)) continue;

    // A wither whose getter is missing or mistyped is skipped on its own
    const getter = findGetter(declaration, fieldName, parameter.type);
    if (!getter) continue;

    seen.add(fieldName);
    operations.push({ fieldName, getter, witherName: method.name, type: parameter.type });
  }

  return operations;
}

function findSetters(declaration: ClassDeclaration): string[] {
  return declaration.methods.filter(isSetter).map((m) => m.name);
}

// ============================================================================
// Classification
// ============================================================================

function isProduct(declaration: ClassDeclaration): boolean {
  const params = declaration.constructorParameters;
  if (declaration.isAbstract || !params || params.length === 0) return false;

  const allComponents = params.every((p) => p.isParameterProperty && p.isReadonly && p.accessibility === 'public');
  const mutableProperty = declaration.properties.some((p) => isPublicInstance(p) && !p.isReadonly);
  return allComponents && !mutableProperty;
}

function productFields(declaration: ClassDeclaration): FieldDescriptor[] {
  return (declaration.constructorParameters ?? []).map((p): FieldDescriptor => ({
    name: p.name,
    declaredType: p.type,
    containerType: classifyContainer(p.type),
    access: { kind: 'property', name: p.name },
  }));
}

function analyseClass(declaration: ClassDeclaration, registry?: TypeRegistry): TypeShape {
  if (isProduct(declaration)) {
    return { kind: 'Product', declaration, fields: productFields(declaration) };
  }

  const setters = findSetters(declaration);
  const copyOperations = findCopyOperations(declaration, registry);
  if (copyOperations.length > 0) {
    return {
      kind: 'CopyMutable',
      declaration,
      copyOperations,
      setters,
      fields: copyOperations.map((op) => ({
        name: op.fieldName,
        declaredType: op.type,
        containerType: classifyContainer(op.type),
        access: op.getter,
      })),
    };
  }

  return {
    kind: 'Unsupported',
    declaration,
    setters,
    reason: declaration.isAbstract
      ? 'abstract class without wither methods'
      : 'no readonly constructor parameter properties and no getter/wither pairs',
  };
}

/**
 * Derive the shape of one declaration
 */
export function analyseShape(declaration: TypeDeclaration, registry?: TypeRegistry): TypeShape {
  switch (declaration.declarationKind) {
    case 'class':
      return analyseClass(declaration, registry);

    case 'typeAlias': {
      const aliased = declaration.aliased;
      if (aliased.kind === 'union' && aliased.members.length >= 2 && aliased.members.every((m) => m.kind === 'reference')) {
        return { kind: 'Sum', declaration, variants: aliased.members };
      }
      return {
        kind: 'Unsupported',
        declaration,
        setters: [],
        reason: 'type alias is not a union of at least two type references',
      };
    }

    case 'enum':
      return { kind: 'Enumerated', declaration, constants: declaration.members };

    case 'interface':
      return { kind: 'Unsupported', declaration, setters: [], reason: 'interfaces have no constructor to copy through' };

    default: {
      const unreachable: never = declaration;
      throw new Error(`Unknown declaration: ${JSON.stringify(unreachable)}`);
    }
  }
}
