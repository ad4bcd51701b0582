/**
 * Navigator Path Composer
 *
 * Builds `<T>Focus` for a product root: one accessor per root field, and for
 * fields whose type is itself a product, a Navigator class that keeps
 * navigating. Recursion carries a remaining-depth counter and the stack of
 * types already on the path; a field that cannot be navigated gets a plain
 * `FocusPath` accessor instead, widened to an `AffinePath` for `Option` and
 * nullable fields and to a `TraversalPath` for collections.
 */

import * as t from '@babel/types';
import type {
  Diagnostic,
  FieldDescriptor,
  GeneratedArtifact,
  MethodDefinition,
  NavigatorClass,
  ProductShape,
  TypeRef,
} from '../types/index.js';
import { MAX_NAVIGATOR_DEPTH, OpticsGenerationError } from '../types/index.js';
import { analyseShape } from '../analysis/shape-analyser.js';
import { referenceExpression, standardTraversal } from '../strategy/index.js';
import { callMethod, callStatic, opticType, typeRefToTSType, typeReference } from '../utils/ast.js';
import { capitalise } from '../utils/type-utils.js';
import { buildArtifact, member, selfTypeRef } from './artifact.js';
import { fieldLens, type GeneratorContext } from './optics-generator.js';

/** Instance methods every navigator defines */
export const DELEGATE_METHODS: readonly string[] = ['get', 'set', 'modify', 'toLens', 'toPath'];

export interface FocusResult {
  readonly artifact: GeneratedArtifact;
  readonly diagnostics: readonly Diagnostic[];
}

export function focusClassName(typeName: string): string {
  return `${typeName}Focus`;
}

export function navigatorClassName(rootName: string, path: readonly string[]): string {
  return `${rootName}Focus${path.map(capitalise).join('')}Navigator`;
}

export interface Widening {
  readonly pathType: 'AffinePath' | 'TraversalPath';
  readonly focus: TypeRef;
  readonly widen: (path: t.Expression) => t.Expression;
}

function isNullish(type: TypeRef): boolean {
  return type.kind === 'primitive' && (type.name === 'undefined' || type.name === 'null');
}

/** `T | undefined` → `T`; undefined for a type that is never nullish */
function withoutNullish(type: TypeRef): TypeRef | undefined {
  if (type.kind !== 'union') return undefined;
  const present = type.members.filter((member) => !isNullish(member));
  if (present.length === type.members.length || present.length === 0) return undefined;
  const [only] = present;
  return present.length === 1 && only ? only : { kind: 'union', members: present };
}

/**
 * How the path to a leaf field widens, or undefined when it stays a FocusPath
 */
export function widening(field: FieldDescriptor): Widening | undefined {
  const container = field.containerType;
  if (container?.kind === 'Optional') {
    return { pathType: 'AffinePath', focus: container.elementType, widen: (path) => callMethod(path, 'some') };
  }
  if (container) {
    const traversal = referenceExpression(standardTraversal(container.kind));
    return {
      pathType: 'TraversalPath',
      focus: container.elementType,
      widen: (path) => callMethod(path, 'each', [traversal]),
    };
  }
  const present = withoutNullish(field.declaredType);
  if (!present) return undefined;
  return { pathType: 'AffinePath', focus: present, widen: (path) => callMethod(path, 'nullable') };
}

/** Return type and body of a leaf accessor */
function leafPath(
  field: FieldDescriptor,
  source: t.TSType,
  path: t.Expression
): { returnType: t.TSType; body: t.Expression } {
  const widened = widening(field);
  if (!widened) {
    return { returnType: opticType('FocusPath', source, typeRefToTSType(field.declaredType)), body: path };
  }
  return { returnType: opticType(widened.pathType, source, typeRefToTSType(widened.focus)), body: widened.widen(path) };
}

function delegateMember(name: string, params: MethodDefinition['params'], returnType: t.TSType, body: t.Expression): MethodDefinition {
  return member(name, { role: 'delegate', params, returnType, body });
}

function typedIdentifier(name: string, type: t.TSType): t.Identifier {
  const identifier = t.identifier(name);
  identifier.typeAnnotation = t.tsTypeAnnotation(type);
  return identifier;
}

function thisDelegate(): t.MemberExpression {
  return t.memberExpression(t.thisExpression(), t.identifier('delegate'));
}

/**
 * get / set / modify / toLens / toPath, all forwarded to the wrapped path
 */
function delegateMembers(focus: TypeRef): MethodDefinition[] {
  const s = (): t.TSType => typeReference('S');
  const a = (): t.TSType => typeRefToTSType(focus);
  const source = { name: 'source', type: s() };

  return [
    delegateMember('get', [source], a(), callMethod(thisDelegate(), 'get', [t.identifier('source')])),
    delegateMember(
      'set',
      [{ name: 'value', type: a() }, { name: 'source', type: s() }],
      s(),
      callMethod(thisDelegate(), 'set', [t.identifier('value'), t.identifier('source')])
    ),
    delegateMember(
      'modify',
      [
        {
          name: 'f',
          type: t.tsFunctionType(null, [typedIdentifier('value', a())], t.tsTypeAnnotation(a())),
        },
        { name: 'source', type: s() },
      ],
      s(),
      callMethod(thisDelegate(), 'modify', [t.identifier('f'), t.identifier('source')])
    ),
    delegateMember('toLens', [], opticType('Lens', s(), a()), callMethod(thisDelegate(), 'toLens')),
    delegateMember('toPath', [], opticType('FocusPath', s(), a()), thisDelegate()),
  ];
}

/**
 * Compose the Focus artifact and its navigators for one product root
 */
export function generateFocus(root: ProductShape, context: GeneratorContext): FocusResult {
  const { registry, options } = context;
  const rootName = root.declaration.name;
  const navigators = new Map<string, NavigatorClass>();
  const order: string[] = [];
  const diagnostics: Diagnostic[] = [];
  const visited: string[] = [rootName];

  const withinFilter = (field: string): boolean =>
    !options.excludeFields.has(field) && (options.includeFields.size === 0 || options.includeFields.has(field));

  /** The product a field navigates into, or undefined for a plain accessor */
  const navigableTarget = (field: FieldDescriptor, remaining: number): ProductShape | undefined => {
    if (remaining <= 0) return undefined;
    const type = field.declaredType;
    if (type.kind !== 'reference' || type.typeArguments.length > 0) return undefined;
    if (visited.includes(type.name)) return undefined;
    const declaration = registry.lookup(type.name);
    if (!declaration || declaration.declarationKind !== 'class' || declaration.typeParameters.length > 0) {
      return undefined;
    }
    const shape = analyseShape(declaration, registry);
    return shape.kind === 'Product' ? shape : undefined;
  };

  /**
   * Navigator class for `path`, focused on `target`; returns its name
   */
  const composeNavigator = (path: readonly string[], target: ProductShape, remaining: number): string => {
    if (visited.length > MAX_NAVIGATOR_DEPTH) {
      throw new OpticsGenerationError(
        `Navigator path ${rootName}.${path.join('.')} exceeds the maximum depth of ${MAX_NAVIGATOR_DEPTH}`
      );
    }
    visited.push(target.declaration.name);

    const className = navigatorClassName(rootName, path);
    order.push(className);
    const targetRef: TypeRef = selfTypeRef(target.declaration);
    const methods: MethodDefinition[] = delegateMembers(targetRef);

    for (const field of target.fields) {
      if (DELEGATE_METHODS.includes(field.name) || field.name === 'delegate') {
        diagnostics.push({
          severity: 'warning',
          category: 'unsupported-type',
          message: `Field '${field.name}' of ${target.declaration.name} collides with a navigator method; ${className} has no accessor for it`,
          typeName: rootName,
          memberName: field.name,
        });
        continue;
      }

      const step = callMethod(thisDelegate(), 'via', [fieldLens(target, field)]);
      const next = navigableTarget(field, remaining - 1);
      if (next) {
        const nested = composeNavigator([...path, field.name], next, remaining - 1);
        methods.push(
          member(field.name, {
            role: 'navigator',
            returnType: typeReference(nested, [typeReference('S')]),
            body: t.newExpression(t.identifier(nested), [step]),
          })
        );
      } else {
        methods.push(member(field.name, { role: 'focus', ...leafPath(field, typeReference('S'), step) }));
      }
    }

    visited.pop();
    navigators.set(className, {
      className,
      path,
      targetTypeName: target.declaration.name,
      delegateType: opticType('FocusPath', typeReference('S'), typeRefToTSType(targetRef)),
      methods,
    });
    return className;
  };

  const rootType = selfTypeRef(root.declaration);
  const typeParameters = root.declaration.typeParameters;
  const members: MethodDefinition[] = root.fields.map((field) => {
    const path = callStatic('FocusPath', 'of', [fieldLens(root, field)]);
    const target = withinFilter(field.name) ? navigableTarget(field, options.maxDepth) : undefined;

    if (target) {
      const navigator = composeNavigator([field.name], target, options.maxDepth);
      return member(field.name, {
        role: 'navigator',
        doc: `Navigator into the \`${field.name}\` field of {@link ${rootName}}.`,
        typeParameters,
        returnType: typeReference(navigator, [typeRefToTSType(rootType)]),
        body: t.newExpression(t.identifier(navigator), [path]),
      });
    }
    return member(field.name, {
      role: 'focus',
      doc: `Path to the \`${field.name}\` field of {@link ${rootName}}.`,
      typeParameters,
      ...leafPath(field, typeRefToTSType(rootType), path),
    });
  });

  options.log(`focus: ${rootName} (maxDepth ${options.maxDepth}, ${order.length} navigators)`);

  const artifact = buildArtifact(
    {
      module: options.targetModule ?? root.declaration.module,
      className: focusClassName(rootName),
      sourceTypeName: rootName,
      doc: `Fluent paths into {@link ${rootName}}.`,
      members,
      navigators: order.flatMap((name) => navigators.get(name) ?? []),
      runtimeModule: options.runtimeModule,
    },
    registry
  );
  return { artifact, diagnostics };
}
