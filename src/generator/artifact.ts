/**
 * Artifact assembly - member builders and import collection
 */

import * as t from '@babel/types';
import type {
  GeneratedArtifact,
  MemberRole,
  MethodDefinition,
  NavigatorClass,
  ParamSpec,
  TypeDeclaration,
  TypeImport,
  TypeRef,
  TypeRegistry,
} from '../types/index.js';

/** Names the generated code may take from the optics runtime */
export const RUNTIME_NAMES: ReadonlySet<string> = new Set([
  'Affine',
  'AffinePath',
  'FocusPath',
  'Fold',
  'Getter',
  'Iso',
  'Lens',
  'Option',
  'Prism',
  'Traversal',
  'TraversalPath',
  'Traversals',
]);

/**
 * `Person` or `Box<T>` for a declaration's own type parameters
 */
export function selfTypeRef(declaration: TypeDeclaration): TypeRef {
  const typeParameters = declaration.declarationKind === 'enum' ? [] : declaration.typeParameters;
  return {
    kind: 'reference',
    name: declaration.name,
    typeArguments: typeParameters.map((name): TypeRef => ({ kind: 'reference', name, typeArguments: [] })),
  };
}

export interface MemberInit {
  readonly role: MemberRole;
  readonly doc?: string;
  readonly typeParameters?: readonly string[];
  readonly params?: readonly ParamSpec[];
  readonly returnType: t.TSType;
  readonly body: t.Expression | t.BlockStatement;
}

export function member(name: string, init: MemberInit): MethodDefinition {
  return {
    name,
    role: init.role,
    doc: init.doc,
    typeParameters: init.typeParameters ?? [],
    params: init.params ?? [],
    returnType: init.returnType,
    body: init.body,
  };
}

function methodNodes(method: MethodDefinition): t.Node[] {
  return [method.returnType, ...method.params.map((p) => p.type), method.body];
}

/**
 * Identifiers that name something, skipping property keys such as the
 * `name` in `source.name`
 */
function collectNames(nodes: readonly t.Node[]): Set<string> {
  const names = new Set<string>();
  const skipped = new Set<t.Node>();

  for (const root of nodes) {
    t.traverseFast(root, (node) => {
      if (node.type === 'MemberExpression' && !node.computed) {
        skipped.add(node.property);
      } else if (node.type === 'TSQualifiedName') {
        skipped.add(node.right);
      } else if (node.type === 'Identifier' && !skipped.has(node)) {
        names.add(node.name);
      }
    });
  }
  return names;
}

export interface ArtifactInit {
  readonly module: string;
  readonly className: string;
  readonly sourceTypeName: string;
  readonly doc: string;
  readonly members: readonly MethodDefinition[];
  readonly navigators?: readonly NavigatorClass[];
  readonly runtimeModule: string;
}

/**
 * Assemble an artifact, collecting the runtime names and declared types its
 * members reference
 */
export function buildArtifact(init: ArtifactInit, registry: TypeRegistry): GeneratedArtifact {
  const navigators = init.navigators ?? [];
  const nodes = [
    ...init.members.flatMap(methodNodes),
    ...navigators.flatMap((navigator) => [navigator.delegateType, ...navigator.methods.flatMap(methodNodes)]),
  ];
  const names = collectNames(nodes);

  const runtimeImports = [...names].filter((name) => RUNTIME_NAMES.has(name)).sort();

  const generatedNames = new Set([init.className, ...navigators.map((n) => n.className)]);
  const typeImports: TypeImport[] = [...names]
    .filter((name) => !RUNTIME_NAMES.has(name) && !generatedNames.has(name))
    .sort()
    .flatMap((name) => {
      const declaration = registry.lookup(name);
      if (!declaration) return [];
      const typeOnly = declaration.declarationKind === 'interface' || declaration.declarationKind === 'typeAlias';
      return [{ name, module: declaration.module, typeOnly }];
    });

  return {
    module: init.module,
    className: init.className,
    sourceTypeName: init.sourceTypeName,
    doc: init.doc,
    members: init.members,
    navigators,
    runtimeImports,
    runtimeModule: init.runtimeModule,
    typeImports,
  };
}
