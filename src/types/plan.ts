/**
 * Generation Plan - what the engine hands to the code sink
 *
 * Signatures carry TypeScript type nodes and bodies carry expression trees,
 * both built with @babel/types. Nothing here is pre-rendered text.
 */

import type * as t from '@babel/types';

export type OpticKind = 'lens' | 'prism' | 'traversal' | 'fold' | 'affine' | 'iso' | 'getter';

export type MemberRole =
  | OpticKind
  | 'updater'
  | 'focus'
  | 'navigator'
  | 'delegate';

export interface ParamSpec {
  readonly name: string;
  readonly type: t.TSType;
}

/**
 * One method of a generated class. Artifact members are static; navigator
 * members are instance methods.
 */
export interface MethodDefinition {
  readonly name: string;
  readonly role: MemberRole;
  readonly doc?: string;
  readonly typeParameters: readonly string[];
  readonly params: readonly ParamSpec[];
  readonly returnType: t.TSType;
  /** An expression is returned; a block is used as the method body */
  readonly body: t.Expression | t.BlockStatement;
}

/**
 * A Navigator: wraps `FocusPath<S, Target>` and exposes one method per
 * field of the target type
 */
export interface NavigatorClass {
  readonly className: string;
  /** Field names from the root type down to this navigator's focus */
  readonly path: readonly string[];
  readonly targetTypeName: string;
  readonly delegateType: t.TSType;
  readonly methods: readonly MethodDefinition[];
}

export interface TypeImport {
  readonly name: string;
  readonly module: string;
  /** Interfaces and aliases have no runtime value */
  readonly typeOnly: boolean;
}

export interface GeneratedArtifact {
  /** Target module; together with `className` the fully qualified name */
  readonly module: string;
  readonly className: string;
  readonly sourceTypeName: string;
  readonly doc: string;
  readonly members: readonly MethodDefinition[];
  readonly navigators: readonly NavigatorClass[];
  /** Runtime names the members reference, sorted */
  readonly runtimeImports: readonly string[];
  /** Module specifier the runtime names are imported from */
  readonly runtimeModule: string;
  readonly typeImports: readonly TypeImport[];
}

export function qualifiedName(artifact: Pick<GeneratedArtifact, 'module' | 'className'>): string {
  return `${artifact.module}/${artifact.className}`;
}
