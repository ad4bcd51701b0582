/**
 * Artifact Printer - renders generation plans as TypeScript or JavaScript
 *
 * Members become methods of an exported companion object
 * (`export const PersonLenses = { name(): Lens<Person, string> {...} }`);
 * navigators become classes wrapping their `delegate` path.
 */

import { CodeGenerator } from '@babel/generator';
import * as t from '@babel/types';
import type { GeneratedArtifact, MethodDefinition, NavigatorClass, ParamSpec } from '../types/index.js';

export interface RenderOptions {
  /** Emit type annotations and `import type` (default: true) */
  typescript?: boolean;
  /** Emit imports and `export` keywords (default: true) */
  module?: boolean;
  /** Leading comment line; empty for none */
  header?: string;
}

const DEFAULT_RENDER_OPTIONS: Required<RenderOptions> = {
  typescript: true,
  module: true,
  header: 'Generated by opticgen. Do not edit.',
};

// ============================================================================
// Helpers
// ============================================================================

function addDoc(node: t.Node, doc: string | undefined): void {
  if (!doc) return;
  const lines = doc.split('\n').map((line) => ` * ${line}`.trimEnd());
  t.addComment(node, 'leading', `*\n${lines.join('\n')}\n `);
}

function typeParameters(names: readonly string[]): t.TSTypeParameterDeclaration | null {
  return names.length > 0 ? t.tsTypeParameterDeclaration(names.map((name) => t.tsTypeParameter(null, null, name))) : null;
}

function param(spec: ParamSpec, typescript: boolean): t.Identifier {
  const identifier = t.identifier(spec.name);
  if (typescript) {
    identifier.typeAnnotation = t.tsTypeAnnotation(t.cloneNode(spec.type, true));
  }
  return identifier;
}

function methodBody(method: MethodDefinition): t.BlockStatement {
  const body = t.cloneNode(method.body, true);
  return body.type === 'BlockStatement' ? body : t.blockStatement([t.returnStatement(body)]);
}

function objectMethod(method: MethodDefinition, typescript: boolean): t.ObjectMethod {
  const node = t.objectMethod(
    'method',
    t.identifier(method.name),
    method.params.map((spec) => param(spec, typescript)),
    methodBody(method)
  );
  if (typescript) {
    node.returnType = t.tsTypeAnnotation(t.cloneNode(method.returnType, true));
    node.typeParameters = typeParameters(method.typeParameters);
  }
  addDoc(node, method.doc);
  return node;
}

function classMethod(method: MethodDefinition, typescript: boolean): t.ClassMethod {
  const node = t.classMethod(
    'method',
    t.identifier(method.name),
    method.params.map((spec) => param(spec, typescript)),
    methodBody(method)
  );
  if (typescript) {
    node.returnType = t.tsTypeAnnotation(t.cloneNode(method.returnType, true));
    node.typeParameters = typeParameters(method.typeParameters);
  }
  addDoc(node, method.doc);
  return node;
}

function navigatorConstructor(navigator: NavigatorClass, typescript: boolean): t.ClassMethod {
  const delegate = t.identifier('delegate');
  if (typescript) {
    delegate.typeAnnotation = t.tsTypeAnnotation(t.cloneNode(navigator.delegateType, true));
    const property = t.tsParameterProperty(delegate);
    property.accessibility = 'private';
    property.readonly = true;
    return t.classMethod('constructor', t.identifier('constructor'), [property], t.blockStatement([]));
  }
  const assign = t.assignmentExpression(
    '=',
    t.memberExpression(t.thisExpression(), t.identifier('delegate')),
    t.identifier('delegate')
  );
  return t.classMethod(
    'constructor',
    t.identifier('constructor'),
    [delegate],
    t.blockStatement([t.expressionStatement(assign)])
  );
}

function navigatorClass(navigator: NavigatorClass, typescript: boolean): t.ClassDeclaration {
  const node = t.classDeclaration(
    t.identifier(navigator.className),
    null,
    t.classBody([
      navigatorConstructor(navigator, typescript),
      ...navigator.methods.map((method) => classMethod(method, typescript)),
    ])
  );
  if (typescript) {
    node.typeParameters = typeParameters(['S']);
  }
  return node;
}

function importDeclaration(names: readonly string[], module: string, typeOnly: boolean): t.ImportDeclaration {
  const declaration = t.importDeclaration(
    names.map((name) => t.importSpecifier(t.identifier(name), t.identifier(name))),
    t.stringLiteral(module)
  );
  if (typeOnly) {
    declaration.importKind = 'type';
  }
  return declaration;
}

function imports(artifact: GeneratedArtifact, typescript: boolean): t.ImportDeclaration[] {
  const statements: t.ImportDeclaration[] = [];
  if (artifact.runtimeImports.length > 0) {
    statements.push(importDeclaration(artifact.runtimeImports, artifact.runtimeModule, false));
  }

  const byModule = new Map<string, { values: string[]; types: string[] }>();
  for (const typeImport of artifact.typeImports) {
    if (typeImport.typeOnly && !typescript) continue;
    const entry = byModule.get(typeImport.module) ?? { values: [], types: [] };
    (typeImport.typeOnly ? entry.types : entry.values).push(typeImport.name);
    byModule.set(typeImport.module, entry);
  }
  for (const [module, { values, types }] of byModule) {
    if (values.length > 0) statements.push(importDeclaration(values, module, false));
    if (types.length > 0) statements.push(importDeclaration(types, module, true));
  }
  return statements;
}

// ============================================================================
// Rendering
// ============================================================================

/**
 * Build the program for one artifact
 */
export function artifactProgram(artifact: GeneratedArtifact, options: RenderOptions = {}): t.File {
  const opts = { ...DEFAULT_RENDER_OPTIONS, ...options };
  const body: t.Statement[] = [];

  if (opts.module) {
    body.push(...imports(artifact, opts.typescript));
  }

  const exported = (declaration: t.Declaration): t.Statement =>
    opts.module ? t.exportNamedDeclaration(declaration) : declaration;

  for (const navigator of artifact.navigators) {
    const statement = exported(navigatorClass(navigator, opts.typescript));
    addDoc(statement, `Navigator over \`${navigator.path.join('.')}\` (a {@link ${navigator.targetTypeName}}).`);
    body.push(statement);
  }

  const companion = t.variableDeclaration('const', [
    t.variableDeclarator(
      t.identifier(artifact.className),
      t.objectExpression(artifact.members.map((method) => objectMethod(method, opts.typescript)))
    ),
  ]);
  const companionStatement = exported(companion);
  addDoc(companionStatement, artifact.doc);
  body.push(companionStatement);

  const [first] = body;
  if (first && opts.header) {
    first.leadingComments = [{ type: 'CommentLine', value: ` ${opts.header}` }, ...(first.leadingComments ?? [])];
  }

  return t.file(t.program(body, [], 'module'));
}

/**
 * Render one artifact to source text
 */
export function renderArtifact(artifact: GeneratedArtifact, options: RenderOptions = {}): string {
  return new CodeGenerator(artifactProgram(artifact, options), {
    comments: true,
    jsescOption: { quotes: 'single' },
  }).generate().code;
}
