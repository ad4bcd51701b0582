/**
 * Babel AST builders shared by the resolvers and generators
 */

import * as t from '@babel/types';
import { parse } from '../parser/index.js';
import type { PrimitiveName, TypeRef } from '../types/index.js';

/** Dotted identifier path with an optional trailing `()` */
const DOTTED_REFERENCE = /^[A-Za-z_$][\w$]*(?:\.[A-Za-z_$][\w$]*)*(?:\(\))?$/;

export function isDottedReference(text: string): boolean {
  return DOTTED_REFERENCE.test(text);
}

/**
 * `a.b.c` as a member expression chain
 */
export function memberPath(path: string): t.Identifier | t.MemberExpression {
  const [head, ...rest] = path.split('.');
  let expr: t.Identifier | t.MemberExpression = t.identifier(head ?? path);
  for (const segment of rest) {
    expr = t.memberExpression(expr, t.identifier(segment));
  }
  return expr;
}

/**
 * `object.method(...args)`
 */
export function callMethod(object: t.Expression, method: string, args: t.Expression[] = []): t.CallExpression {
  return t.callExpression(t.memberExpression(object, t.identifier(method)), args);
}

/**
 * `Owner.method(...args)` for a dotted owner
 */
export function callStatic(owner: string, method: string, args: t.Expression[] = []): t.CallExpression {
  return callMethod(memberPath(owner), method, args);
}

export function arrow(params: string[], body: t.Expression | t.BlockStatement): t.ArrowFunctionExpression {
  return t.arrowFunctionExpression(
    params.map((name) => t.identifier(name)),
    body
  );
}

/**
 * `throw new Error(message)` as a block body
 */
export function throwingBlock(message: string): t.BlockStatement {
  return t.blockStatement([t.throwStatement(t.newExpression(t.identifier('Error'), [t.stringLiteral(message)]))]);
}

// ============================================================================
// Type nodes
// ============================================================================

export function typeReference(name: string, args: t.TSType[] = []): t.TSTypeReference {
  const [head, ...rest] = name.split('.');
  let typeName: t.Identifier | t.TSQualifiedName = t.identifier(head ?? name);
  for (const segment of rest) {
    typeName = t.tsQualifiedName(typeName, t.identifier(segment));
  }
  return t.tsTypeReference(typeName, args.length > 0 ? t.tsTypeParameterInstantiation(args) : null);
}

/**
 * `Optic<S, A>`
 */
export function opticType(optic: string, source: t.TSType, focus: t.TSType): t.TSTypeReference {
  return typeReference(optic, [source, focus]);
}

function parseTypeText(text: string): t.TSType {
  const { ast, errors } = parse(`type __T = ${text};`);
  const [statement] = ast.program.body;
  if (errors.length === 0 && statement?.type === 'TSTypeAliasDeclaration') {
    return statement.typeAnnotation;
  }
  return t.tsUnknownKeyword();
}

function literalType(text: string): t.TSType {
  if (text === 'true' || text === 'false') {
    return t.tsLiteralType(t.booleanLiteral(text === 'true'));
  }
  if (/^-?\d+(\.\d+)?$/.test(text)) {
    return t.tsLiteralType(t.numericLiteral(Number(text)));
  }
  const quoted = /^(['"`])(.*)\1$/.exec(text);
  if (quoted) {
    return t.tsLiteralType(t.stringLiteral(quoted[2] ?? ''));
  }
  return parseTypeText(text);
}

function primitiveType(name: PrimitiveName): t.TSType {
  switch (name) {
    case 'string':
      return t.tsStringKeyword();
    case 'number':
      return t.tsNumberKeyword();
    case 'boolean':
      return t.tsBooleanKeyword();
    case 'bigint':
      return t.tsBigIntKeyword();
    case 'symbol':
      return t.tsSymbolKeyword();
    case 'object':
      return t.tsObjectKeyword();
    case 'unknown':
      return t.tsUnknownKeyword();
    case 'any':
      return t.tsAnyKeyword();
    case 'never':
      return t.tsNeverKeyword();
    case 'void':
      return t.tsVoidKeyword();
    case 'undefined':
      return t.tsUndefinedKeyword();
    case 'null':
      return t.tsNullKeyword();
  }
}

/**
 * Convert a model type reference into a TypeScript type node
 */
export function typeRefToTSType(ref: TypeRef): t.TSType {
  switch (ref.kind) {
    case 'primitive':
      return primitiveType(ref.name);
    case 'reference':
      return typeReference(ref.name, ref.typeArguments.map(typeRefToTSType));
    case 'array': {
      const element = typeRefToTSType(ref.elementType);
      const arrayType = t.tsArrayType(ref.elementType.kind === 'union' ? t.tsParenthesizedType(element) : element);
      if (!ref.readonly) return arrayType;
      const readonlyType = t.tsTypeOperator(arrayType);
      readonlyType.operator = 'readonly';
      return readonlyType;
    }
    case 'union':
      return t.tsUnionType(ref.members.map(typeRefToTSType));
    case 'literal':
      return literalType(ref.text);
    case 'this':
      return t.tsThisType();
    case 'other':
      return parseTypeText(ref.text);
  }
}

/**
 * Names of every named type a reference mentions
 */
export function referencedNames(ref: TypeRef, into: Set<string> = new Set()): Set<string> {
  switch (ref.kind) {
    case 'reference':
      into.add(ref.name.split('.')[0] ?? ref.name);
      ref.typeArguments.forEach((arg) => referencedNames(arg, into));
      break;
    case 'array':
      referencedNames(ref.elementType, into);
      break;
    case 'union':
      ref.members.forEach((member) => referencedNames(member, into));
      break;
    case 'primitive':
    case 'literal':
    case 'this':
    case 'other':
      break;
  }
  return into;
}
