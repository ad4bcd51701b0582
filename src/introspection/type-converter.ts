/**
 * Babel TypeScript type nodes → TypeRef
 */

import type * as t from '@babel/types';
import type { PrimitiveName, TypeRef } from '../types/index.js';

const KEYWORDS: Readonly<Partial<Record<t.TSType['type'], PrimitiveName>>> = {
  TSStringKeyword: 'string',
  TSNumberKeyword: 'number',
  TSBooleanKeyword: 'boolean',
  TSBigIntKeyword: 'bigint',
  TSSymbolKeyword: 'symbol',
  TSObjectKeyword: 'object',
  TSUnknownKeyword: 'unknown',
  TSAnyKeyword: 'any',
  TSNeverKeyword: 'never',
  TSVoidKeyword: 'void',
  TSUndefinedKeyword: 'undefined',
  TSNullKeyword: 'null',
};

export const UNKNOWN_TYPE: TypeRef = { kind: 'primitive', name: 'unknown' };

/**
 * `a.b.C` for an entity name
 */
export function entityName(name: t.TSEntityName): string {
  return name.type === 'Identifier' ? name.name : `${entityName(name.left)}.${name.right.name}`;
}

/**
 * Dotted name of a heritage expression (`extends Base`, `extends ns.Base`)
 */
export function expressionName(expr: t.Node): string | undefined {
  if (expr.type === 'Identifier') return expr.name;
  if (expr.type === 'MemberExpression' && !expr.computed && expr.property.type === 'Identifier') {
    const object = expressionName(expr.object);
    return object === undefined ? undefined : `${object}.${expr.property.name}`;
  }
  return undefined;
}

export class TypeConverter {
  constructor(private readonly source: string) {}

  private text(node: t.Node): string {
    return node.start != null && node.end != null ? this.source.slice(node.start, node.end) : node.type;
  }

  typeArguments(instantiation: t.TSTypeParameterInstantiation | t.TypeParameterInstantiation | null | undefined): TypeRef[] {
    if (!instantiation || instantiation.type !== 'TSTypeParameterInstantiation') return [];
    return instantiation.params.map((param) => this.convert(param));
  }

  /**
   * Type of an optional annotation slot; `fallback` when absent
   */
  annotation(
    annotation: t.TypeAnnotation | t.TSTypeAnnotation | t.Noop | null | undefined,
    fallback: TypeRef = UNKNOWN_TYPE
  ): TypeRef {
    return annotation?.type === 'TSTypeAnnotation' ? this.convert(annotation.typeAnnotation) : fallback;
  }

  convert(node: t.TSType): TypeRef {
    const keyword = KEYWORDS[node.type];
    if (keyword) {
      return { kind: 'primitive', name: keyword };
    }

    switch (node.type) {
      case 'TSTypeReference':
        return {
          kind: 'reference',
          name: entityName(node.typeName),
          typeArguments: this.typeArguments(node.typeParameters),
        };

      case 'TSArrayType':
        return { kind: 'array', elementType: this.convert(node.elementType), readonly: false };

      case 'TSTypeOperator':
        if (node.operator === 'readonly' && node.typeAnnotation.type === 'TSArrayType') {
          return { kind: 'array', elementType: this.convert(node.typeAnnotation.elementType), readonly: true };
        }
        return { kind: 'other', text: this.text(node) };

      case 'TSUnionType':
        return {
          kind: 'union',
          members: node.types.flatMap((member) => {
            const converted = this.convert(member);
            return converted.kind === 'union' ? converted.members : [converted];
          }),
        };

      case 'TSLiteralType':
        return { kind: 'literal', text: this.text(node.literal) };

      case 'TSThisType':
        return { kind: 'this' };

      case 'TSParenthesizedType':
        return this.convert(node.typeAnnotation);

      default:
        return { kind: 'other', text: this.text(node) };
    }
  }
}
