/**
 * Prism Hint Resolver
 *
 * Builds `Prism.of(preview, review)` expressions for sum variants and enum
 * constants.
 */

import * as t from '@babel/types';
import type { PrismHintInfo, TypeRef, TypeRegistry } from '../types/index.js';
import { OpticsGenerationError } from '../types/index.js';
import { arrow, callMethod, callStatic, memberPath } from '../utils/ast.js';
import { typeRefToString } from '../utils/type-utils.js';

export interface PrismTarget {
  /** The sum (source) type */
  readonly sourceType: TypeRef;
  /** The variant the prism focuses on */
  readonly focusType: TypeRef;
  /** Enables the subtype check for InstanceOf targets */
  readonly registry?: TypeRegistry;
}

function somePreview(condition: t.Expression, focus: t.Expression): t.ArrowFunctionExpression {
  return arrow(
    ['source'],
    t.conditionalExpression(condition, callStatic('Option', 'some', [focus]), callStatic('Option', 'none'))
  );
}

function prismOf(preview: t.ArrowFunctionExpression): t.CallExpression {
  return callStatic('Prism', 'of', [preview, arrow(['value'], t.identifier('value'))]);
}

/**
 * Resolve a prism hint to a `Prism.of(...)` expression
 */
export function resolvePrismHint(hint: PrismHintInfo, target: PrismTarget): t.CallExpression {
  switch (hint.kind) {
    case 'InstanceOf': {
      const variant = hint.target ?? target.focusType;
      if (variant.kind !== 'reference') {
        throw new OpticsGenerationError(`InstanceOf target ${typeRefToString(variant)} is not a class reference`);
      }
      if (target.registry && !target.registry.isSubtype(variant, target.sourceType)) {
        throw new OpticsGenerationError(
          `${typeRefToString(variant)} is not a subtype of ${typeRefToString(target.sourceType)}`
        );
      }
      const source = t.identifier('source');
      return prismOf(somePreview(t.binaryExpression('instanceof', source, memberPath(variant.name)), source));
    }

    case 'MatchWhen': {
      if (hint.predicate === '' || hint.getter === '') {
        throw new OpticsGenerationError(
          `MatchWhen on ${typeRefToString(target.sourceType)} requires both predicate and getter`
        );
      }
      const source = t.identifier('source');
      return prismOf(somePreview(callMethod(source, hint.predicate), callMethod(t.identifier('source'), hint.getter)));
    }

    case 'None':
      throw new OpticsGenerationError(`No prism hint for ${typeRefToString(target.focusType)}`);
  }
}

/**
 * Identity prism for one enum constant: `source === Color.Red`
 */
export function enumConstantPrism(enumName: string, constant: string): t.CallExpression {
  const source = t.identifier('source');
  return prismOf(
    somePreview(
      t.binaryExpression('===', source, t.memberExpression(t.identifier(enumName), t.identifier(constant))),
      t.identifier('source')
    )
  );
}
