/**
 * Copy Strategy Resolver
 *
 * Turns a CopyStrategyInfo into the getter and setter lambdas of a Lens.
 * Parameters are always named `source` and `newValue`.
 */

import * as t from '@babel/types';
import type { ClassDeclaration, CopyStrategyInfo, FieldAccess } from '../types/index.js';
import { OpticsGenerationError } from '../types/index.js';
import { arrow, callMethod, callStatic, throwingBlock } from '../utils/ast.js';
import { capitalise } from '../utils/type-utils.js';

const SOURCE = 'source';
const NEW_VALUE = 'newValue';

/**
 * The field a Lens focuses on
 */
export interface LensTarget {
  /** Class instantiated by constructor-based strategies */
  readonly typeName: string;
  readonly fieldName: string;
  /** How the field is read when the strategy names no getter */
  readonly access?: FieldAccess;
  /** Consulted to tell a property-style getter from a getter method */
  readonly declaration?: ClassDeclaration;
}

export interface LensAccessors {
  readonly getter: t.ArrowFunctionExpression;
  readonly setter: t.ArrowFunctionExpression;
}

function isPropertyLike(declaration: ClassDeclaration | undefined, name: string): boolean {
  if (!declaration) return false;
  return (
    declaration.properties.some((p) => p.name === name && !p.isStatic) ||
    declaration.methods.some((m) => m.name === name && m.kind === 'get' && !m.isStatic) ||
    (declaration.constructorParameters ?? []).some((p) => p.name === name && p.isParameterProperty)
  );
}

function isZeroArgMethod(declaration: ClassDeclaration, name: string): boolean {
  return declaration.methods.some(
    (m) => m.name === name && m.kind === 'method' && !m.isStatic && m.parameters.length === 0
  );
}

/**
 * How a constructor parameter or field is read from `source`: a property
 * when the declaration has one, else its getter method (`x()`, `getX()`,
 * `isX()`), else a call named after the field. Without a declaration the
 * field is read as a property.
 */
export function memberAccess(declaration: ClassDeclaration | undefined, name: string): FieldAccess {
  if (!declaration || isPropertyLike(declaration, name)) {
    return { kind: 'property', name };
  }
  const getter = [name, `get${capitalise(name)}`, `is${capitalise(name)}`].find((candidate) =>
    isZeroArgMethod(declaration, candidate)
  );
  return { kind: 'method', name: getter ?? name };
}

function readAccess(access: FieldAccess): t.Expression {
  const source = t.identifier(SOURCE);
  return access.kind === 'method'
    ? callMethod(source, access.name)
    : t.memberExpression(source, t.identifier(access.name));
}

function noStrategy(target: LensTarget): OpticsGenerationError {
  return new OpticsGenerationError(`No copy strategy for ${target.typeName}.${target.fieldName}`);
}

/**
 * Getter lambda: an explicit getter name wins, then the field's own access,
 * then the field's access on the declaration
 */
export function resolveGetter(strategy: CopyStrategyInfo, target: LensTarget): t.ArrowFunctionExpression {
  if (strategy.kind === 'None') {
    throw noStrategy(target);
  }

  let access: FieldAccess;
  if (strategy.getter !== '') {
    access = isPropertyLike(target.declaration, strategy.getter)
      ? { kind: 'property', name: strategy.getter }
      : { kind: 'method', name: strategy.getter };
  } else {
    access = target.access ?? memberAccess(target.declaration, target.fieldName);
  }

  return arrow([SOURCE], readAccess(access));
}

/**
 * Setter lambda `(source, newValue) => updated`
 */
export function resolveSetter(strategy: CopyStrategyInfo, target: LensTarget): t.ArrowFunctionExpression {
  const source = t.identifier(SOURCE);
  const newValue = t.identifier(NEW_VALUE);
  const field = target.fieldName;

  switch (strategy.kind) {
    case 'ViaBuilder': {
      const toBuilder = strategy.toBuilder || 'toBuilder';
      const setter = strategy.setter || field;
      const build = strategy.build || 'build';
      const body = callMethod(callMethod(callMethod(source, toBuilder), setter, [newValue]), build);
      return arrow([SOURCE, NEW_VALUE], body);
    }

    case 'Wither': {
      const wither = strategy.wither || `with${capitalise(field)}`;
      return arrow([SOURCE, NEW_VALUE], callMethod(source, wither, [newValue]));
    }

    case 'ViaConstructor': {
      if (strategy.parameterOrder.length === 0) {
        // Fails when the lens is used, not when it is generated
        return arrow(
          [SOURCE, NEW_VALUE],
          throwingBlock(`ViaConstructor for ${target.typeName}.${field} requires parameterOrder to be specified`)
        );
      }
      if (!strategy.parameterOrder.includes(field)) {
        throw new OpticsGenerationError(
          `parameterOrder [${strategy.parameterOrder.join(', ')}] of ${target.typeName} does not name field '${field}'`
        );
      }
      const args = strategy.parameterOrder.map((param) =>
        param === field ? t.identifier(NEW_VALUE) : readAccess(memberAccess(target.declaration, param))
      );
      return arrow([SOURCE, NEW_VALUE], t.newExpression(t.identifier(target.typeName), args));
    }

    case 'ViaCopyAndSet': {
      const ctor = strategy.copyConstructor || target.typeName;
      const setter = strategy.setter || `set${capitalise(field)}`;
      const body = t.blockStatement([
        t.variableDeclaration('const', [
          t.variableDeclarator(t.identifier('copy'), t.newExpression(t.identifier(ctor), [t.identifier(SOURCE)])),
        ]),
        t.expressionStatement(callMethod(t.identifier('copy'), setter, [newValue])),
        t.returnStatement(t.identifier('copy')),
      ]);
      return arrow([SOURCE, NEW_VALUE], body);
    }

    case 'None':
      throw noStrategy(target);
  }
}

export function resolveCopyStrategy(strategy: CopyStrategyInfo, target: LensTarget): LensAccessors {
  return { getter: resolveGetter(strategy, target), setter: resolveSetter(strategy, target) };
}

/**
 * `Lens.of(getter, setter)`
 */
export function lensExpression(accessors: LensAccessors): t.CallExpression {
  return callStatic('Lens', 'of', [accessors.getter, accessors.setter]);
}
