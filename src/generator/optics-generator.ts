/**
 * Optics Code Generator
 *
 * Builds `<T>Lenses`, `<T>Prisms` and optics-spec artifacts from analysed
 * shapes. Every body is an expression tree; see output/printer.ts for text.
 */

import * as t from '@babel/types';
import type {
  ClassDeclaration,
  CopyMutableShape,
  EnumeratedShape,
  FieldDescriptor,
  GeneratedArtifact,
  MethodDefinition,
  OpticKind,
  ProductShape,
  ResolvedOptions,
  SumShape,
  TypeRef,
  TypeRegistry,
} from '../types/index.js';
import { CopyStrategies, OpticsGenerationError, PrismHints, TraversalHints } from '../types/index.js';
import type { OpticMethodInfo, SpecAnalysis } from '../analysis/spec-analyser.js';
import {
  enumConstantPrism,
  lensExpression,
  resolveCopyStrategy,
  resolvePrismHint,
  resolveTraversalHint,
  standardTraversal,
} from '../strategy/index.js';
import { callMethod, callStatic, opticType, throwingBlock, typeRefToTSType, typeReference } from '../utils/ast.js';
import { capitalise, toLowerCamel, typeRefToString } from '../utils/type-utils.js';
import { buildArtifact, member, selfTypeRef } from './artifact.js';

export type LensShape = ProductShape | CopyMutableShape;

export interface GeneratorContext {
  readonly registry: TypeRegistry;
  readonly options: ResolvedOptions;
}

const OPTIC_TYPE_NAMES: Readonly<Record<OpticKind, string>> = {
  lens: 'Lens',
  prism: 'Prism',
  traversal: 'Traversal',
  fold: 'Fold',
  affine: 'Affine',
  iso: 'Iso',
  getter: 'Getter',
};

export function lensesClassName(typeName: string): string {
  return `${typeName}Lenses`;
}

export function prismsClassName(typeName: string): string {
  return `${typeName}Prisms`;
}

function targetModule(declarationModule: string, options: ResolvedOptions): string {
  return options.targetModule ?? declarationModule;
}

/**
 * The focus of a container field's traversal: element type, or value type
 * for maps
 */
function elementTypeOf(field: FieldDescriptor): TypeRef {
  if (!field.containerType) {
    throw new OpticsGenerationError(`Field '${field.name}' is not a container`);
  }
  return field.containerType.elementType;
}

// ============================================================================
// Lenses
// ============================================================================

/**
 * `Lens.of(getter, setter)` for one field of a lens-capable shape
 */
export function fieldLens(shape: LensShape, field: FieldDescriptor): t.CallExpression {
  const declaration: ClassDeclaration = shape.declaration;
  const target = { typeName: declaration.name, fieldName: field.name, access: field.access, declaration };

  if (shape.kind === 'Product') {
    const order = shape.fields.map((f) => f.name);
    return lensExpression(resolveCopyStrategy(CopyStrategies.viaConstructor(order), target));
  }

  const operation = shape.copyOperations.find((op) => op.fieldName === field.name);
  if (!operation) {
    throw new OpticsGenerationError(`No wither for field '${field.name}' of ${declaration.name}`);
  }
  return lensExpression(resolveCopyStrategy(CopyStrategies.wither(operation.witherName), target));
}

function fieldMembers(shape: LensShape, field: FieldDescriptor, className: string): MethodDefinition[] {
  const declaration = shape.declaration;
  const typeParameters = declaration.typeParameters;
  const sourceType = typeRefToTSType(selfTypeRef(declaration));
  const focusType = typeRefToTSType(field.declaredType);
  const members: MethodDefinition[] = [];

  members.push(
    member(field.name, {
      role: 'lens',
      doc: `Lens focusing on the \`${field.name}\` field of {@link ${declaration.name}}.`,
      typeParameters,
      returnType: opticType('Lens', sourceType, focusType),
      body: fieldLens(shape, field),
    })
  );

  members.push(
    member(`with${capitalise(field.name)}`, {
      role: 'updater',
      doc: `A copy of \`source\` with \`${field.name}\` replaced.`,
      typeParameters,
      params: [
        { name: 'source', type: typeRefToTSType(selfTypeRef(declaration)) },
        { name: 'newValue', type: typeRefToTSType(field.declaredType) },
      ],
      returnType: typeRefToTSType(selfTypeRef(declaration)),
      body: callMethod(callStatic(className, field.name), 'set', [t.identifier('newValue'), t.identifier('source')]),
    })
  );

  if (field.containerType) {
    const traversalName = `${field.name}Traversal`;
    const elementType = elementTypeOf(field);
    members.push(
      member(traversalName, {
        role: 'traversal',
        doc: `Traversal over every element of \`${field.name}\`.`,
        typeParameters,
        returnType: opticType('Traversal', typeRefToTSType(selfTypeRef(declaration)), typeRefToTSType(elementType)),
        body: resolveTraversalHint(
          TraversalHints.throughField(field.name, standardTraversal(field.containerType.kind)),
          { ownerClassName: className }
        ),
      })
    );
    members.push(
      member(`${field.name}Fold`, {
        role: 'fold',
        doc: `Read-only view of every element of \`${field.name}\`.`,
        typeParameters,
        returnType: opticType('Fold', typeRefToTSType(selfTypeRef(declaration)), typeRefToTSType(elementType)),
        body: callMethod(callStatic(className, traversalName), 'asFold'),
      })
    );
  }

  return members;
}

/**
 * `<T>Lenses`: one lens and updater per field, plus traversal and fold for
 * container fields
 */
export function generateLenses(shape: LensShape, context: GeneratorContext): GeneratedArtifact {
  const declaration = shape.declaration;
  const className = lensesClassName(declaration.name);
  context.options.log(`lenses: ${declaration.name} (${shape.kind}, ${shape.fields.length} fields)`);

  return buildArtifact(
    {
      module: targetModule(declaration.module, context.options),
      className,
      sourceTypeName: declaration.name,
      doc: `Generated lenses for {@link ${declaration.name}}.`,
      members: shape.fields.flatMap((field) => fieldMembers(shape, field, className)),
      runtimeModule: context.options.runtimeModule,
    },
    context.registry
  );
}

// ============================================================================
// Prisms
// ============================================================================

function variantName(variant: TypeRef): string {
  if (variant.kind !== 'reference') {
    throw new OpticsGenerationError(`Sum variant ${typeRefToString(variant)} is not a type reference`);
  }
  const simple = variant.name.slice(variant.name.lastIndexOf('.') + 1);
  return toLowerCamel(simple);
}

/**
 * `<T>Prisms`: one prism per sum variant or enum constant
 */
export function generatePrisms(shape: SumShape | EnumeratedShape, context: GeneratorContext): GeneratedArtifact {
  const declaration = shape.declaration;
  const sourceRef = selfTypeRef(declaration);
  const typeParameters = declaration.declarationKind === 'enum' ? [] : declaration.typeParameters;
  context.options.log(`prisms: ${declaration.name} (${shape.kind})`);

  const members =
    shape.kind === 'Sum'
      ? shape.variants.map((variant) =>
          member(variantName(variant), {
            role: 'prism',
            doc: `Prism matching the {@link ${typeRefToString(variant)}} variant of {@link ${declaration.name}}.`,
            typeParameters,
            returnType: opticType('Prism', typeRefToTSType(sourceRef), typeRefToTSType(variant)),
            body: resolvePrismHint(PrismHints.instanceOf(), {
              sourceType: sourceRef,
              focusType: variant,
              registry: context.registry,
            }),
          })
        )
      : shape.constants.map((constant) =>
          member(toLowerCamel(constant), {
            role: 'prism',
            doc: `Prism matching \`${declaration.name}.${constant}\`.`,
            returnType: opticType(
              'Prism',
              typeRefToTSType(sourceRef),
              typeReference(`${declaration.name}.${constant}`)
            ),
            body: enumConstantPrism(declaration.name, constant),
          })
        );

  return buildArtifact(
    {
      module: targetModule(declaration.module, context.options),
      className: prismsClassName(declaration.name),
      sourceTypeName: declaration.name,
      doc: `Generated prisms for {@link ${declaration.name}}.`,
      members,
      runtimeModule: context.options.runtimeModule,
    },
    context.registry
  );
}

// ============================================================================
// Optics spec interfaces
// ============================================================================

function specMemberBody(method: OpticMethodInfo, analysis: SpecAnalysis, context: GeneratorContext): t.Expression | t.BlockStatement {
  const sourceName = analysis.sourceType.kind === 'reference' ? analysis.sourceType.name : typeRefToString(analysis.sourceType);

  switch (method.opticKind) {
    case 'lens': {
      const declaration = context.registry.lookup(sourceName);
      return lensExpression(
        resolveCopyStrategy(method.copyStrategy, {
          typeName: sourceName,
          fieldName: method.name,
          declaration: declaration?.declarationKind === 'class' ? declaration : undefined,
        })
      );
    }
    case 'prism':
      return resolvePrismHint(method.prismHint, {
        sourceType: analysis.sourceType,
        focusType: method.focusType,
        registry: context.registry,
      });
    case 'traversal':
      return resolveTraversalHint(method.traversalHint, { ownerClassName: analysis.className });
    case 'fold':
      return callMethod(resolveTraversalHint(method.traversalHint, { ownerClassName: analysis.className }), 'asFold');
    case 'affine':
    case 'iso':
    case 'getter':
      return throwingBlock(`${OPTIC_TYPE_NAMES[method.opticKind]} optics are not yet supported in optics spec interfaces`);
  }
}

/**
 * The class generated for an `@importOptics` spec interface
 */
export function generateSpecClass(analysis: SpecAnalysis, context: GeneratorContext): GeneratedArtifact {
  const sourceType = typeRefToTSType(analysis.sourceType);
  const sourceName = typeRefToString(analysis.sourceType);
  context.options.log(`spec: ${analysis.declaration.name} -> ${analysis.className} (${analysis.methods.length} optics)`);

  const members = analysis.methods.map((method) =>
    member(method.name, {
      role: method.opticKind,
      doc: `${OPTIC_TYPE_NAMES[method.opticKind]} for the \`${method.name}\` of {@link ${sourceName}}.`,
      returnType: opticType(OPTIC_TYPE_NAMES[method.opticKind], sourceType, typeRefToTSType(method.focusType)),
      body: specMemberBody(method, analysis, context),
    })
  );

  return buildArtifact(
    {
      module: targetModule(analysis.declaration.module, context.options),
      className: analysis.className,
      sourceTypeName: sourceName,
      doc: `Optics for {@link ${sourceName}}, generated from {@link ${analysis.declaration.name}}.`,
      members,
      runtimeModule: context.options.runtimeModule,
    },
    context.registry
  );
}
