/**
 * Optics Spec Analyser
 *
 * Reads an `@importOptics` interface extending `OpticsSpec<S>` and turns the
 * annotations on each of its methods into copy strategies, prism hints and
 * traversal hints. Problems are reported as diagnostics, one per offending
 * member.
 */

import type {
  Annotation,
  CopyStrategyInfo,
  Diagnostic,
  DiagnosticCategory,
  InterfaceDeclaration,
  MethodDecl,
  OpticKind,
  PrismHintInfo,
  TraversalHintInfo,
  TypeRef,
  TypeRegistry,
} from '../types/index.js';
import { CopyStrategies, PrismHints, TraversalHints } from '../types/index.js';
import { annotationList, annotationString, findAnnotation, namedOrPositional } from '../utils/annotations.js';
import { fieldsOf } from '../utils/shape-utils.js';
import { typeRefToString } from '../utils/type-utils.js';
import { standardTraversal } from '../strategy/traversal-hint.js';
import { analyseShape } from './shape-analyser.js';

export const SPEC_BASE_INTERFACE = 'OpticsSpec';

const OPTIC_RETURN_TYPES: ReadonlyMap<string, OpticKind> = new Map<string, OpticKind>([
  ['Lens', 'lens'],
  ['Prism', 'prism'],
  ['Traversal', 'traversal'],
  ['Affine', 'affine'],
  ['Iso', 'iso'],
  ['Getter', 'getter'],
  ['Fold', 'fold'],
]);

const COPY_STRATEGY_ANNOTATIONS = ['viaBuilder', 'wither', 'viaConstructor', 'viaCopyAndSet'] as const;

export interface OpticMethodInfo {
  readonly name: string;
  readonly opticKind: OpticKind;
  readonly focusType: TypeRef;
  readonly copyStrategy: CopyStrategyInfo;
  readonly prismHint: PrismHintInfo;
  readonly traversalHint: TraversalHintInfo;
}

export interface SpecAnalysis {
  readonly declaration: InterfaceDeclaration;
  readonly sourceType: TypeRef;
  /** Generated class: the spec name without `Spec`, or `<Name>Impl` */
  readonly className: string;
  readonly methods: readonly OpticMethodInfo[];
}

export interface SpecAnalysisResult {
  /** Undefined when any error was reported */
  readonly analysis: SpecAnalysis | undefined;
  readonly diagnostics: readonly Diagnostic[];
}

/**
 * Name of the class generated for a spec interface
 */
export function specClassName(specName: string): string {
  return specName.endsWith('Spec') && specName.length > 'Spec'.length ? specName.slice(0, -'Spec'.length) : `${specName}Impl`;
}

/**
 * The `S` of `extends OpticsSpec<S>`, if declared
 */
export function specSourceType(declaration: InterfaceDeclaration): TypeRef | undefined {
  for (const parent of declaration.extends) {
    if (parent.kind === 'reference' && parent.name === SPEC_BASE_INTERFACE) {
      return parent.typeArguments[0];
    }
  }
  return undefined;
}

// ============================================================================
// Hint readers
// ============================================================================

function copyStrategyFrom(annotation: Annotation): CopyStrategyInfo {
  const getter = annotationString(annotation, 'getter') ?? '';
  switch (annotation.name) {
    case 'viaBuilder':
      return CopyStrategies.viaBuilder(
        getter,
        annotationString(annotation, 'toBuilder') ?? '',
        annotationString(annotation, 'setter') ?? '',
        annotationString(annotation, 'build') ?? ''
      );
    case 'wither':
      return CopyStrategies.wither(namedOrPositional(annotation, 'value'), getter);
    case 'viaConstructor':
      return CopyStrategies.viaConstructor(
        annotationList(annotation, 'parameterOrder') ?? annotationList(annotation, 'value') ?? [],
        getter
      );
    case 'viaCopyAndSet':
      return CopyStrategies.viaCopyAndSet(
        namedOrPositional(annotation, 'copyConstructor'),
        annotationString(annotation, 'setter') ?? '',
        getter
      );
    default:
      return CopyStrategies.none;
  }
}

// ============================================================================
// Analysis
// ============================================================================

/**
 * Analyse one optics spec interface
 */
export function analyseSpec(declaration: InterfaceDeclaration, registry: TypeRegistry): SpecAnalysisResult {
  const diagnostics: Diagnostic[] = [];

  const report = (category: DiagnosticCategory, message: string, method?: MethodDecl): void => {
    const location = method?.location ?? declaration.location;
    diagnostics.push({
      severity: 'error',
      category,
      message,
      typeName: declaration.name,
      memberName: method?.name,
      line: location?.line,
      column: location?.column,
    });
  };

  const sourceType = specSourceType(declaration);
  if (!sourceType) {
    report(
      'invalid-spec',
      `Cannot determine source type for ${declaration.name}: it must extend ${SPEC_BASE_INTERFACE}<S>`
    );
    return { analysis: undefined, diagnostics };
  }

  const sourceName = typeRefToString(sourceType);
  const siblingLenses = new Set(
    declaration.methods
      .filter((m) => m.returnType.kind === 'reference' && m.returnType.name === 'Lens')
      .map((m) => m.name)
  );

  /** Auto-detect the traversal of a ThroughField field from its container type */
  const detectTraversal = (field: string): string | undefined => {
    if (sourceType.kind !== 'reference') return undefined;
    const sourceDeclaration = registry.lookup(sourceType.name);
    if (!sourceDeclaration) return undefined;
    const descriptor = fieldsOf(analyseShape(sourceDeclaration, registry)).find((f) => f.name === field);
    return descriptor?.containerType ? standardTraversal(descriptor.containerType.kind) : undefined;
  };

  const analyseMethod = (method: MethodDecl): OpticMethodInfo | undefined => {
    if (method.parameters.length > 0) {
      report('invalid-spec', `Optic method '${method.name}' must have no parameters`, method);
      return undefined;
    }

    const returned = method.returnType;
    const opticKind = returned.kind === 'reference' ? OPTIC_RETURN_TYPES.get(returned.name) : undefined;
    if (returned.kind !== 'reference' || !opticKind) {
      report(
        'invalid-spec',
        `Optic method '${method.name}' must return one of ${[...OPTIC_RETURN_TYPES.keys()].join(', ')}`,
        method
      );
      return undefined;
    }

    const focusType = returned.typeArguments[1];
    if (!focusType) {
      report('invalid-spec', `Cannot determine focus type for '${method.name}': expected ${returned.name}<S, A>`, method);
      return undefined;
    }

    const info = {
      name: method.name,
      opticKind,
      focusType,
      copyStrategy: CopyStrategies.none,
      prismHint: PrismHints.none,
      traversalHint: TraversalHints.none,
    };

    switch (opticKind) {
      case 'lens': {
        const strategies = method.annotations.filter((a) =>
          COPY_STRATEGY_ANNOTATIONS.some((name) => name === a.name)
        );
        const [first] = strategies;
        if (!first) {
          report(
            'missing-annotation',
            `Lens '${method.name}' requires a copy strategy annotation (@viaBuilder, @wither, @viaConstructor or @viaCopyAndSet)`,
            method
          );
          return undefined;
        }
        if (strategies.length > 1) {
          report('invalid-spec', `Lens '${method.name}' has more than one copy strategy annotation`, method);
          return undefined;
        }
        const copyStrategy = copyStrategyFrom(first);
        if (
          copyStrategy.kind === 'ViaConstructor' &&
          copyStrategy.parameterOrder.length > 0 &&
          !copyStrategy.parameterOrder.includes(method.name)
        ) {
          report(
            'invalid-spec',
            `parameterOrder of Lens '${method.name}' does not name the field '${method.name}'`,
            method
          );
          return undefined;
        }
        return { ...info, copyStrategy };
      }

      case 'prism': {
        const instanceOf = findAnnotation(method.annotations, 'instanceOf');
        const matchWhen = findAnnotation(method.annotations, 'matchWhen');
        if (instanceOf) {
          const targetName = namedOrPositional(instanceOf, 'value');
          const target: TypeRef = targetName
            ? { kind: 'reference', name: targetName, typeArguments: [] }
            : focusType;
          if (!registry.isSubtype(target, sourceType)) {
            report(
              'invalid-subtype',
              `${typeRefToString(target)} is not a subtype of ${sourceName} in Prism '${method.name}'`,
              method
            );
            return undefined;
          }
          return { ...info, prismHint: PrismHints.instanceOf(targetName ? target : undefined) };
        }
        if (matchWhen) {
          const predicate = annotationString(matchWhen, 'predicate') ?? '';
          const getter = annotationString(matchWhen, 'getter') ?? '';
          if (predicate === '' || getter === '') {
            report('invalid-spec', `@matchWhen on Prism '${method.name}' requires both predicate and getter`, method);
            return undefined;
          }
          return { ...info, prismHint: PrismHints.matchWhen(predicate, getter) };
        }
        report(
          'missing-annotation',
          `Prism '${method.name}' requires a prism hint annotation (@instanceOf or @matchWhen)`,
          method
        );
        return undefined;
      }

      case 'traversal':
      case 'fold': {
        const label = opticKind === 'fold' ? 'Fold' : 'Traversal';
        const traverseWith = findAnnotation(method.annotations, 'traverseWith');
        const throughField = findAnnotation(method.annotations, 'throughField');
        if (traverseWith) {
          const reference = namedOrPositional(traverseWith, 'value');
          if (reference === '') {
            report('invalid-spec', `@traverseWith on ${label} '${method.name}' requires a reference`, method);
            return undefined;
          }
          return { ...info, traversalHint: TraversalHints.traverseWith(reference) };
        }
        if (throughField) {
          const field = namedOrPositional(throughField, 'field');
          if (!siblingLenses.has(field)) {
            report(
              'invalid-spec',
              `${label} '${method.name}' goes through field '${field}', which needs a Lens method '${field}' in ${declaration.name}`,
              method
            );
            return undefined;
          }
          const traversal = annotationString(throughField, 'traversal') || detectTraversal(field);
          if (!traversal) {
            report(
              'missing-annotation',
              `Cannot auto-detect traversal for field '${field}' of ${sourceName}: the field is not found or is not a container; specify traversal=...`,
              method
            );
            return undefined;
          }
          return { ...info, traversalHint: TraversalHints.throughField(field, traversal) };
        }
        report(
          'missing-annotation',
          `${label} '${method.name}' requires a traversal hint annotation (@traverseWith or @throughField)`,
          method
        );
        return undefined;
      }

      case 'affine':
      case 'iso':
      case 'getter':
        return info;
    }
  };

  const methods: OpticMethodInfo[] = [];
  for (const method of declaration.methods) {
    if (method.isStatic) continue;
    const info = analyseMethod(method);
    if (info) methods.push(info);
  }

  return {
    analysis:
      diagnostics.length === 0
        ? { declaration, sourceType, className: specClassName(declaration.name), methods }
        : undefined,
    diagnostics,
  };
}
