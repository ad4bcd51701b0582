/**
 * Generation pipeline
 *
 * introspection → shape analysis → hint resolution → artifacts. Declarations
 * are processed independently; one with an error diagnostic yields nothing.
 */

import type {
  Diagnostic,
  DiagnosticCategory,
  GeneratedArtifact,
  GenerationOptions,
  TypeDeclaration,
  TypeRegistry,
} from '../types/index.js';
import { qualifiedName, resolveOptions } from '../types/index.js';
import { analyseShape } from '../analysis/shape-analyser.js';
import { analyseSpec } from '../analysis/spec-analyser.js';
import { createTypeRegistry } from '../introspection/registry.js';
import { readDeclarations } from '../introspection/reader.js';
import { annotationString, findAnnotation, hasAnnotation } from '../utils/annotations.js';
import { hasMutableFields, supportsLens, supportsPrism } from '../utils/shape-utils.js';
import { typeRefToString } from '../utils/type-utils.js';
import { generateFocus } from './navigator.js';
import { generateLenses, generatePrisms, generateSpecClass, type GeneratorContext } from './optics-generator.js';

/** Annotations that ask for generation */
export const GENERATION_ANNOTATIONS: readonly string[] = [
  'generateLenses',
  'generatePrisms',
  'generateFocus',
  'importOptics',
];

export interface GenerationResult {
  artifacts: GeneratedArtifact[];
  diagnostics: Diagnostic[];
}

export function isGenerationTarget(declaration: TypeDeclaration): boolean {
  return GENERATION_ANNOTATIONS.some((name) => hasAnnotation(declaration.annotations, name));
}

/**
 * Generate every artifact one declaration calls for.
 *
 * With `@generateLenses`, `@generatePrisms` or `@generateFocus` present, only
 * the requested artifacts are built; otherwise every artifact the shape
 * supports is.
 */
export function generateOptics(
  declaration: TypeDeclaration,
  registry: TypeRegistry,
  options: GenerationOptions = {}
): GenerationResult {
  const focusAnnotation = findAnnotation(declaration.annotations, 'generateFocus');

  const fail = (category: DiagnosticCategory, message: string): GenerationResult => ({
    artifacts: [],
    diagnostics: [
      {
        severity: 'error',
        category,
        message,
        typeName: declaration.name,
        line: declaration.location?.line,
        column: declaration.location?.column,
      },
    ],
  });

  const depthText = annotationString(focusAnnotation, 'maxDepth');
  if (depthText !== undefined && (depthText.trim() === '' || !Number.isFinite(Number(depthText)))) {
    return fail('invalid-spec', `maxDepth of ${declaration.name} must be a positive integer, got '${depthText}'`);
  }

  const resolved = resolveOptions(options, focusAnnotation);
  const context: GeneratorContext = { registry, options: resolved };

  if (declaration.declarationKind === 'interface' && hasAnnotation(declaration.annotations, 'importOptics')) {
    const { analysis, diagnostics } = analyseSpec(declaration, registry);
    return {
      artifacts: analysis ? [generateSpecClass(analysis, context)] : [],
      diagnostics: [...diagnostics],
    };
  }

  const shape = analyseShape(declaration, registry);
  resolved.log(`shape: ${declaration.name} is ${shape.kind}`);

  if (shape.kind === 'Unsupported') {
    return fail('unsupported-type', `Cannot generate optics for ${declaration.name}: ${shape.reason}`);
  }
  if (shape.kind === 'CopyMutable' && hasMutableFields(shape) && !resolved.allowMutableFields) {
    return fail(
      'mutable-type',
      `${declaration.name} has setters (${shape.setters.join(', ')}); enable allowMutableFields to generate lenses for it`
    );
  }
  if (shape.kind === 'Sum') {
    for (const variant of shape.variants) {
      const variantDeclaration = variant.kind === 'reference' ? registry.lookup(variant.name) : undefined;
      if (variantDeclaration && variantDeclaration.declarationKind !== 'class') {
        return fail(
          'unsupported-type',
          `Variant ${typeRefToString(variant)} of ${declaration.name} is not a class; instanceof cannot recognise it`
        );
      }
    }
  }

  const explicit = ['generateLenses', 'generatePrisms', 'generateFocus'].some((name) =>
    hasAnnotation(declaration.annotations, name)
  );
  const wantLenses = explicit ? hasAnnotation(declaration.annotations, 'generateLenses') : supportsLens(shape);
  const wantPrisms = explicit ? hasAnnotation(declaration.annotations, 'generatePrisms') : supportsPrism(shape);
  const wantFocus = explicit ? focusAnnotation !== undefined : shape.kind === 'Product' && resolved.generateNavigators;

  if (wantLenses && !supportsLens(shape)) {
    return fail('unsupported-type', `Cannot generate lenses for ${declaration.name}: ${shape.kind} types support prisms`);
  }
  if (wantPrisms && !supportsPrism(shape)) {
    return fail('unsupported-type', `Cannot generate prisms for ${declaration.name}: ${shape.kind} types support lenses`);
  }
  if (wantFocus && shape.kind !== 'Product') {
    return fail('unsupported-type', `Cannot generate a focus for ${declaration.name}: only product types have one`);
  }

  const artifacts: GeneratedArtifact[] = [];
  const diagnostics: Diagnostic[] = [];

  if (wantLenses && (shape.kind === 'Product' || shape.kind === 'CopyMutable')) {
    artifacts.push(generateLenses(shape, context));
  }
  if (wantPrisms && (shape.kind === 'Sum' || shape.kind === 'Enumerated')) {
    artifacts.push(generatePrisms(shape, context));
  }
  if (wantFocus && shape.kind === 'Product') {
    const focus = generateFocus(shape, context);
    artifacts.push(focus.artifact);
    diagnostics.push(...focus.diagnostics);
  }

  return { artifacts, diagnostics };
}

/**
 * Generate for a set of declarations. Generated names must not collide with
 * each other or with a declared type in the same module.
 */
export function generateAll(
  declarations: readonly TypeDeclaration[],
  registry: TypeRegistry,
  options: GenerationOptions = {}
): GenerationResult {
  const artifacts: GeneratedArtifact[] = [];
  const diagnostics: Diagnostic[] = [];
  const taken = new Set(
    registry.all().map((declaration) => qualifiedName({ module: declaration.module, className: declaration.name }))
  );

  for (const declaration of declarations) {
    const result = generateOptics(declaration, registry, options);
    diagnostics.push(...result.diagnostics);

    const collision = result.artifacts.find((artifact) => taken.has(qualifiedName(artifact)));
    if (collision) {
      diagnostics.push({
        severity: 'error',
        category: 'invalid-spec',
        message: `Generated name ${collision.className} for ${declaration.name} collides with an existing declaration in ${collision.module}`,
        typeName: declaration.name,
        line: declaration.location?.line,
        column: declaration.location?.column,
      });
      continue;
    }

    for (const artifact of result.artifacts) {
      taken.add(qualifiedName(artifact));
      artifacts.push(artifact);
    }
  }

  return { artifacts, diagnostics };
}

export interface SourceGenerationOptions extends GenerationOptions {
  /** Module specifier of the source file, as generated code imports it */
  module?: string;
  filename?: string;
  /** Declarations to generate for even without a generation annotation */
  types?: readonly string[];
  /** Declarations from other modules, visible to subtype and shape queries */
  knownDeclarations?: readonly TypeDeclaration[];
}

/**
 * Read a TypeScript module and generate for its annotated declarations
 */
export function generateFromSource(source: string, options: SourceGenerationOptions = {}): GenerationResult {
  const { module, filename, types = [], knownDeclarations = [], ...generation } = options;
  const { declarations, diagnostics } = readDeclarations(source, { module, filename });
  const registry = createTypeRegistry([...knownDeclarations, ...declarations]);
  generation.log?.(`read ${declarations.length} declarations from ${filename ?? module ?? 'source'}`);

  const selected = declarations.filter((declaration) => isGenerationTarget(declaration) || types.includes(declaration.name));
  const result = generateAll(selected, registry, generation);

  return { artifacts: result.artifacts, diagnostics: [...diagnostics, ...result.diagnostics] };
}
