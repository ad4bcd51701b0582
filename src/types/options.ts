/**
 * Generation options
 *
 * Callers pass a partial `GenerationOptions`; per-declaration annotation
 * values (`@generateFocus maxDepth=2 ...`) are layered on top of it.
 */

import type { Annotation } from './declarations.js';
import { annotationList, annotationString } from '../utils/annotations.js';

/** Upper bound for navigator depth; larger values are clamped */
export const MAX_NAVIGATOR_DEPTH = 10;

export interface GenerationOptions {
  /** Maximum navigator depth (positive integer) */
  maxDepth?: number;
  /** Fields that get navigators; empty means all fields */
  includeFields?: readonly string[];
  /** Fields that never get navigators; wins over `includeFields` */
  excludeFields?: readonly string[];
  /** Generate lenses for external classes that expose setters */
  allowMutableFields?: boolean;
  /** Module the generated classes are written to; defaults to the declaring module */
  targetModule?: string;
  /** Emit `<Type>Focus` classes with navigators for product types */
  generateNavigators?: boolean;
  /** Module specifier the generated code imports the optics runtime from */
  runtimeModule?: string;
  /** Verbose trace output; silent when absent */
  log?: (message: string) => void;
}

export interface ResolvedOptions {
  readonly maxDepth: number;
  readonly includeFields: ReadonlySet<string>;
  readonly excludeFields: ReadonlySet<string>;
  readonly allowMutableFields: boolean;
  readonly targetModule: string | undefined;
  readonly generateNavigators: boolean;
  readonly runtimeModule: string;
  readonly log: (message: string) => void;
}

const NO_FIELDS: readonly string[] = [];

export const DEFAULT_GENERATION_OPTIONS = {
  maxDepth: 1,
  includeFields: NO_FIELDS,
  excludeFields: NO_FIELDS,
  allowMutableFields: false,
  generateNavigators: true,
  runtimeModule: 'opticgen/runtime',
} satisfies GenerationOptions;

function silent(): void {}

/**
 * Clamp a requested depth into 1..MAX_NAVIGATOR_DEPTH
 */
export function clampDepth(depth: number): number {
  if (!Number.isFinite(depth)) {
    throw new RangeError(`maxDepth must be a positive integer, got ${depth}`);
  }
  return Math.max(1, Math.min(MAX_NAVIGATOR_DEPTH, Math.floor(depth)));
}

/**
 * Merge caller options, annotation overrides and defaults
 */
export function resolveOptions(options: GenerationOptions = {}, annotation?: Annotation): ResolvedOptions {
  const depthText = annotationString(annotation, 'maxDepth');
  const maxDepth = depthText !== undefined ? Number(depthText) : options.maxDepth;
  const allowText = annotationString(annotation, 'allowMutableFields');

  return {
    maxDepth: clampDepth(maxDepth ?? DEFAULT_GENERATION_OPTIONS.maxDepth),
    includeFields: new Set(
      annotationList(annotation, 'includeFields') ?? options.includeFields ?? DEFAULT_GENERATION_OPTIONS.includeFields
    ),
    excludeFields: new Set(
      annotationList(annotation, 'excludeFields') ?? options.excludeFields ?? DEFAULT_GENERATION_OPTIONS.excludeFields
    ),
    allowMutableFields:
      allowText !== undefined
        ? allowText === 'true'
        : options.allowMutableFields ?? DEFAULT_GENERATION_OPTIONS.allowMutableFields,
    targetModule: annotationString(annotation, 'targetModule') ?? options.targetModule,
    generateNavigators: options.generateNavigators ?? DEFAULT_GENERATION_OPTIONS.generateNavigators,
    runtimeModule: options.runtimeModule ?? DEFAULT_GENERATION_OPTIONS.runtimeModule,
    log: options.log ?? silent,
  };
}
