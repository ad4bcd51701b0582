/**
 * Generator exports
 */

export {
  generateLenses,
  generatePrisms,
  generateSpecClass,
  fieldLens,
  lensesClassName,
  prismsClassName,
} from './optics-generator.js';
export type { GeneratorContext, LensShape } from './optics-generator.js';
export { generateFocus, focusClassName, navigatorClassName, widening, DELEGATE_METHODS } from './navigator.js';
export type { FocusResult, Widening } from './navigator.js';
export { buildArtifact, selfTypeRef, RUNTIME_NAMES } from './artifact.js';
export {
  generateOptics,
  generateAll,
  generateFromSource,
  isGenerationTarget,
  GENERATION_ANNOTATIONS,
} from './pipeline.js';
export type { GenerationResult, SourceGenerationOptions } from './pipeline.js';
