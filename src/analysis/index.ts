/**
 * Analysis module exports
 */

export { classifyContainer, containerFamilyNames } from './container-classifier.js';
export { analyseShape, findCopyOperations, findGetter, isSetter, isWitherCandidate } from './shape-analyser.js';
export { analyseSpec, specClassName, specSourceType, SPEC_BASE_INTERFACE } from './spec-analyser.js';
export type { OpticMethodInfo, SpecAnalysis, SpecAnalysisResult } from './spec-analyser.js';
