/**
 * Utils module exports
 */

export { Decls, Refs } from './declaration-factory.js';
export type { ClassInit, InterfaceInit, MethodInit } from './declaration-factory.js';
export {
  isRefKind,
  typeRefEquals,
  typeRefToString,
  referenceName,
  capitalise,
  decapitalise,
  toLowerCamel,
} from './type-utils.js';
export { supportsLens, supportsPrism, hasMutableFields, hasTraversal, isMapContainer, fieldsOf } from './shape-utils.js';
export { findAnnotation, hasAnnotation, annotationString, annotationList, namedOrPositional } from './annotations.js';
export { typeRefToTSType, memberPath, isDottedReference } from './ast.js';
