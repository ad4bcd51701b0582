/**
 * Introspection exports
 */

export { readDeclarations } from './reader.js';
export type { ReadOptions, ReadResult } from './reader.js';
export { createTypeRegistry } from './registry.js';
export { parseJSDoc, parseTagArguments, annotationsOf } from './jsdoc.js';
export { TypeConverter } from './type-converter.js';
