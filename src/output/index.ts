/**
 * Output module exports
 */

export { renderArtifact, artifactProgram } from './printer.js';
export type { RenderOptions } from './printer.js';
export { MemoryCodeSink } from './sink.js';
export type { CodeSink, RenderedFile } from './sink.js';
