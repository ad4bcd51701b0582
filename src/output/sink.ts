/**
 * Code sinks - where rendered artifacts go
 */

import type { GeneratedArtifact } from '../types/index.js';
import { OpticsGenerationError, qualifiedName } from '../types/index.js';
import { renderArtifact, type RenderOptions } from './printer.js';

export interface RenderedFile {
  /** `<module>/<className>` */
  readonly qualifiedName: string;
  readonly module: string;
  readonly className: string;
  readonly code: string;
}

export interface CodeSink {
  /** Accepts each fully qualified name at most once per run */
  write(artifact: GeneratedArtifact): RenderedFile;
}

/**
 * Keeps rendered files in memory, keyed by qualified name
 */
export class MemoryCodeSink implements CodeSink {
  private readonly files = new Map<string, RenderedFile>();

  constructor(private readonly renderOptions: RenderOptions = {}) {}

  write(artifact: GeneratedArtifact): RenderedFile {
    const name = qualifiedName(artifact);
    if (this.files.has(name)) {
      throw new OpticsGenerationError(`${name} has already been written in this run`);
    }
    const file: RenderedFile = {
      qualifiedName: name,
      module: artifact.module,
      className: artifact.className,
      code: renderArtifact(artifact, this.renderOptions),
    };
    this.files.set(name, file);
    return file;
  }

  get(name: string): RenderedFile | undefined {
    return this.files.get(name);
  }

  all(): RenderedFile[] {
    return [...this.files.values()];
  }

  get size(): number {
    return this.files.size;
  }
}
