/**
 * Diagnostics and internal errors
 */

export type DiagnosticCategory =
  | 'missing-annotation'
  | 'invalid-subtype'
  | 'mutable-type'
  | 'unsupported-type'
  | 'invalid-spec'
  | 'parse';

/**
 * A user-facing problem with one declaration. Reported once per offending
 * declaration or member; a declaration with an error produces no artifact.
 */
export interface Diagnostic {
  readonly severity: 'error' | 'warning';
  readonly category: DiagnosticCategory;
  readonly message: string;
  /** Declaration the problem belongs to */
  readonly typeName: string;
  /** Field or method inside that declaration, if any */
  readonly memberName?: string;
  readonly line?: number;
  readonly column?: number;
}

/**
 * Thrown for programming errors: a `None` strategy reaching generation, or an
 * internal invariant breaking. Never caught inside the engine.
 */
export class OpticsGenerationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OpticsGenerationError';
  }
}
