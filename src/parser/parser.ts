/**
 * TypeScript Parser wrapper
 *
 * Uses @babel/parser to parse TypeScript declarations into an AST
 */

import {
  parse as babelParse,
  parseExpression as babelParseExpression,
  type ParserOptions,
  type ParserPlugin,
} from '@babel/parser';
import * as t from '@babel/types';

export interface ParseOptions {
  /** Source filename (for error messages) */
  filename?: string;
  /** Enable TSX parsing */
  jsx?: boolean;
  /** Source type */
  sourceType?: 'script' | 'module' | 'unambiguous';
}

export interface ParseResult {
  /** The parsed AST */
  ast: t.File;
  /** Any parsing errors */
  errors: ParseError[];
}

export interface ParseError {
  message: string;
  line: number;
  column: number;
}

const BASE_PLUGINS: readonly ParserPlugin[] = [
  'typescript',
  ['decorators', { decoratorsBeforeExport: true }],
  'decoratorAutoAccessors',
  'explicitResourceManagement',
  'importAttributes',
];

function errorLocation(error: unknown): { line: number; column: number } {
  if (typeof error === 'object' && error !== null && 'loc' in error) {
    const loc = error.loc;
    if (
      typeof loc === 'object' &&
      loc !== null &&
      'line' in loc &&
      'column' in loc &&
      typeof loc.line === 'number' &&
      typeof loc.column === 'number'
    ) {
      return { line: loc.line, column: loc.column };
    }
  }
  return { line: 0, column: 0 };
}

/**
 * Parse TypeScript source code into an AST
 */
export function parse(source: string, options: ParseOptions = {}): ParseResult {
  const plugins = [...BASE_PLUGINS];
  if (options.jsx) {
    plugins.push('jsx');
  }

  const parserOptions: ParserOptions = {
    sourceType: options.sourceType ?? 'module',
    sourceFilename: options.filename,
    errorRecovery: true, // Continue parsing after errors
    attachComment: true,
    plugins,
  };

  try {
    const ast = babelParse(source, parserOptions);

    const errors: ParseError[] = (ast.errors ?? []).map((err) => ({
      message: err.message,
      line: err.loc?.line ?? 0,
      column: err.loc?.column ?? 0,
    }));

    return { ast, errors };
  } catch (error) {
    // Unrecoverable syntax errors still throw with errorRecovery enabled
    if (error instanceof SyntaxError) {
      return {
        ast: t.file(t.program([])),
        errors: [{ message: error.message, ...errorLocation(error) }],
      };
    }
    throw error;
  }
}

/**
 * Parse a single expression
 */
export function parseExpression(source: string): t.Expression {
  try {
    return babelParseExpression(source, { plugins: [...BASE_PLUGINS] });
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Failed to parse expression '${source}': ${error.message}`);
    }
    throw error;
  }
}
