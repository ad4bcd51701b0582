/**
 * Traversal Hint Resolver
 */

import * as t from '@babel/types';
import { parseExpression } from '../parser/index.js';
import type { ContainerKind, TraversalHintInfo } from '../types/index.js';
import { OpticsGenerationError } from '../types/index.js';
import { callMethod, callStatic, isDottedReference, memberPath } from '../utils/ast.js';

/**
 * Standard traversal per container kind. Each kind maps to a distinct
 * reference.
 */
export const STANDARD_TRAVERSALS: Readonly<Record<ContainerKind, string>> = {
  List: 'Traversals.forList()',
  Set: 'Traversals.forSet()',
  Map: 'Traversals.forMapValues()',
  Optional: 'Traversals.forOptional()',
  Array: 'Traversals.forArray()',
};

export function standardTraversal(kind: ContainerKind): string {
  return STANDARD_TRAVERSALS[kind];
}

/**
 * `a.b.c()` → call of `a.b.c`; `a.b.c` → member reference; anything else is
 * parsed as an expression
 */
export function referenceExpression(reference: string): t.Expression {
  const text = reference.trim();
  if (!isDottedReference(text)) {
    return parseExpression(text);
  }
  if (text.endsWith('()')) {
    return t.callExpression(memberPath(text.slice(0, -2)), []);
  }
  return memberPath(text);
}

export interface TraversalTarget {
  /** Class holding the sibling lens used by ThroughField */
  readonly ownerClassName: string;
}

/**
 * Resolve a traversal hint to a Traversal-valued expression
 */
export function resolveTraversalHint(hint: TraversalHintInfo, target: TraversalTarget): t.Expression {
  switch (hint.kind) {
    case 'TraverseWith':
      return referenceExpression(hint.reference);

    case 'ThroughField': {
      if (hint.traversal.trim() === '') {
        throw new OpticsGenerationError(
          `Traversal not specified and not auto-detected for field '${hint.field}' of ${target.ownerClassName}`
        );
      }
      const lens = callStatic(target.ownerClassName, hint.field);
      return callMethod(callMethod(lens, 'asTraversal'), 'andThen', [referenceExpression(hint.traversal)]);
    }

    case 'None':
      throw new OpticsGenerationError(`No traversal hint for ${target.ownerClassName}`);
  }
}
