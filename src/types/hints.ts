/**
 * Strategy hints read from user annotations
 *
 * Each family is a tagged union whose `None` member exists only as an
 * explicit sentinel. Resolvers throw when they are handed one.
 */

import type { TypeRef } from './declarations.js';

// ============================================================================
// Copy strategies (how a Lens builds an updated instance)
// ============================================================================

export type CopyStrategyInfo =
  | {
      readonly kind: 'ViaBuilder';
      /** Getter used by the Lens's `get`; empty means the field itself */
      readonly getter: string;
      /** Builder obtainer; empty means `toBuilder` */
      readonly toBuilder: string;
      /** Per-field builder setter; empty means the field name */
      readonly setter: string;
      /** Terminal call; empty means `build` */
      readonly build: string;
    }
  | {
      readonly kind: 'Wither';
      readonly getter: string;
      /** Wither method; empty means `with<Field>` */
      readonly wither: string;
    }
  | {
      readonly kind: 'ViaConstructor';
      readonly getter: string;
      /** Constructor parameters in declared order */
      readonly parameterOrder: readonly string[];
    }
  | {
      readonly kind: 'ViaCopyAndSet';
      readonly getter: string;
      /** Class used as copy constructor; empty means the source type */
      readonly copyConstructor: string;
      /** Setter called on the copy; empty means `set<Field>` */
      readonly setter: string;
    }
  | { readonly kind: 'None' };

export type CopyStrategyKind = CopyStrategyInfo['kind'];

// ============================================================================
// Prism hints (how a Prism recognises its variant)
// ============================================================================

export type PrismHintInfo =
  | {
      readonly kind: 'InstanceOf';
      /** Target class; `undefined` means the prism's focus type */
      readonly target: TypeRef | undefined;
    }
  | {
      readonly kind: 'MatchWhen';
      readonly predicate: string;
      readonly getter: string;
    }
  | { readonly kind: 'None' };

export type PrismHintKind = PrismHintInfo['kind'];

// ============================================================================
// Traversal hints (how a Traversal reaches its elements)
// ============================================================================

export type TraversalHintInfo =
  | {
      readonly kind: 'TraverseWith';
      /** Dotted reference, optionally ending in `()` */
      readonly reference: string;
    }
  | {
      readonly kind: 'ThroughField';
      readonly field: string;
      /** Explicit traversal; empty means auto-detect from the field's container */
      readonly traversal: string;
    }
  | { readonly kind: 'None' };

export type TraversalHintKind = TraversalHintInfo['kind'];

const NO_COPY_STRATEGY: CopyStrategyInfo = { kind: 'None' };
const NO_PRISM_HINT: PrismHintInfo = { kind: 'None' };
const NO_TRAVERSAL_HINT: TraversalHintInfo = { kind: 'None' };

export const CopyStrategies = {
  viaBuilder(getter = '', toBuilder = '', setter = '', build = ''): CopyStrategyInfo {
    return { kind: 'ViaBuilder', getter, toBuilder, setter, build };
  },
  wither(wither = '', getter = ''): CopyStrategyInfo {
    return { kind: 'Wither', getter, wither };
  },
  viaConstructor(parameterOrder: readonly string[], getter = ''): CopyStrategyInfo {
    return { kind: 'ViaConstructor', getter, parameterOrder };
  },
  viaCopyAndSet(copyConstructor = '', setter = '', getter = ''): CopyStrategyInfo {
    return { kind: 'ViaCopyAndSet', getter, copyConstructor, setter };
  },
  none: NO_COPY_STRATEGY,
};

export const PrismHints = {
  instanceOf(target?: TypeRef): PrismHintInfo {
    return { kind: 'InstanceOf', target };
  },
  matchWhen(predicate: string, getter: string): PrismHintInfo {
    return { kind: 'MatchWhen', predicate, getter };
  },
  none: NO_PRISM_HINT,
};

export const TraversalHints = {
  traverseWith(reference: string): TraversalHintInfo {
    return { kind: 'TraverseWith', reference };
  },
  throughField(field: string, traversal = ''): TraversalHintInfo {
    return { kind: 'ThroughField', field, traversal };
  },
  none: NO_TRAVERSAL_HINT,
};
