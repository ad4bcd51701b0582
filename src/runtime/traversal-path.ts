/**
 * TraversalPath - a path that reaches zero or more focuses
 *
 * Produced when a FocusPath or AffinePath widens through a collection.
 */

import type { Lens } from './lens.js';
import type { Option } from './option.js';
import { Traversal } from './traversal.js';
import { Traversals } from './traversals.js';

export interface TraversalPath<S, A> {
  getAll(source: S): readonly A[];
  modifyAll(f: (a: A) => A, source: S): S;
  setAll(value: A, source: S): S;
  toTraversal(): Traversal<S, A>;
  via<B>(next: Lens<A, B>): TraversalPath<S, B>;
  /** Continue into every present `Option` value */
  some<B>(this: TraversalPath<S, Option<B>>): TraversalPath<S, B>;
  /** Skip focuses that are `undefined` or `null` */
  nullable(): TraversalPath<S, NonNullable<A>>;
  each<B>(traversal: Traversal<A, B>): TraversalPath<S, B>;
}

export const TraversalPath = {
  of<S, A>(traversal: Traversal<S, A>): TraversalPath<S, A> {
    return {
      getAll: (source) => traversal.getAll(source),
      modifyAll: (f, source) => traversal.modifyAll(f, source),
      setAll: (value, source) => traversal.setAll(value, source),
      toTraversal: () => traversal,
      via: <B>(next: Lens<A, B>) => TraversalPath.of(traversal.andThen(next.asTraversal())),
      some<B>(this: TraversalPath<S, Option<B>>): TraversalPath<S, B> {
        return this.each(Traversals.forOptional<B>());
      },
      nullable: () =>
        TraversalPath.of(
          Traversal.of<S, NonNullable<A>>(
            (source) => traversal.getAll(source).flatMap((a): NonNullable<A>[] => (a === undefined || a === null ? [] : [a])),
            (f, source) => traversal.modifyAll((a): A => (a === undefined || a === null ? a : f(a)), source)
          )
        ),
      each: <B>(next: Traversal<A, B>) => TraversalPath.of(traversal.andThen(next)),
    };
  },
};
