/**
 * FocusPath - a Lens wrapped for fluent, multi-level navigation
 *
 * A path widens when it passes through a field that may hold no value
 * (`some`, `nullable`: AffinePath) or many values (`each`: TraversalPath).
 */

import { AffinePath } from './affine-path.js';
import type { Lens } from './lens.js';
import type { Option } from './option.js';
import type { Traversal } from './traversal.js';
import { TraversalPath } from './traversal-path.js';

export interface FocusPath<S, A> {
  get(source: S): A;
  set(value: A, source: S): S;
  modify(f: (a: A) => A, source: S): S;
  toLens(): Lens<S, A>;
  /** Extend the path by one more lens */
  via<B>(next: Lens<A, B>): FocusPath<S, B>;
  some<B>(this: FocusPath<S, Option<B>>): AffinePath<S, B>;
  nullable(): AffinePath<S, NonNullable<A>>;
  each<B>(traversal: Traversal<A, B>): TraversalPath<S, B>;
}

export const FocusPath = {
  of<S, A>(lens: Lens<S, A>): FocusPath<S, A> {
    return {
      get: (source) => lens.get(source),
      set: (value, source) => lens.set(value, source),
      modify: (f, source) => lens.modify(f, source),
      toLens: () => lens,
      via: <B>(next: Lens<A, B>) => FocusPath.of(lens.andThen(next)),
      some<B>(this: FocusPath<S, Option<B>>): AffinePath<S, B> {
        return AffinePath.fromLens(this.toLens()).some();
      },
      nullable: () => AffinePath.fromLens(lens).nullable(),
      each: <B>(traversal: Traversal<A, B>) => TraversalPath.of(lens.asTraversal().andThen(traversal)),
    };
  },
};
