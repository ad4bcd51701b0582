/**
 * Lens - focus on exactly one part of a structure
 *
 * Laws: `set(get(s), s) == s`, `get(set(a, s)) == a`,
 * `set(b, set(a, s)) == set(b, s)`.
 */

import { Traversal } from './traversal.js';

export interface Lens<S, A> {
  get(source: S): A;
  set(value: A, source: S): S;
  modify(f: (a: A) => A, source: S): S;
  andThen<B>(other: Lens<A, B>): Lens<S, B>;
  asTraversal(): Traversal<S, A>;
}

export const Lens = {
  /**
   * Build a lens from a getter and a `(source, newValue) => updated` setter
   */
  of<S, A>(get: (source: S) => A, set: (source: S, value: A) => S): Lens<S, A> {
    const lens: Lens<S, A> = {
      get,
      set: (value, source) => set(source, value),
      modify: (f, source) => set(source, f(get(source))),
      andThen: <B>(other: Lens<A, B>) =>
        Lens.of<S, B>(
          (source) => other.get(get(source)),
          (source, value) => set(source, other.set(value, get(source)))
        ),
      asTraversal: () =>
        Traversal.of<S, A>(
          (source) => [get(source)],
          (f, source) => set(source, f(get(source)))
        ),
    };
    return lens;
  },

  compose<S, A, B>(outer: Lens<S, A>, inner: Lens<A, B>): Lens<S, B> {
    return outer.andThen(inner);
  },
};
