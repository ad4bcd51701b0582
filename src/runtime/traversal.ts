/**
 * Traversal - read and update zero or more focuses at once
 */

import { Fold } from './fold.js';

export interface Traversal<S, A> {
  getAll(source: S): readonly A[];
  modifyAll(f: (a: A) => A, source: S): S;
  setAll(value: A, source: S): S;
  andThen<B>(other: Traversal<A, B>): Traversal<S, B>;
  asFold(): Fold<S, A>;
}

export const Traversal = {
  of<S, A>(getAll: (source: S) => readonly A[], modifyAll: (f: (a: A) => A, source: S) => S): Traversal<S, A> {
    const traversal: Traversal<S, A> = {
      getAll,
      modifyAll,
      setAll: (value, source) => modifyAll(() => value, source),
      andThen: <B>(other: Traversal<A, B>) =>
        Traversal.of<S, B>(
          (source) => getAll(source).flatMap((a) => other.getAll(a)),
          (f, source) => modifyAll((a) => other.modifyAll(f, a), source)
        ),
      asFold: () => Fold.of(getAll),
    };
    return traversal;
  },
};
