/**
 * Fold - read-only view of zero or more focuses
 */

import { Option } from './option.js';

export interface Fold<S, A> {
  getAll(source: S): readonly A[];
  preview(source: S): Option<A>;
  exists(predicate: (a: A) => boolean, source: S): boolean;
  length(source: S): number;
  andThen<B>(other: Fold<A, B>): Fold<S, B>;
}

export const Fold = {
  of<S, A>(getAll: (source: S) => readonly A[]): Fold<S, A> {
    const fold: Fold<S, A> = {
      getAll,
      preview: (source) => {
        for (const a of getAll(source)) {
          return Option.some(a);
        }
        return Option.none();
      },
      exists: (predicate, source) => getAll(source).some(predicate),
      length: (source) => getAll(source).length,
      andThen: <B>(other: Fold<A, B>) => Fold.of<S, B>((source) => getAll(source).flatMap((a) => other.getAll(a))),
    };
    return fold;
  },
};
