/**
 * Getter - read exactly one part of a structure
 */

import { Fold } from './fold.js';

export interface Getter<S, A> {
  get(source: S): A;
  andThen<B>(other: Getter<A, B>): Getter<S, B>;
  asFold(): Fold<S, A>;
}

export const Getter = {
  of<S, A>(get: (source: S) => A): Getter<S, A> {
    return {
      get,
      andThen: <B>(other: Getter<A, B>) => Getter.of<S, B>((source) => other.get(get(source))),
      asFold: () => Fold.of<S, A>((source) => [get(source)]),
    };
  },
};
