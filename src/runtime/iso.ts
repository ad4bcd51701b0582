/**
 * Iso - a lossless conversion between two representations
 *
 * Laws: `reverseGet(get(s)) == s`, `get(reverseGet(a)) == a`.
 */

import { Lens } from './lens.js';

export interface Iso<S, A> {
  get(source: S): A;
  reverseGet(value: A): S;
  reverse(): Iso<A, S>;
  andThen<B>(other: Iso<A, B>): Iso<S, B>;
  asLens(): Lens<S, A>;
}

export const Iso = {
  of<S, A>(get: (source: S) => A, reverseGet: (value: A) => S): Iso<S, A> {
    return {
      get,
      reverseGet,
      reverse: () => Iso.of<A, S>(reverseGet, get),
      andThen: <B>(other: Iso<A, B>) =>
        Iso.of<S, B>(
          (source) => other.get(get(source)),
          (value) => reverseGet(other.reverseGet(value))
        ),
      asLens: () => Lens.of<S, A>(get, (_source, value) => reverseGet(value)),
    };
  },
};
