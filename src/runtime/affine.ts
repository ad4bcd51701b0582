/**
 * Affine - focus on at most one part of a structure
 */

import { Option } from './option.js';

export interface Affine<S, A> {
  preview(source: S): Option<A>;
  /** No-op when nothing is focused */
  set(value: A, source: S): S;
  modify(f: (a: A) => A, source: S): S;
}

export const Affine = {
  of<S, A>(preview: (source: S) => Option<A>, set: (source: S, value: A) => S): Affine<S, A> {
    return {
      preview,
      set: (value, source) => (Option.isSome(preview(source)) ? set(source, value) : source),
      modify: (f, source) => {
        const focus = preview(source);
        return Option.isSome(focus) ? set(source, f(focus.value)) : source;
      },
    };
  },
};
