/**
 * Prism - focus on one variant of a sum type
 *
 * Laws: `preview(review(a)) == some(a)`; when `preview(s) == some(a)`,
 * `review(a) == s`.
 */

import { Option } from './option.js';
import { Traversal } from './traversal.js';

export interface Prism<S, A> {
  preview(source: S): Option<A>;
  review(value: A): S;
  matches(source: S): boolean;
  modify(f: (a: A) => A, source: S): S;
  andThen<B>(other: Prism<A, B>): Prism<S, B>;
  asTraversal(): Traversal<S, A>;
}

export const Prism = {
  of<S, A>(preview: (source: S) => Option<A>, review: (value: A) => S): Prism<S, A> {
    const modify = (f: (a: A) => A, source: S): S => {
      const focus = preview(source);
      return Option.isSome(focus) ? review(f(focus.value)) : source;
    };
    const prism: Prism<S, A> = {
      preview,
      review,
      matches: (source) => Option.isSome(preview(source)),
      modify,
      andThen: <B>(other: Prism<A, B>) =>
        Prism.of<S, B>(
          (source) => {
            const focus = preview(source);
            return Option.isSome(focus) ? other.preview(focus.value) : Option.none();
          },
          (value) => review(other.review(value))
        ),
      asTraversal: () =>
        Traversal.of<S, A>(
          (source) => {
            const focus = preview(source);
            return Option.isSome(focus) ? [focus.value] : [];
          },
          modify
        ),
    };
    return prism;
  },
};
