/**
 * AffinePath - a path that reaches at most one focus
 *
 * Produced when a FocusPath widens through an `Option` or a nullable field.
 */

import { Affine } from './affine.js';
import type { Lens } from './lens.js';
import { Option } from './option.js';
import { Traversal } from './traversal.js';
import { TraversalPath } from './traversal-path.js';

export interface AffinePath<S, A> {
  preview(source: S): Option<A>;
  /** No-op when nothing is focused */
  set(value: A, source: S): S;
  modify(f: (a: A) => A, source: S): S;
  toAffine(): Affine<S, A>;
  via<B>(next: Lens<A, B>): AffinePath<S, B>;
  /** Continue into the value of a present `Option` */
  some<B>(this: AffinePath<S, Option<B>>): AffinePath<S, B>;
  /** Continue into a value that is neither `undefined` nor `null` */
  nullable(): AffinePath<S, NonNullable<A>>;
  each<B>(traversal: Traversal<A, B>): TraversalPath<S, B>;
}

export const AffinePath = {
  of<S, A>(affine: Affine<S, A>): AffinePath<S, A> {
    const compose = <B>(preview: (a: A) => Option<B>, set: (a: A, value: B) => A): AffinePath<S, B> =>
      AffinePath.of(
        Affine.of<S, B>(
          (source) => {
            const focus = affine.preview(source);
            return Option.isSome(focus) ? preview(focus.value) : Option.none();
          },
          (source, value) => affine.modify((a) => set(a, value), source)
        )
      );

    return {
      preview: (source) => affine.preview(source),
      set: (value, source) => affine.set(value, source),
      modify: (f, source) => affine.modify(f, source),
      toAffine: () => affine,
      via: <B>(next: Lens<A, B>) =>
        compose<B>(
          (a) => Option.some(next.get(a)),
          (a, value) => next.set(value, a)
        ),
      some<B>(this: AffinePath<S, Option<B>>): AffinePath<S, B> {
        const outer = this.toAffine();
        return AffinePath.of(
          Affine.of<S, B>(
            (source) => {
              const focus = outer.preview(source);
              return Option.isSome(focus) ? focus.value : Option.none();
            },
            (source, value) => outer.set(Option.some(value), source)
          )
        );
      },
      nullable: () =>
        compose<NonNullable<A>>(
          (a) => (a === undefined || a === null ? Option.none() : Option.some(a)),
          (_, value) => value
        ),
      each: <B>(traversal: Traversal<A, B>) =>
        TraversalPath.of(
          Traversal.of<S, B>(
            (source) => {
              const focus = affine.preview(source);
              return Option.isSome(focus) ? traversal.getAll(focus.value) : [];
            },
            (f, source) => affine.modify((a) => traversal.modifyAll(f, a), source)
          )
        ),
    };
  },

  /** A path that always focuses, from a lens */
  fromLens<S, A>(lens: Lens<S, A>): AffinePath<S, A> {
    return AffinePath.of(
      Affine.of<S, A>(
        (source) => Option.some(lens.get(source)),
        (source, value) => lens.set(value, source)
      )
    );
  },
};
