/**
 * Option - an optional value, as produced by `Prism.preview`
 */

export type Option<A> = { readonly _tag: 'Some'; readonly value: A } | { readonly _tag: 'None' };

const NONE: Option<never> = { _tag: 'None' };

export const Option = {
  some<A>(value: A): Option<A> {
    return { _tag: 'Some', value };
  },

  none<A = never>(): Option<A> {
    return NONE;
  },

  isSome<A>(option: Option<A>): option is { readonly _tag: 'Some'; readonly value: A } {
    return option._tag === 'Some';
  },

  map<A, B>(option: Option<A>, f: (a: A) => B): Option<B> {
    return option._tag === 'Some' ? Option.some(f(option.value)) : NONE;
  },

  getOrElse<A>(option: Option<A>, fallback: () => A): A {
    return option._tag === 'Some' ? option.value : fallback();
  },
};
