/**
 * Standard traversals for the supported container families
 *
 * Each is typed over the mutable container. A traversal over `A[]` is also a
 * traversal over `readonly A[]` (likewise `Set`/`ReadonlySet` and
 * `Map`/`ReadonlyMap`), so one reference serves both field declarations.
 */

import { Option } from './option.js';
import { Traversal } from './traversal.js';

export const Traversals = {
  /** Every element of a list, order kept */
  forList<A>(): Traversal<A[], A> {
    return Traversal.of<A[], A>(
      (list) => list,
      (f, list) => list.map((element) => f(element))
    );
  },

  /** Every element of a set; equal results collapse */
  forSet<A>(): Traversal<Set<A>, A> {
    return Traversal.of<Set<A>, A>(
      (set) => [...set],
      (f, set) => new Set([...set].map((element) => f(element)))
    );
  },

  /** Every value of a map, keys untouched */
  forMapValues<K, V>(): Traversal<Map<K, V>, V> {
    return Traversal.of<Map<K, V>, V>(
      (map) => [...map.values()],
      (f, map) => new Map([...map].map(([key, value]): [K, V] => [key, f(value)]))
    );
  },

  /** The value of a present Option; nothing for an absent one */
  forOptional<A>(): Traversal<Option<A>, A> {
    return Traversal.of<Option<A>, A>(
      (option) => (Option.isSome(option) ? [option.value] : []),
      (f, option) => Option.map(option, f)
    );
  },

  /** Every element of an array */
  forArray<A>(): Traversal<A[], A> {
    return Traversal.of<A[], A>(
      (array) => array,
      (f, array) => Array.from(array, (element) => f(element))
    );
  },
};
