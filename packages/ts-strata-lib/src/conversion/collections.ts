import { PrimitiveArray } from "./elements";
import { SortedSet } from "./sortedSet";

export type CollectionKind =
  | "primitiveArray"
  | "array"
  | "set"
  | "sortedSet"
  | "linkedSet";

/**
 * Accumulates converted elements into one destination collection.
 */
export interface CollectionSink<E, C> {
  append(element: E): void;
  finalize(): C;
}

/**
 * Construction and ordering strategy for a destination collection kind.
 * `start` receives the source length so fixed-size destinations can allocate up front.
 */
export interface CollectionBuilder<E, C> {
  readonly kind: CollectionKind;
  start(size: number): CollectionSink<E, C>;
}

/**
 * Ordered sequence, source order preserved.
 */
export const arrayBuilder = <E>(): CollectionBuilder<E, E[]> => ({
  kind: "array",
  start: () => {
    const out: E[] = [];
    return {
      append: (element) => {
        out.push(element);
      },
      finalize: () => out,
    };
  },
});

/**
 * Fixed-length typed array, source order preserved.
 */
export const primitiveArrayBuilder = <E, A extends PrimitiveArray<E>>(
  createArray: (length: number) => A,
): CollectionBuilder<E, A> => ({
  kind: "primitiveArray",
  start: (size) => {
    const out = createArray(size);
    let index = 0;
    return {
      append: (element) => {
        out[index++] = element;
      },
      finalize: () => out,
    };
  },
});

const setSink = <E>(): CollectionSink<E, Set<E>> => {
  const out = new Set<E>();
  return {
    append: (element) => {
      out.add(element);
    },
    finalize: () => out,
  };
};

/**
 * Unordered set. Callers must not rely on its iteration order.
 */
export const setBuilder = <E>(): CollectionBuilder<E, Set<E>> => ({
  kind: "set",
  start: () => setSink<E>(),
});

/**
 * Set iterating in first-occurrence order of the source.
 */
export const linkedSetBuilder = <E>(): CollectionBuilder<E, Set<E>> => ({
  kind: "linkedSet",
  start: () => setSink<E>(),
});

/**
 * Set ordered by `compare`, whatever the source order.
 */
export const sortedSetBuilder = <E>(
  compare: (a: E, b: E) => number,
): CollectionBuilder<E, SortedSet<E>> => ({
  kind: "sortedSet",
  start: () => {
    const out = new SortedSet<E>(compare);
    return {
      append: (element) => {
        out.add(element);
      },
      finalize: () => out,
    };
  },
});

/**
 * Converts a stored list into a host collection. An absent source stays
 * absent; a present source always yields a collection, empty for empty input.
 */
export function convertList<S, E, C>(
  source: readonly (S | null)[] | null,
  convertElement: (value: S | null) => E,
  builder: CollectionBuilder<E, C>,
): C | null {
  if (source === null) {
    return null;
  }
  const sink = builder.start(source.length);
  for (const value of source) {
    sink.append(convertElement(value));
  }
  return sink.finalize();
}

/**
 * Converts a host collection into a stored list in iteration order.
 */
export function toStorageList<E, S>(
  source: Iterable<E> | null,
  convertElement: (value: E) => S | null,
): (S | null)[] | null {
  if (source === null) {
    return null;
  }
  const out: (S | null)[] = [];
  for (const value of source) {
    out.push(convertElement(value));
  }
  return out;
}
