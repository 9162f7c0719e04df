/**
 * Element codecs describe how one storage-native list element maps to one
 * host element: narrowing, widening, the primitive zero value and the
 * element's natural ordering.
 */

import { StorageElement } from "../datastore/values";

export type StorageElementKind = "long" | "double" | "boolean" | "string";

export interface ElementCodec<E, S extends StorageElement> {
  /** Host element type name, e.g. "int16"; nullable codecs end in "?". */
  readonly name: string;
  readonly storageKind: StorageElementKind;
  /**
   * Value the host element takes when the stored element is absent: the
   * primitive zero, or `null` for nullable codecs.
   */
  readonly zero: E;
  narrow(value: S): E;
  widen(value: E): S | null;
  compare(a: E, b: E): number;
  isStorageElement(value: unknown): value is S;
}

/**
 * Host arrays without a null slot: the typed arrays.
 */
export interface PrimitiveArray<E> extends Iterable<E> {
  readonly length: number;
  [index: number]: E;
}

export interface NumericElementCodec<
  E extends number | bigint,
  S extends bigint | number,
  A extends PrimitiveArray<E>,
> extends ElementCodec<E, S> {
  readonly arrayName: string;
  createArray(length: number): A;
}

const naturalOrder = <T extends number | bigint | string>(a: T, b: T) =>
  a < b ? -1
  : a > b ? 1
  : 0;

/**
 * Total order over doubles: -0 sorts before 0, and NaN sorts after every
 * number and equals itself.
 */
export const floatOrder = (a: number, b: number): number => {
  if (a < b) return -1;
  if (a > b) return 1;
  const aNaN = Number.isNaN(a);
  const bNaN = Number.isNaN(b);
  if (aNaN || bNaN) return Number(aNaN) - Number(bNaN);
  if (a === 0 && Object.is(a, -0) !== Object.is(b, -0)) {
    return Object.is(a, -0) ? -1 : 1;
  }
  return 0;
};

const isBigInt = (value: unknown): value is bigint => typeof value === "bigint";
const isNumber = (value: unknown): value is number => typeof value === "number";
const isString = (value: unknown): value is string => typeof value === "string";
const isBoolean = (value: unknown): value is boolean =>
  typeof value === "boolean";

/**
 * Two's-complement narrowing of a 64-bit value to `bits` bits. Out-of-range
 * values wrap, matching a plain integer cast.
 */
export const narrowLong = (value: bigint, bits: 16 | 32): number =>
  Number(BigInt.asIntN(bits, value));

export const int16: NumericElementCodec<number, bigint, Int16Array> = {
  name: "int16",
  arrayName: "Int16Array",
  storageKind: "long",
  zero: 0,
  narrow: (value) => narrowLong(value, 16),
  widen: (value) => BigInt(value),
  compare: naturalOrder,
  isStorageElement: isBigInt,
  createArray: (length) => new Int16Array(length),
};

export const int32: NumericElementCodec<number, bigint, Int32Array> = {
  name: "int32",
  arrayName: "Int32Array",
  storageKind: "long",
  zero: 0,
  narrow: (value) => narrowLong(value, 32),
  widen: (value) => BigInt(value),
  compare: naturalOrder,
  isStorageElement: isBigInt,
  createArray: (length) => new Int32Array(length),
};

export const int64: NumericElementCodec<bigint, bigint, BigInt64Array> = {
  name: "int64",
  arrayName: "BigInt64Array",
  storageKind: "long",
  zero: 0n,
  narrow: (value) => value,
  widen: (value) => value,
  compare: naturalOrder,
  isStorageElement: isBigInt,
  createArray: (length) => new BigInt64Array(length),
};

export const float32: NumericElementCodec<number, number, Float32Array> = {
  name: "float32",
  arrayName: "Float32Array",
  storageKind: "double",
  zero: 0,
  narrow: (value) => Math.fround(value),
  widen: (value) => value,
  compare: floatOrder,
  isStorageElement: isNumber,
  createArray: (length) => new Float32Array(length),
};

export const float64: NumericElementCodec<number, number, Float64Array> = {
  name: "float64",
  arrayName: "Float64Array",
  storageKind: "double",
  zero: 0,
  narrow: (value) => value,
  widen: (value) => value,
  compare: floatOrder,
  isStorageElement: isNumber,
  createArray: (length) => new Float64Array(length),
};

export const bool: ElementCodec<boolean, boolean> = {
  name: "boolean",
  storageKind: "boolean",
  zero: false,
  narrow: (value) => value,
  widen: (value) => value,
  compare: (a, b) => Number(a) - Number(b),
  isStorageElement: isBoolean,
};

export const string: ElementCodec<string, string> = {
  name: "string",
  storageKind: "string",
  zero: "",
  narrow: (value) => value,
  widen: (value) => value,
  compare: naturalOrder,
  isStorageElement: isString,
};

/**
 * Orders `null` before every value, then defers to `compare`.
 */
export const nullsFirst =
  <E>(compare: (a: E, b: E) => number) =>
  (a: E | null, b: E | null): number => {
    if (a === null) return b === null ? 0 : -1;
    if (b === null) return 1;
    return compare(a, b);
  };

/**
 * Nullable form of a codec: absent stored elements stay `null` instead of
 * taking the primitive zero, and `null` orders first.
 */
export const nullable = <E, S extends StorageElement>(
  codec: ElementCodec<E, S>,
): ElementCodec<E | null, S> => ({
  name: `${codec.name}?`,
  storageKind: codec.storageKind,
  zero: null,
  narrow: (value) => codec.narrow(value),
  widen: (value) => (value === null ? null : codec.widen(value)),
  compare: nullsFirst(codec.compare),
  isStorageElement: (value): value is S => codec.isStorageElement(value),
});

/**
 * Converts one stored element, absent elements becoming the codec's zero.
 */
export const readElement =
  <E, S extends StorageElement>(codec: ElementCodec<E, S>) =>
  (value: S | null): E =>
    value === null ? codec.zero : codec.narrow(value);
