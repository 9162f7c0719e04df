import {
  Blob,
  ShortBlob,
  StorageElement,
  listElements,
  StorageValue,
  Text,
} from "../datastore/values";
import {
  CollectionBuilder,
  CollectionKind,
  arrayBuilder,
  convertList,
  linkedSetBuilder,
  primitiveArrayBuilder,
  setBuilder,
  sortedSetBuilder,
  toStorageList,
} from "../conversion/collections";
import {
  ElementCodec,
  NumericElementCodec,
  PrimitiveArray,
  bool,
  float32,
  float64,
  int16,
  int32,
  int64,
  nullable,
  readElement,
  string,
} from "../conversion/elements";
import {
  blobToBytes,
  blobToObject,
  bytesToBlob,
  bytesToShortBlob,
  objectToBlob,
  objectToShortBlob,
  shortBlobToBytes,
  shortBlobToObject,
  stringToText,
  textToString,
} from "../conversion/scalars";
import { Serializer, v8Serializer } from "../conversion/serialization";
import { SortedSet } from "../conversion/sortedSet";

export type StorageKind =
  | "long"
  | "double"
  | "boolean"
  | "string"
  | "text"
  | "shortBlob"
  | "blob"
  | "list";

/**
 * The converter pair an attribute uses, chosen once from its declared host type.
 *
 * @template H host (model) type
 * @template S storage type
 */
export interface AttributeType<H, S extends StorageValue> {
  /** Host type description, e.g. "int32?" or "Set<int16>". */
  readonly name: string;
  readonly storageKind: StorageKind;
  isStorageValue(value: StorageValue): value is S;
  toModel(value: S | null): H;
  toEntity(value: H): S | null;
}

/**
 * Attribute type of a multi-valued attribute with host elements `E`.
 */
export interface CollectionAttributeType<H, S extends StorageValue, E>
  extends AttributeType<H, S> {
  readonly collectionKind: CollectionKind;
  readonly element: ElementCodec<E, StorageElement>;
}

const scalar = <E, S extends StorageElement>(
  codec: ElementCodec<E, S>,
): AttributeType<E, S> => ({
  name: codec.name,
  storageKind: codec.storageKind,
  isStorageValue: (value): value is S => codec.isStorageElement(value),
  toModel: readElement(codec),
  toEntity: (value) => codec.widen(value),
});

const collection = <E, S extends StorageElement, C extends Iterable<E>>(
  name: string,
  codec: ElementCodec<E, S>,
  builder: CollectionBuilder<E, C>,
): CollectionAttributeType<C | null, readonly (S | null)[], E> => ({
  name,
  storageKind: "list",
  collectionKind: builder.kind,
  element: codec,
  isStorageValue: (value): value is readonly (S | null)[] =>
    listElements(value)?.every(
      (element) => element === null || codec.isStorageElement(element),
    ) ?? false,
  toModel: (value) => convertList(value, readElement(codec), builder),
  toEntity: (value) => toStorageList(value, (element) => codec.widen(element)),
});

/** Typed array of a numeric element; absent elements become zero. */
export const primitiveArrayOf = <
  E extends number | bigint,
  S extends bigint | number,
  A extends PrimitiveArray<E>,
>(
  codec: NumericElementCodec<E, S, A>,
) =>
  collection(
    codec.arrayName,
    codec,
    primitiveArrayBuilder<E, A>((length) => codec.createArray(length)),
  );

/** Ordered sequence (plain array), source order preserved. */
export const listOf = <E, S extends StorageElement>(codec: ElementCodec<E, S>) =>
  collection(`${codec.name}[]`, codec, arrayBuilder<E>());

/** Set with no ordering guarantee; duplicates collapse. */
export const setOf = <E, S extends StorageElement>(codec: ElementCodec<E, S>) =>
  collection(`Set<${codec.name}>`, codec, setBuilder<E>());

/** Set in first-occurrence order of the stored list. */
export const linkedSetOf = <E, S extends StorageElement>(
  codec: ElementCodec<E, S>,
) => collection(`LinkedSet<${codec.name}>`, codec, linkedSetBuilder<E>());

/** Set in the element's natural order. */
export const sortedSetOf = <E, S extends StorageElement>(
  codec: ElementCodec<E, S>,
): CollectionAttributeType<SortedSet<E> | null, readonly (S | null)[], E> =>
  collection(
    `SortedSet<${codec.name}>`,
    codec,
    sortedSetBuilder<E>((a, b) => codec.compare(a, b)),
  );

const isText = (value: StorageValue): value is Text => value instanceof Text;
const isShortBlob = (value: StorageValue): value is ShortBlob =>
  value instanceof ShortBlob;
const isBlob = (value: StorageValue): value is Blob => value instanceof Blob;

/** Long text stored as a Text blob. */
export const text: AttributeType<string | null, Text> = {
  name: "text",
  storageKind: "text",
  isStorageValue: isText,
  toModel: textToString,
  toEntity: stringToText,
};

/** Bytes stored in a short (indexed) blob. */
export const shortBlobBytes: AttributeType<Uint8Array | null, ShortBlob> = {
  name: "Uint8Array(shortBlob)",
  storageKind: "shortBlob",
  isStorageValue: isShortBlob,
  toModel: shortBlobToBytes,
  toEntity: bytesToShortBlob,
};

/** Bytes stored in a large blob. */
export const blobBytes: AttributeType<Uint8Array | null, Blob> = {
  name: "Uint8Array(blob)",
  storageKind: "blob",
  isStorageValue: isBlob,
  toModel: blobToBytes,
  toEntity: bytesToBlob,
};

export interface SerializedOptions<T> {
  serializer?: Serializer;
  /** Checks the decoded value; without it the host type is `unknown`. */
  guard?: (value: unknown) => value is T;
}

const acceptAll = (_value: unknown): _value is unknown => true;

const checked =
  <T>(name: string, guard: (value: unknown) => value is T) =>
  (value: unknown): T | null => {
    if (value === null || guard(value)) {
      return value;
    }
    throw new TypeError(`Decoded value does not match ${name}`);
  };

/** Arbitrary object serialized into a short blob. */
export function serializedShortBlob<T>(
  options: SerializedOptions<T> & { guard: (value: unknown) => value is T },
): AttributeType<T | null, ShortBlob>;
export function serializedShortBlob(
  options?: SerializedOptions<unknown>,
): AttributeType<unknown, ShortBlob>;
export function serializedShortBlob<T>(
  options: SerializedOptions<T> = {},
): AttributeType<T | null, ShortBlob> | AttributeType<unknown, ShortBlob> {
  const serializer = options.serializer ?? v8Serializer;
  const name = `serialized(shortBlob,${serializer.format})`;
  const check = checked(name, options.guard ?? acceptAll);
  return {
    name,
    storageKind: "shortBlob",
    isStorageValue: isShortBlob,
    toModel: (value: ShortBlob | null) =>
      check(shortBlobToObject(serializer, value)),
    toEntity: (value: unknown) => objectToShortBlob(serializer, value),
  };
}

/** Arbitrary object serialized into a large blob. */
export function serializedBlob<T>(
  options: SerializedOptions<T> & { guard: (value: unknown) => value is T },
): AttributeType<T | null, Blob>;
export function serializedBlob(
  options?: SerializedOptions<unknown>,
): AttributeType<unknown, Blob>;
export function serializedBlob<T>(
  options: SerializedOptions<T> = {},
): AttributeType<T | null, Blob> | AttributeType<unknown, Blob> {
  const serializer = options.serializer ?? v8Serializer;
  const name = `serialized(blob,${serializer.format})`;
  const check = checked(name, options.guard ?? acceptAll);
  return {
    name,
    storageKind: "blob",
    isStorageValue: isBlob,
    toModel: (value: Blob | null) => check(blobToObject(serializer, value)),
    toEntity: (value: unknown) => objectToBlob(serializer, value),
  };
}

/**
 * Catalogue of scalar attribute types. Primitive forms read absent values as
 * the zero value, the others as `null`.
 */
export const AttributeTypes = {
  primitiveShort: scalar(int16),
  short: scalar(nullable(int16)),
  primitiveInt: scalar(int32),
  int: scalar(nullable(int32)),
  primitiveLong: scalar(int64),
  long: scalar(nullable(int64)),
  primitiveFloat: scalar(float32),
  float: scalar(nullable(float32)),
  primitiveDouble: scalar(float64),
  double: scalar(nullable(float64)),
  primitiveBoolean: scalar(bool),
  boolean: scalar(nullable(bool)),
  string: scalar(nullable(string)),
  text,
  shortBlobBytes,
  blobBytes,
} as const;
