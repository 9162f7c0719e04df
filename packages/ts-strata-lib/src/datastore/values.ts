const bytesEqual = (a: Uint8Array, b: Uint8Array): boolean => {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
};

/**
 * Long text stored outside the indexable string limit. Not indexed.
 */
export class Text {
  readonly kind = "Text";

  constructor(readonly value: string) {}

  equals(other: unknown): boolean {
    return other instanceof Text && other.value === this.value;
  }

  toString(): string {
    return this.value;
  }
}

/**
 * Small binary blob. Indexed by the backend.
 */
export class ShortBlob {
  readonly kind = "ShortBlob";
  readonly bytes: Uint8Array;

  constructor(bytes: Uint8Array) {
    this.bytes = Uint8Array.from(bytes);
  }

  /** Returns a copy, so callers cannot change the stored bytes. */
  getBytes(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }

  equals(other: unknown): boolean {
    return other instanceof ShortBlob && bytesEqual(other.bytes, this.bytes);
  }
}

/**
 * Large binary blob. Not indexed.
 */
export class Blob {
  readonly kind = "Blob";
  readonly bytes: Uint8Array;

  constructor(bytes: Uint8Array) {
    this.bytes = Uint8Array.from(bytes);
  }

  /** Returns a copy, so callers cannot change the stored bytes. */
  getBytes(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }

  equals(other: unknown): boolean {
    return other instanceof Blob && bytesEqual(other.bytes, this.bytes);
  }
}

/** Element kinds a stored list may hold. */
export type StorageElement = bigint | number | boolean | string;

/** Ordered list of one element kind; `null` marks an absent element. */
export type StorageList = readonly (StorageElement | null)[];

export type LongList = readonly (bigint | null)[];
export type DoubleList = readonly (number | null)[];
export type StringList = readonly (string | null)[];

/**
 * Values the backend stores natively. `null` stands for an absent value.
 */
export type StorageValue =
  | null
  | bigint
  | number
  | boolean
  | string
  | Text
  | ShortBlob
  | Blob
  | StorageList;

const isStorageList = (value: StorageValue): value is StorageList =>
  Array.isArray(value);

const describeElement = (value: StorageElement): string => {
  switch (typeof value) {
    case "bigint":
      return "long";
    case "number":
      return "double";
    default:
      return typeof value;
  }
};

/**
 * Short description of a stored value's kind, used in diagnostics. Lists
 * name the distinct kinds of their non-null elements, e.g. `list<long|string>`.
 */
export const describeStorageValue = (value: StorageValue): string => {
  if (value === null) return "null";
  if (isStorageList(value)) {
    const kinds = new Set<string>();
    for (const element of value) {
      if (element !== null) kinds.add(describeElement(element));
    }
    return kinds.size === 0 ? "list" : `list<${[...kinds].join("|")}>`;
  }
  if (value instanceof Text) return "Text";
  if (value instanceof ShortBlob) return "ShortBlob";
  if (value instanceof Blob) return "Blob";
  return describeElement(value);
};

/** The elements of a stored list, or `null` for any other value. */
export const listElements = (value: StorageValue): StorageList | null =>
  Array.isArray(value) ? value : null;

export const isLongList = (value: StorageValue): value is LongList =>
  listElements(value)?.every(
    (element) => element === null || typeof element === "bigint",
  ) ?? false;

export const isDoubleList = (value: StorageValue): value is DoubleList =>
  listElements(value)?.every(
    (element) => element === null || typeof element === "number",
  ) ?? false;

/**
 * Value equality for stored values: blobs and texts by content, lists element-wise,
 * and numbers across the bigint/number split.
 */
export const storageValuesEqual = (
  a: StorageValue | undefined,
  b: StorageValue | undefined,
): boolean => {
  if (a === undefined || b === undefined) return a === b;
  if (a === null || b === null) return a === b;
  if (a instanceof Text || a instanceof ShortBlob || a instanceof Blob) {
    return a.equals(b);
  }
  const left = listElements(a);
  const right = listElements(b);
  if (left !== null || right !== null) {
    if (left === null || right === null || left.length !== right.length) {
      return false;
    }
    return left.every((element, i) => storageValuesEqual(element, right[i]));
  }
  if (
    (typeof a === "bigint" || typeof a === "number") &&
    (typeof b === "bigint" || typeof b === "number")
  ) {
    // loose equality compares bigint and number by value
    return a == b;
  }
  return a === b;
};
