import * as v8 from "v8";

/**
 * Turns host objects into bytes and back. Implementations must round-trip
 * every value they accept.
 */
export interface Serializer {
  readonly format: SerializationFormat;
  encode(value: unknown): Uint8Array;
  decode(bytes: Uint8Array): unknown;
}

export type SerializationFormat = "v8" | "json";

/**
 * Structured-clone serializer backed by Node's `v8` module. Keeps Map, Set,
 * Date, BigInt, typed arrays and cyclic references intact.
 */
export const v8Serializer: Serializer = {
  format: "v8",
  encode: (value) => new Uint8Array(v8.serialize(value)),
  decode: (bytes) => v8.deserialize(bytes),
};

const iso8601Format =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2})$/;

/** Key of the wrapper object a Date is encoded as: `{"$date": "<ISO 8601>"}`. */
export const DATE_TAG = "$date";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

/**
 * Wraps Date values in a tagged object during JSON encoding. Reads the
 * holder because `Date.prototype.toJSON` runs before the replacer.
 */
export function jsonDateReplacer(
  this: unknown,
  key: string,
  value: unknown,
): unknown {
  const holder: unknown = this;
  const original = isRecord(holder) ? holder[key] : undefined;
  if (original instanceof Date) {
    return { [DATE_TAG]: original.toISOString() };
  }
  return value;
}

/**
 * Revives tagged dates into Date objects during JSON parsing. Plain strings
 * stay strings, whatever they look like.
 */
export function jsonDateReviver(_key: string, value: unknown): unknown {
  if (isRecord(value) && !Array.isArray(value)) {
    const keys = Object.keys(value);
    const tagged = value[DATE_TAG];
    if (
      keys.length === 1 &&
      typeof tagged === "string" &&
      iso8601Format.test(tagged)
    ) {
      return new Date(tagged);
    }
  }
  return value;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * UTF-8 JSON serializer. Dates round-trip through a `{"$date": ...}` tag;
 * values JSON cannot express (BigInt, Map, Set), and objects whose only key
 * is `$date`, are outside its domain.
 */
export const jsonSerializer: Serializer = {
  format: "json",
  encode: (value) => encoder.encode(JSON.stringify(value, jsonDateReplacer)),
  decode: (bytes) => JSON.parse(decoder.decode(bytes), jsonDateReviver),
};

export const serializerForFormat = (format: SerializationFormat): Serializer =>
  format === "json" ? jsonSerializer : v8Serializer;
