import { Text, ShortBlob, Blob } from "../datastore/values";
import { Serializer } from "./serialization";

// Absent values map to null throughout.

export const textToString = (value: Text | null): string | null =>
  value !== null ? value.value : null;

export const stringToText = (value: string | null): Text | null =>
  value !== null ? new Text(value) : null;

export const shortBlobToBytes = (value: ShortBlob | null): Uint8Array | null =>
  value !== null ? value.getBytes() : null;

export const bytesToShortBlob = (value: Uint8Array | null): ShortBlob | null =>
  value !== null ? new ShortBlob(value) : null;

export const blobToBytes = (value: Blob | null): Uint8Array | null =>
  value !== null ? value.getBytes() : null;

export const bytesToBlob = (value: Uint8Array | null): Blob | null =>
  value !== null ? new Blob(value) : null;

export const shortBlobToObject = (
  serializer: Serializer,
  value: ShortBlob | null,
): unknown => (value !== null ? serializer.decode(value.bytes) : null);

export const objectToShortBlob = (
  serializer: Serializer,
  value: unknown,
): ShortBlob | null =>
  value !== null && value !== undefined ?
    new ShortBlob(serializer.encode(value))
  : null;

export const blobToObject = (
  serializer: Serializer,
  value: Blob | null,
): unknown => (value !== null ? serializer.decode(value.bytes) : null);

export const objectToBlob = (
  serializer: Serializer,
  value: unknown,
): Blob | null =>
  value !== null && value !== undefined ?
    new Blob(serializer.encode(value))
  : null;
