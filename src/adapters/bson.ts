import { BSONValue, Binary, Decimal128, EJSON, ObjectId, Timestamp, deserialize, type Document } from "bson";

import type { BinaryDecoder } from "../capabilities";
import { fromNative, type FromNativeOptions } from "../value";

const DESERIALIZE_OPTIONS = { useBigInt64: true, promoteBuffers: false } as const;
const MIN_DOCUMENT_SIZE = 5;

const scalarize: NonNullable<FromNativeOptions["scalarize"]> = (value) => {
  if (value instanceof ObjectId) return value.toHexString();
  if (value instanceof Binary) return value.toString("base64");
  if (value instanceof Decimal128 || value instanceof Timestamp) return value.toString();
  if (value instanceof BSONValue) return EJSON.stringify(value, { relaxed: true });
  return undefined;
};

/** Splits a dump of concatenated BSON documents. */
const readDocuments = (bytes: Uint8Array): Document[] => {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const documents: Document[] = [];
  let offset = 0;
  while (offset < bytes.byteLength) {
    if (bytes.byteLength - offset < MIN_DOCUMENT_SIZE) {
      throw new Error(`truncated document at byte ${offset}`);
    }
    const size = view.getInt32(offset, true);
    if (size < MIN_DOCUMENT_SIZE || offset + size > bytes.byteLength) {
      throw new Error(`invalid document size ${size} at byte ${offset}`);
    }
    documents.push(deserialize(bytes.subarray(offset, offset + size), DESERIALIZE_OPTIONS));
    offset += size;
  }
  return documents;
};

/**
 * Decodes one BSON document into a mapping, or several concatenated documents into a
 * sequence of mappings.
 */
export const bsonDecoder: BinaryDecoder = {
  library: "bson",
  decode: async (bytes) => {
    const documents = readDocuments(bytes);
    return fromNative(documents.length === 1 ? documents[0] : documents, { scalarize });
  },
};
