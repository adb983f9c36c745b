import avro from "avsc";

import type { BinaryDecoder } from "../capabilities";
import { fromNative } from "../value";

const compareBigInt = (a: bigint, b: bigint) => (a === b ? 0 : a < b ? -1 : 1);

// avsc's own long type rejects values beyond Number.MAX_SAFE_INTEGER; this one decodes to bigint.
const BIGINT_LONG: unknown = avro.types.LongType.__with({
  fromBuffer: (buf: Buffer) => buf.readBigInt64LE(),
  toBuffer: (n: bigint) => {
    const buf = Buffer.alloc(8);
    buf.writeBigInt64LE(n);
    return buf;
  },
  fromJSON: BigInt,
  toJSON: Number,
  isValid: (n: unknown) => typeof n === "bigint",
  compare: compareBigInt,
});

/** Builds a type for `schema` whose longs read and write as `bigint`. */
export const bigIntLongType = (schema: avro.Schema): avro.Type => {
  if (!(BIGINT_LONG instanceof avro.Type)) {
    throw new TypeError("avsc did not return a long type");
  }
  return avro.Type.forSchema(schema, { registry: { long: BIGINT_LONG } });
};

/**
 * Decodes an Avro object container file into the sequence of its records.
 */
export const avroDecoder: BinaryDecoder = {
  library: "avsc",
  decode: (bytes) =>
    new Promise((resolve, reject) => {
      const records: unknown[] = [];
      let sawHeader = false;
      const decoder = new avro.streams.BlockDecoder({ parseHook: bigIntLongType });
      decoder.on("metadata", () => {
        sawHeader = true;
      });
      decoder.on("data", (record: unknown) => {
        records.push(record);
      });
      decoder.on("error", reject);
      decoder.on("end", () => {
        if (!sawHeader) {
          reject(new Error("missing or truncated container header"));
          return;
        }
        resolve(fromNative(records));
      });
      decoder.end(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength));
    }),
};
