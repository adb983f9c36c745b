/** Bytes as accepted by the binary format adapters. */
export type BinaryInput = Uint8Array | ArrayBuffer | AsyncIterable<Uint8Array>;

const isAsyncIterable = (input: unknown): input is AsyncIterable<Uint8Array> =>
  typeof input === "object" && input !== null && Symbol.asyncIterator in input;

/**
 * Collects a binary input into one contiguous buffer. Streams (for example a file read stream)
 * are drained completely before decoding starts.
 */
export const readBinary = async (input: unknown): Promise<Uint8Array> => {
  if (input instanceof Uint8Array) return input;
  if (input instanceof ArrayBuffer) return new Uint8Array(input);
  if (isAsyncIterable(input)) {
    const chunks: Uint8Array[] = [];
    for await (const chunk of input) {
      chunks.push(chunk);
    }
    return Buffer.concat(chunks);
  }
  throw new TypeError(`Expected bytes (Uint8Array, ArrayBuffer or a byte stream), received ${typeof input}`);
};

export const toArrayBuffer = (bytes: Uint8Array): ArrayBuffer => {
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return buffer;
};
