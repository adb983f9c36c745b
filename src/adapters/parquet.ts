import { parquetMetadata, parquetRead } from "hyparquet";

import type { BinaryDecoder } from "../capabilities";
import { fromNative } from "../value";
import { toArrayBuffer } from "./binary";

export const parquetDecoder: BinaryDecoder = {
  library: "hyparquet",
  countRows: (bytes) => parquetMetadata(toArrayBuffer(bytes)).num_rows,
  decode: async (bytes) => {
    let rows: unknown = [];
    await parquetRead({
      file: toArrayBuffer(bytes),
      rowFormat: "object",
      onComplete: (data: unknown) => {
        rows = data;
      },
    });
    return fromNative(rows);
  },
};
