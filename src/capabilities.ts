import { defaultConvertConfig, type ConvertConfig } from "./config";
import { createLogger } from "./logger";
import { TABULAR_ENGINES, type TabularEngineName } from "./tabular";
import type { ToonValue } from "./value";

const log = createLogger("capabilities");

export const BinaryFormat = {
  Avro: "avro",
  Parquet: "parquet",
  Bson: "bson",
} as const;

export type BinaryFormat = typeof BinaryFormat[keyof typeof BinaryFormat];

/**
 * A decoding library for a binary format. Formats with a decoder in the capability table can
 * be converted; formats without one fail with `MissingCapabilityError`.
 */
export interface BinaryDecoder {
  /** npm package the decoder is backed by, used in messages. */
  readonly library: string;
  decode(bytes: Uint8Array): Promise<ToonValue>;
  /** Reads the row count from file metadata without decoding column data. */
  countRows?(bytes: Uint8Array): number | bigint;
}

export type AcceleratorTable = Partial<Record<TabularEngineName, boolean>>;

export interface Capabilities {
  readonly decoders: Partial<Record<BinaryFormat, BinaryDecoder>>;
  /** Which tabular engines may run. Engines missing from the table are unavailable. */
  readonly accelerators: AcceleratorTable;
}

/** Library each binary decoder needs, for messages about missing capabilities. */
export const DECODER_LIBRARIES: Record<BinaryFormat, string> = {
  [BinaryFormat.Avro]: "avsc",
  [BinaryFormat.Parquet]: "hyparquet",
  [BinaryFormat.Bson]: "bson",
};

// Each decoder module imports its library statically, so a failed import means the library is absent.
const DECODER_LOADERS: Record<BinaryFormat, () => Promise<BinaryDecoder>> = {
  [BinaryFormat.Avro]: async () => (await import("./adapters/avro")).avroDecoder,
  [BinaryFormat.Parquet]: async () => (await import("./adapters/parquet")).parquetDecoder,
  [BinaryFormat.Bson]: async () => (await import("./adapters/bson")).bsonDecoder,
};

const isModuleNotFound = (error: unknown) =>
  error instanceof Error &&
  "code" in error &&
  (error.code === "ERR_MODULE_NOT_FOUND" || error.code === "MODULE_NOT_FOUND");

export const acceleratorsFromConfig = (config: Pick<ConvertConfig, "accelerators">): AcceleratorTable => {
  const enabled = new Set<TabularEngineName>(config.accelerators);
  const table: AcceleratorTable = {};
  for (const engine of TABULAR_ENGINES) {
    table[engine.name] = enabled.has(engine.name);
  }
  return table;
};

/**
 * Builds the capability table once, at startup: loads every binary decoder and enables the
 * accelerators the configuration allows.
 */
export const detectCapabilities = async (
  config: Pick<ConvertConfig, "accelerators"> = defaultConvertConfig,
): Promise<Capabilities> => {
  const decoders: Partial<Record<BinaryFormat, BinaryDecoder>> = {};
  for (const format of Object.values(BinaryFormat)) {
    try {
      decoders[format] = await DECODER_LOADERS[format]();
    } catch (error) {
      if (!isModuleNotFound(error)) throw error;
      log("%s decoding unavailable: %s is not installed", format, DECODER_LIBRARIES[format]);
    }
  }
  const accelerators = acceleratorsFromConfig(config);
  log("decoders: %o, accelerators: %o", Object.keys(decoders), accelerators);
  return { decoders, accelerators };
};
