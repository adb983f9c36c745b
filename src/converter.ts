import { parseCsv } from "./adapters/csv";
import { parseJson } from "./adapters/json";
import { readBinary, type BinaryInput } from "./adapters/binary";
import type { ParsedSource } from "./adapters/source";
import { parseXml } from "./adapters/xml";
import { parseYaml } from "./adapters/yaml";
import { BinaryFormat, DECODER_LIBRARIES, detectCapabilities, type Capabilities } from "./capabilities";
import { resolveConfig, type ConvertConfig } from "./config";
import { createNoticeBoard, renderToon } from "./engine-selector";
import {
  ConversionError,
  MissingCapabilityError,
  ToonConvertError,
  UnsupportedFormatError,
  describeError,
} from "./errors";
import { createLogger } from "./logger";
import { rowCountToProxy } from "./size-proxy";

const log = createLogger("convert");

export const SourceFormat = {
  Json: "json",
  Yaml: "yaml",
  Xml: "xml",
  Csv: "csv",
  Avro: "avro",
  Parquet: "parquet",
  Bson: "bson",
} as const;

export type SourceFormat = typeof SourceFormat[keyof typeof SourceFormat];

export const SUPPORTED_FORMATS: readonly SourceFormat[] = Object.values(SourceFormat);

const FORMAT_TAGS: ReadonlySet<string> = new Set(SUPPORTED_FORMATS);
const BINARY_FORMATS: ReadonlySet<string> = new Set(Object.values(BinaryFormat));

const isSourceFormat = (tag: string): tag is SourceFormat => FORMAT_TAGS.has(tag);

const isBinaryFormat = (format: SourceFormat): format is BinaryFormat => BINARY_FORMATS.has(format);

/** Resolves a format tag case-insensitively. */
export const resolveFormat = (tag: string): SourceFormat => {
  const normalized = tag.toLowerCase();
  if (!isSourceFormat(normalized)) {
    throw new UnsupportedFormatError(
      `Unsupported format: ${tag}. Supported formats: ${SUPPORTED_FORMATS.join(", ")}`,
      { format: tag },
    );
  }
  return normalized;
};

const TEXT_PARSERS: Record<Exclude<SourceFormat, BinaryFormat>, (input: unknown) => ParsedSource> = {
  [SourceFormat.Json]: parseJson,
  [SourceFormat.Yaml]: parseYaml,
  [SourceFormat.Xml]: parseXml,
  [SourceFormat.Csv]: parseCsv,
};

export interface ConverterOptions {
  /** Explicit configuration; merged over environment overrides and defaults. */
  config?: Partial<ConvertConfig>;
  /** Environment consulted for configuration overrides. Defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
  /** Capability table. Detected once, on first use, when omitted. */
  capabilities?: Capabilities;
  /** Receives advisory notices. Defaults to `console.warn`. */
  onAdvisory?: (message: string) => void;
}

export interface Converter {
  readonly config: ConvertConfig;
  /**
   * Converts `input` in the given format to TOON text. Fails with `UnsupportedFormatError`,
   * `MissingCapabilityError` or `ConversionError`; never returns partial output.
   */
  convert(input: unknown, format: string): Promise<string>;
}

export const createConverter = (options: ConverterOptions = {}): Converter => {
  const config = resolveConfig(options.config, options.env);
  const notices = createNoticeBoard(options.onAdvisory ?? ((message) => console.warn(message)));
  let capabilities: Promise<Capabilities> | undefined =
    options.capabilities === undefined ? undefined : Promise.resolve(options.capabilities);

  // A failed detection is not cached; the next conversion tries again.
  const loadCapabilities = (): Promise<Capabilities> => {
    capabilities ??= detectCapabilities(config).catch((error: unknown) => {
      capabilities = undefined;
      throw error;
    });
    return capabilities;
  };

  const parseBinary = async (format: BinaryFormat, input: unknown, table: Capabilities): Promise<ParsedSource> => {
    const decoder = table.decoders[format];
    if (decoder === undefined) {
      throw new MissingCapabilityError(
        `${format.toUpperCase()} conversion requires the '${DECODER_LIBRARIES[format]}' package, which is not available`,
        { format },
      );
    }
    const bytes = await readBinary(input);
    const sizeProxy = decoder.countRows === undefined ? undefined : rowCountToProxy(decoder.countRows(bytes));
    return { value: await decoder.decode(bytes), sizeProxy };
  };

  const parseSource = async (format: SourceFormat, input: unknown, table: Capabilities): Promise<ParsedSource> => {
    try {
      return isBinaryFormat(format) ? await parseBinary(format, input, table) : TEXT_PARSERS[format](input);
    } catch (error) {
      if (error instanceof ToonConvertError) throw error;
      log("%s source rejected: %s", format, describeError(error));
      throw new ConversionError(`Invalid ${format.toUpperCase()}: ${describeError(error)}`, { format, cause: error });
    }
  };

  return {
    config,
    async convert(input, tag) {
      const format = resolveFormat(tag);
      const table = await loadCapabilities().catch((error: unknown) => {
        log("capability detection failed: %s", describeError(error));
        throw new ConversionError(`${format.toUpperCase()} conversion failed: ${describeError(error)}`, {
          format,
          cause: error,
        });
      });
      const source = await parseSource(format, input, table);
      try {
        return renderToon(source.value, {
          sizeProxy: source.sizeProxy,
          accelerators: table.accelerators,
          config,
          notices,
        });
      } catch (error) {
        throw new ConversionError(`${format.toUpperCase()} conversion failed: ${describeError(error)}`, {
          format,
          cause: error,
        });
      }
    },
  };
};

let defaultConverter: Converter | undefined;

/**
 * Converts `input` from `format` to TOON text with the process-wide default converter.
 *
 * @example
 * await convertToToon('{"name": "Alice", "age": 30}', "json") // "name: Alice\nage: 30"
 */
export const convertToToon = (input: unknown, format: string): Promise<string> => {
  defaultConverter ??= createConverter();
  return defaultConverter.convert(input, format);
};

export const jsonToToon = (input: unknown): Promise<string> => convertToToon(input, SourceFormat.Json);
export const yamlToToon = (input: unknown): Promise<string> => convertToToon(input, SourceFormat.Yaml);
export const xmlToToon = (input: string): Promise<string> => convertToToon(input, SourceFormat.Xml);
export const csvToToon = (input: string): Promise<string> => convertToToon(input, SourceFormat.Csv);
export const avroToToon = (input: BinaryInput): Promise<string> => convertToToon(input, SourceFormat.Avro);
export const parquetToToon = (input: BinaryInput): Promise<string> => convertToToon(input, SourceFormat.Parquet);
export const bsonToToon = (input: BinaryInput): Promise<string> => convertToToon(input, SourceFormat.Bson);
