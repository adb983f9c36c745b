export {
  convertToToon,
  createConverter,
  resolveFormat,
  jsonToToon,
  yamlToToon,
  xmlToToon,
  csvToToon,
  avroToToon,
  parquetToToon,
  bsonToToon,
  SourceFormat,
  SUPPORTED_FORMATS,
  type Converter,
  type ConverterOptions,
} from "./converter";

export {
  toon,
  fromNative,
  isScalar,
  isEmpty,
  asFlatRecordSet,
  type ToonValue,
  type ToonScalar,
  type ToonCollection,
  type ToonMapping,
  type ToonSequence,
  type MappingEntry,
  type FlatRecordSet,
  type FromNativeOptions,
} from "./value";

export { serialize, serializeScalar, encodeToToon, defaultToonOptions } from "./toon";

export type { EncodeOptions } from "./toon";

export { TABULAR_ENGINES, TabularEngineName, getTabularEngine, trySerializeFlat, type TabularEngine } from "./tabular";

export {
  selectEngine,
  renderToon,
  createNoticeBoard,
  BaselineReason,
  ACCELERATOR_ADVISORY,
  type EngineSelection,
  type SelectionInput,
  type RenderOptions,
  type NoticeBoard,
} from "./engine-selector";

export {
  detectCapabilities,
  acceleratorsFromConfig,
  BinaryFormat,
  type BinaryDecoder,
  type Capabilities,
  type AcceleratorTable,
} from "./capabilities";

export { countLineTerminators, rowCountToProxy } from "./size-proxy";

export { resolveConfig, defaultConvertConfig, ConfigEnv, type ConvertConfig } from "./config";

export type { BinaryInput } from "./adapters/binary";

export {
  ToonConvertError,
  ConversionError,
  UnsupportedFormatError,
  MissingCapabilityError,
  ConfigError,
} from "./errors";
