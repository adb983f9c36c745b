import { afterEach, describe, expect, it, vi } from "vitest";

import {
  ACCELERATOR_ADVISORY,
  ConversionError,
  MissingCapabilityError,
  TabularEngineName,
  UnsupportedFormatError,
  convertToToon,
  createConverter,
  fromNative,
  getTabularEngine,
  resolveFormat,
  serialize,
  type BinaryDecoder,
  type Capabilities,
} from "../src";

const csvWithRows = (rows: number) =>
  ["id,name,note", ...Array.from({ length: rows }, (_, index) => `${index},User_${index},tag#${index}`)].join("\n");

const csvRecords = (rows: number) =>
  Array.from({ length: rows }, (_, index) => ({ id: String(index), name: `User_${index}`, note: `tag#${index}` }));

const fakeParquet = (rows: Record<string, unknown>[]): BinaryDecoder => ({
  library: "test-parquet",
  countRows: () => BigInt(rows.length),
  decode: async () => fromNative(rows),
});

describe("format dispatch", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("rejects unknown format tags before any parsing", async () => {
    const failure = createConverter({ env: {} }).convert("a = 1", "toml");
    await expect(failure).rejects.toBeInstanceOf(UnsupportedFormatError);
    await expect(failure).rejects.toThrow(
      "Unsupported format: toml. Supported formats: json, yaml, xml, csv, avro, parquet, bson",
    );
  });

  it("matches format tags case-insensitively", async () => {
    expect(resolveFormat("JSON")).toBe("json");
    await expect(convertToToon('{"a": 1}', "Json")).resolves.toBe("a: 1");
  });

  it("fails with a missing capability when a binary decoder is absent", async () => {
    const converter = createConverter({ env: {}, capabilities: { decoders: {}, accelerators: {} } });
    const failure = converter.convert(new Uint8Array([5, 0, 0, 0, 0]), "bson");
    await expect(failure).rejects.toBeInstanceOf(MissingCapabilityError);
    await expect(failure).rejects.toThrow("BSON conversion requires the 'bson' package, which is not available");
  });

  it("wraps tabular engine failures in a conversion error", async () => {
    vi.spyOn(getTabularEngine(TabularEngineName.Columnar), "serialize").mockImplementation(() => {
      throw new Error("column buffer exhausted");
    });
    const converter = createConverter({ env: {} });
    await expect(converter.convert(csvWithRows(100), "csv")).rejects.toThrow(
      new ConversionError("CSV conversion failed: column buffer exhausted"),
    );
  });
});

describe("engine selection for tabular sources", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("keeps CSV below the threshold on the baseline engine", async () => {
    const columnar = vi.spyOn(getTabularEngine(TabularEngineName.Columnar), "serialize");
    const output = await createConverter({ env: {} }).convert(csvWithRows(99), "csv");

    expect(columnar).not.toHaveBeenCalled();
    expect(output).toBe(serialize(fromNative(csvRecords(99))));
  });

  it("moves CSV at the threshold to the tabular engine with identical output", async () => {
    const columnar = vi.spyOn(getTabularEngine(TabularEngineName.Columnar), "serialize");
    const output = await createConverter({ env: {} }).convert(csvWithRows(100), "csv");

    expect(columnar).toHaveBeenCalledTimes(1);
    expect(output).toBe(serialize(fromNative(csvRecords(100))));
  });

  it("uses the Parquet row count from metadata as the size proxy", async () => {
    const rows = Array.from({ length: 150 }, (_, index) => ({ id: BigInt(index), score: index / 2, ok: index % 2 === 0 }));
    const blocks = vi.spyOn(getTabularEngine(TabularEngineName.Blocks), "serialize");
    const capabilities: Capabilities = { decoders: { parquet: fakeParquet(rows) }, accelerators: { blocks: true } };

    const output = await createConverter({ env: {}, capabilities }).convert(new Uint8Array([1]), "parquet");

    expect(blocks).toHaveBeenCalledTimes(1);
    expect(output).toBe(serialize(fromNative(rows)));
    expect(output.split("\n").slice(0, 4)).toEqual(["-", "  id: 0", "  score: 0", "  ok: true"]);
  });

  it("falls back to the baseline engine and advises once when no accelerator is enabled", async () => {
    const advisories: string[] = [];
    const converter = createConverter({
      env: {},
      config: { accelerators: [] },
      onAdvisory: (message) => advisories.push(message),
    });

    const first = await converter.convert(csvWithRows(120), "csv");
    await converter.convert(csvWithRows(130), "csv");

    expect(first).toBe(serialize(fromNative(csvRecords(120))));
    expect(advisories).toEqual([ACCELERATOR_ADVISORY]);
  });

  it("can silence the advisory through the environment", async () => {
    const advisories: string[] = [];
    const converter = createConverter({
      env: { TOON_CONVERT_ADVISORIES: "false", TOON_CONVERT_ACCELERATORS: "none" },
      onAdvisory: (message) => advisories.push(message),
    });

    await converter.convert(csvWithRows(150), "csv");

    expect(converter.config.advisories).toBe(false);
    expect(advisories).toEqual([]);
  });

  it("honours a configured threshold", async () => {
    const columnar = vi.spyOn(getTabularEngine(TabularEngineName.Columnar), "serialize");
    await createConverter({ env: {}, config: { threshold: 2 } }).convert(csvWithRows(2), "csv");
    expect(columnar).toHaveBeenCalledTimes(1);
  });
});
