import { serializeScalar } from "./toon";
import { asFlatRecordSet, type FlatRecordSet, type ToonValue } from "./value";

export const TabularEngineName = {
  Columnar: "columnar",
  Blocks: "blocks",
} as const;

export type TabularEngineName = typeof TabularEngineName[keyof typeof TabularEngineName];

/**
 * A batch renderer for flat record sets. Output must match the baseline `serialize` of the
 * same sequence character for character, except that zero rows render as an empty string.
 */
export interface TabularEngine {
  readonly name: TabularEngineName;
  serialize(records: FlatRecordSet, indentUnit: string): string;
}

// A record without keys is an empty mapping, which the baseline prints as a quoted scalar item.
const KEYLESS_RECORD = `- ${serializeScalar({ kind: "mapping", entries: [] })}`;

const linePrefixes = (keys: readonly string[], indentUnit: string) => keys.map((key) => `${indentUnit}${key}: `);

/**
 * Renders each column to its lines across all rows first, then interleaves the columns row by
 * row behind the dash lines.
 */
const columnar: TabularEngine = {
  name: TabularEngineName.Columnar,
  serialize({ keys, rows }, indentUnit) {
    if (rows.length === 0) return "";
    if (keys.length === 0) return rows.map(() => KEYLESS_RECORD).join("\n");

    const prefixes = linePrefixes(keys, indentUnit);
    const columns = prefixes.map((prefix, column) => rows.map((row) => prefix + serializeScalar(row[column])));

    const width = keys.length + 1;
    const lines = new Array<string>(rows.length * width);
    for (let row = 0; row < rows.length; row++) {
      const base = row * width;
      lines[base] = "-";
      for (let column = 0; column < columns.length; column++) {
        lines[base + 1 + column] = columns[column][row];
      }
    }
    return lines.join("\n");
  },
};

/**
 * Precomputes the per-key prefixes once, then renders every record as one block.
 */
const blocks: TabularEngine = {
  name: TabularEngineName.Blocks,
  serialize({ keys, rows }, indentUnit) {
    if (rows.length === 0) return "";
    if (keys.length === 0) return rows.map(() => KEYLESS_RECORD).join("\n");

    const prefixes = linePrefixes(keys, indentUnit).map((prefix) => `\n${prefix}`);
    return rows
      .map((row) => {
        let block = "-";
        for (let column = 0; column < prefixes.length; column++) {
          block += prefixes[column] + serializeScalar(row[column]);
        }
        return block;
      })
      .join("\n");
  },
};

/** Tabular engines in selection priority order. */
export const TABULAR_ENGINES: readonly TabularEngine[] = [columnar, blocks];

export const getTabularEngine = (name: TabularEngineName): TabularEngine => {
  const engine = TABULAR_ENGINES.find((candidate) => candidate.name === name);
  if (!engine) {
    throw new Error(`Unknown tabular engine '${name}'`);
  }
  return engine;
};

/**
 * Runs a tabular engine on `value` when it is a flat record set; returns `undefined` otherwise.
 */
export const trySerializeFlat = (
  value: ToonValue,
  engine: TabularEngine,
  indentUnit: string,
): string | undefined => {
  const records = asFlatRecordSet(value);
  return records === undefined ? undefined : engine.serialize(records, indentUnit);
};
