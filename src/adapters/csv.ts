import Papa from "papaparse";

import { countLineTerminators } from "../size-proxy";
import { toon, type MappingEntry, type ToonValue } from "../value";
import { expectText, type ParsedSource } from "./source";

/**
 * Parses CSV with a header row into a sequence of records whose cells stay text. Rows with
 * fewer cells than the header get `null` for the missing columns; surplus cells are dropped.
 */
export const parseCsv = (input: unknown): ParsedSource => {
  const text = expectText(input, "CSV");
  const sizeProxy = countLineTerminators(text);

  const result = Papa.parse<Record<string, string | undefined>>(text, {
    header: true,
    delimiter: ",",
    skipEmptyLines: true,
    dynamicTyping: false,
  });
  // Field-count mismatches are tolerated; broken quoting is not.
  const fatal = result.errors.find((error) => error.type === "Quotes");
  if (fatal) {
    throw new Error(`${fatal.message} (row ${fatal.row ?? "?"})`);
  }

  const fields = result.meta.fields ?? [];
  const records: ToonValue[] = result.data.map((row) => {
    const entries: MappingEntry[] = fields.map((field) => {
      const cell = row[field];
      return { key: field, value: cell === undefined ? toon.null() : toon.text(cell) };
    });
    return { kind: "mapping", entries };
  });
  return { value: { kind: "sequence", items: records }, sizeProxy };
};
