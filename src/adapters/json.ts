import { parseDocument } from "yaml";

import { fromNative } from "../value";
import type { ParsedSource } from "./source";
import { fromYamlDocument } from "./yaml-nodes";

/**
 * Accepts JSON text or a value that has already been parsed. Text is read through the
 * `yaml` JSON schema rather than `JSON.parse`, which would reorder integer-like keys and
 * round integers beyond 2^53.
 */
export const parseJson = (input: unknown): ParsedSource => {
  if (typeof input !== "string") return { value: fromNative(input) };
  if (input.trim() === "") {
    throw new Error("Unexpected end of JSON input");
  }
  const doc = parseDocument(input, { schema: "json", uniqueKeys: false });
  const [error] = doc.errors;
  if (error) throw error;
  return { value: fromYamlDocument(doc) };
};
