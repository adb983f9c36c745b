import { parseDocument } from "yaml";

import { fromNative } from "../value";
import type { ParsedSource } from "./source";
import { fromYamlDocument } from "./yaml-nodes";

/**
 * Accepts YAML text or an already-parsed value. Text keeps its key order and the source
 * text of plain decimal numbers.
 */
export const parseYaml = (input: unknown): ParsedSource => {
  if (typeof input !== "string") return { value: fromNative(input) };
  const doc = parseDocument(input);
  const [error] = doc.errors;
  if (error) throw error;
  return { value: fromYamlDocument(doc) };
};
