import { XMLParser, XMLValidator } from "fast-xml-parser";

import { fromNative } from "../value";
import { expectText, type ParsedSource } from "./source";

// Attributes become "@name" keys and mixed text lands under "#text"; repeated elements become sequences.
const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@",
  textNodeName: "#text",
  parseTagValue: false,
  parseAttributeValue: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
  trimValues: true,
});

// Elements without content read as null; attribute values stay as written.
const emptyElementToNull = (key: string, value: unknown): unknown => {
  if (key.startsWith("@")) return value;
  if (value === "") return null;
  return Array.isArray(value) ? value.map((item: unknown) => (item === "" ? null : item)) : value;
};

export const parseXml = (input: unknown): ParsedSource => {
  const text = expectText(input, "XML");
  if (text.trim() === "") {
    throw new Error("no element found");
  }
  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new Error(`${msg} (line ${line}, column ${col})`);
  }
  const parsed: unknown = parser.parse(text);
  return { value: fromNative(parsed, { entryValue: emptyElementToNull }) };
};
