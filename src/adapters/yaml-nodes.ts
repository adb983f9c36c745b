import { isAlias, isMap, isScalar, isSeq, type Document, type Pair, type Scalar } from "yaml";

import { fromNative, toon, type MappingEntry, type ToonValue } from "../value";

// Numbers written in plain decimal notation keep their source text ("1.0", 20-digit integers).
const DECIMAL_NUMBER = /^-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?$/;

const numberText = (scalar: Scalar<unknown>): string =>
  scalar.source !== undefined && DECIMAL_NUMBER.test(scalar.source) ? scalar.source : String(scalar.value);

const scalarValue = (scalar: Scalar<unknown>): ToonValue => {
  const { value } = scalar;
  if (typeof value === "number" || typeof value === "bigint") return toon.number(numberText(scalar));
  return fromNative(value);
};

const keyText = (key: unknown): string => {
  if (isScalar(key)) {
    const { value } = key;
    return typeof value === "number" || typeof value === "bigint" ? numberText(key) : String(value);
  }
  return String(key);
};

type Frame =
  | { kind: "sequence"; node: unknown; source: readonly unknown[]; items: ToonValue[]; next: number; assign: (value: ToonValue) => void }
  | {
      kind: "mapping";
      node: unknown;
      source: readonly Pair<unknown, unknown>[];
      entries: MappingEntry[];
      positions: Map<string, number>;
      next: number;
      assign: (value: ToonValue) => void;
    };

/**
 * Builds a value tree from a parsed document's node tree, so mapping order and number
 * text come straight from the source. A repeated key keeps its first position and its
 * last value. Walks with an explicit stack like {@link fromNative}.
 */
export const fromYamlDocument = (doc: Document.Parsed): ToonValue => {
  const stack: Frame[] = [];
  let root: ToonValue = toon.null();

  const convert = (input: unknown, assign: (value: ToonValue) => void) => {
    let node = input;
    if (isAlias(node)) {
      const target = node.resolve(doc);
      if (stack.some((frame) => frame.node === target)) {
        throw new Error(`Alias *${node.source} refers to its own ancestor`);
      }
      node = target;
    }
    if (isMap(node)) {
      stack.push({ kind: "mapping", node, source: node.items, entries: [], positions: new Map(), next: 0, assign });
      return;
    }
    if (isSeq(node)) {
      stack.push({ kind: "sequence", node, source: node.items, items: [], next: 0, assign });
      return;
    }
    assign(isScalar(node) ? scalarValue(node) : toon.null());
  };

  convert(doc.contents, (value) => {
    root = value;
  });

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (frame.next >= frame.source.length) {
      stack.pop();
      frame.assign(
        frame.kind === "sequence"
          ? { kind: "sequence", items: frame.items }
          : { kind: "mapping", entries: frame.entries },
      );
      continue;
    }
    if (frame.kind === "sequence") {
      const items = frame.items;
      convert(frame.source[frame.next++], (value) => {
        items.push(value);
      });
    } else {
      const { entries, positions } = frame;
      const pair = frame.source[frame.next++];
      const key = keyText(pair.key);
      convert(pair.value, (value) => {
        const position = positions.get(key);
        if (position === undefined) {
          positions.set(key, entries.length);
          entries.push({ key, value });
        } else {
          entries[position] = { key, value };
        }
      });
    }
  }

  return root;
};
