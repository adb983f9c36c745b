export type ToonNull = { readonly kind: "null" };
export type ToonBool = { readonly kind: "bool"; readonly value: boolean };
/** Numbers keep the textual form the adapter produced, so no digits are gained or lost. */
export type ToonNumber = { readonly kind: "number"; readonly text: string };
export type ToonText = { readonly kind: "text"; readonly value: string };

export interface MappingEntry {
  readonly key: string;
  readonly value: ToonValue;
}

export type ToonMapping = { readonly kind: "mapping"; readonly entries: readonly MappingEntry[] };
export type ToonSequence = { readonly kind: "sequence"; readonly items: readonly ToonValue[] };

export type ToonScalar = ToonNull | ToonBool | ToonNumber | ToonText;
export type ToonCollection = ToonMapping | ToonSequence;
export type ToonValue = ToonScalar | ToonCollection;

/**
 * A sequence of mappings that share one ordered key list and hold only scalars.
 * `rows[i][j]` is the value of `keys[j]` in record `i`.
 */
export interface FlatRecordSet {
  readonly keys: readonly string[];
  readonly rows: readonly (readonly ToonScalar[])[];
}

const NULL: ToonNull = { kind: "null" };

/**
 * Value constructors.
 * @example
 * toon.mapping(["name", toon.text("Alice")], ["age", toon.number(30)])
 */
export const toon = {
  null: (): ToonNull => NULL,
  bool: (value: boolean): ToonBool => ({ kind: "bool", value }),
  number: (value: number | bigint | string): ToonNumber => ({ kind: "number", text: String(value) }),
  text: (value: string): ToonText => ({ kind: "text", value }),
  mapping: (...entries: (readonly [string, ToonValue])[]): ToonMapping => ({
    kind: "mapping",
    entries: entries.map(([key, value]) => ({ key, value })),
  }),
  sequence: (...items: ToonValue[]): ToonSequence => ({ kind: "sequence", items }),
} as const;

export const isScalar = (value: ToonValue): value is ToonScalar =>
  value.kind !== "mapping" && value.kind !== "sequence";

/** True for a mapping without entries or a sequence without items. Scalars are never empty. */
export const isEmpty = (value: ToonValue): boolean => {
  if (value.kind === "mapping") return value.entries.length === 0;
  if (value.kind === "sequence") return value.items.length === 0;
  return false;
};

export const isNonEmptyCollection = (value: ToonValue): value is ToonCollection =>
  !isScalar(value) && !isEmpty(value);

const sameKeys = (a: readonly string[], entries: readonly MappingEntry[]) =>
  a.length === entries.length && entries.every((entry, index) => entry.key === a[index]);

/**
 * Classifies a value as a flat record set. Returns `undefined` for anything that is not a
 * sequence of scalar-only mappings with identical key order.
 */
export const asFlatRecordSet = (value: ToonValue): FlatRecordSet | undefined => {
  if (value.kind !== "sequence") return undefined;
  if (value.items.length === 0) return { keys: [], rows: [] };

  const first = value.items[0];
  if (first.kind !== "mapping") return undefined;
  const keys = first.entries.map((entry) => entry.key);

  const rows: ToonScalar[][] = [];
  for (const item of value.items) {
    if (item.kind !== "mapping" || !sameKeys(keys, item.entries)) return undefined;
    const row: ToonScalar[] = [];
    for (const entry of item.entries) {
      if (!isScalar(entry.value)) return undefined;
      row.push(entry.value);
    }
    rows.push(row);
  }
  return { keys, rows };
};

export interface FromNativeOptions {
  /**
   * Claims library-specific objects before the generic rules run. Return the text form to
   * render the object as a text scalar, or `undefined` to fall through.
   */
  scalarize?: (value: object) => string | undefined;
  /** Rewrites a mapping entry's raw value before it is converted. */
  entryValue?: (key: string, value: unknown) => unknown;
}

const toBase64 = (bytes: Uint8Array) => Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("base64");

type Frame =
  | { kind: "sequence"; source: readonly unknown[]; items: ToonValue[]; next: number; assign: (value: ToonValue) => void }
  | { kind: "mapping"; source: [string, unknown][]; entries: MappingEntry[]; next: number; assign: (value: ToonValue) => void };

/**
 * Converts a parser's JavaScript output into a value tree. Walks with an explicit stack so
 * deeply nested documents do not hit the call stack limit.
 */
export const fromNative = (input: unknown, options: FromNativeOptions = {}): ToonValue => {
  const { scalarize, entryValue } = options;
  const stack: Frame[] = [];
  let root: ToonValue = NULL;

  const convert = (value: unknown, assign: (value: ToonValue) => void) => {
    if (value === null || value === undefined) return assign(NULL);
    if (typeof value === "boolean") return assign(toon.bool(value));
    if (typeof value === "number" || typeof value === "bigint") return assign(toon.number(value));
    if (typeof value === "string") return assign(toon.text(value));
    if (typeof value !== "object") return assign(toon.text(String(value)));

    const claimed = scalarize?.(value);
    if (claimed !== undefined) return assign(toon.text(claimed));
    if (value instanceof Date) return assign(toon.text(value.toISOString()));
    if (value instanceof Uint8Array) return assign(toon.text(toBase64(value)));
    if (Array.isArray(value)) {
      stack.push({ kind: "sequence", source: value, items: [], next: 0, assign });
      return;
    }
    const pairs: [string, unknown][] =
      value instanceof Map
        ? Array.from(value.entries(), ([key, item]): [string, unknown] => [String(key), item])
        : Object.entries(value);
    stack.push({ kind: "mapping", source: pairs, entries: [], next: 0, assign });
  };

  convert(input, (value) => {
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
      const entries = frame.entries;
      const [key, raw] = frame.source[frame.next++];
      convert(entryValue === undefined ? raw : entryValue(key, raw), (value) => {
        entries.push({ key, value });
      });
    }
  }

  return root;
};
