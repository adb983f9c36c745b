import { fromNative, isNonEmptyCollection, type ToonCollection, type ToonValue } from "./value";

export interface EncodeOptions {
  /** Indent unit repeated once per nesting level. */
  indent?: string;
}

/**
 * Library defaults when emitting TOON text.
 * - 2-space indent to keep nested structures readable
 */
export const defaultToonOptions = {
  indent: "  ",
} as const satisfies Required<EncodeOptions>;

const NEEDS_QUOTES = /[:{}\n#]/;

const canonicalForm = (value: ToonValue): string => {
  switch (value.kind) {
    case "null":
      return "null";
    case "bool":
      return value.value ? "true" : "false";
    case "number":
      return value.text;
    case "text":
      return value.value;
    case "mapping":
      return "{}";
    case "sequence":
      return "[]";
  }
};

/**
 * Renders a leaf. Forms containing `:`, `{`, `}`, a newline or `#` are wrapped in double
 * quotes verbatim; inner quotes and backslashes are not escaped.
 */
export const serializeScalar = (value: ToonValue): string => {
  const form = canonicalForm(value);
  return NEEDS_QUOTES.test(form) ? `"${form}"` : form;
};

/** Inline form of a mapping value: empty collections print as bare `{}` / `[]`. */
const inlineMappingValue = (value: ToonValue): string => {
  if (value.kind === "mapping") return "{}";
  if (value.kind === "sequence") return "[]";
  return serializeScalar(value);
};

type Task = { readonly line: string } | { readonly node: ToonCollection; readonly level: number };

const expand = (node: ToonCollection, level: number, indentUnit: string): Task[] => {
  const pad = indentUnit.repeat(level);
  const tasks: Task[] = [];
  if (node.kind === "mapping") {
    for (const { key, value } of node.entries) {
      if (isNonEmptyCollection(value)) {
        tasks.push({ line: `${pad}${key}:` }, { node: value, level: level + 1 });
      } else {
        tasks.push({ line: `${pad}${key}: ${inlineMappingValue(value)}` });
      }
    }
    return tasks;
  }
  for (const item of node.items) {
    if (isNonEmptyCollection(item)) {
      tasks.push({ line: `${pad}-` }, { node: item, level: level + 1 });
    } else {
      tasks.push({ line: `${pad}- ${serializeScalar(item)}` });
    }
  }
  return tasks;
};

/**
 * Baseline TOON serializer. Its output is the reference every tabular engine must reproduce.
 *
 * @example
 * serialize(toon.mapping(["name", toon.text("Alice")], ["tags", toon.sequence(toon.text("a"))]))
 * // name: Alice
 * // tags:
 * //   - a
 */
export const serialize = (value: ToonValue, indentUnit: string = defaultToonOptions.indent): string => {
  if (value.kind === "mapping" && value.entries.length === 0) return "{}";
  if (value.kind === "sequence" && value.items.length === 0) return "[]";
  if (!isNonEmptyCollection(value)) return serializeScalar(value);

  const lines: string[] = [];
  const stack: Task[] = [{ node: value, level: 0 }];
  while (stack.length > 0) {
    const task = stack.pop();
    if (task === undefined) break;
    if ("line" in task) {
      lines.push(task.line);
      continue;
    }
    const children = expand(task.node, task.level, indentUnit);
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }
  return lines.join("\n");
};

/**
 * Encode any JSON-compatible value into TOON format.
 */
export const encodeToToon = (value: unknown, options: EncodeOptions = defaultToonOptions): string => {
  return serialize(fromNative(value), options.indent ?? defaultToonOptions.indent);
};
