import { describe, expect, it } from "vitest";

import { encodeToToon, serialize, serializeScalar, toon, type ToonValue } from "../src";

describe("TOON encoding", () => {
  it("renders a flat mapping one key per line", () => {
    expect(encodeToToon({ name: "Alice", age: 30, admin: true })).toBe("name: Alice\nage: 30\nadmin: true");
  });

  it("renders nested sequences of mappings behind dash lines", () => {
    const value = {
      users: [
        { name: "User1", roles: ["admin", "editor"] },
        { name: "User2", roles: [] },
      ],
    };
    expect(encodeToToon(value)).toBe(
      [
        "users:",
        "  -",
        "    name: User1",
        "    roles:",
        "      - admin",
        "      - editor",
        "  -",
        "    name: User2",
        "    roles: []",
      ].join("\n"),
    );
  });

  it("renders records with the dash on its own line and fields one level deeper", () => {
    const rows = [
      { name: "Dave", age: "40", role: "manager" },
      { name: "Eve", age: "28", role: "developer" },
    ];
    expect(encodeToToon(rows)).toBe(
      "-\n  name: Dave\n  age: 40\n  role: manager\n-\n  name: Eve\n  age: 28\n  role: developer",
    );
  });

  it("quotes scalars containing special characters without escaping them", () => {
    expect(serializeScalar(toon.text("a:b"))).toBe('"a:b"');
    expect(serializeScalar(toon.text("#tag"))).toBe('"#tag"');
    expect(serializeScalar(toon.text("{x}"))).toBe('"{x}"');
    expect(serializeScalar(toon.text("one\ntwo"))).toBe('"one\ntwo"');
    expect(serializeScalar(toon.text('he said "hi:there"'))).toBe('"he said "hi:there""');
    expect(serializeScalar(toon.text("plain words, no specials"))).toBe("plain words, no specials");
  });

  it("maps null and booleans to their literals", () => {
    expect(serializeScalar(toon.null())).toBe("null");
    expect(serializeScalar(toon.bool(true))).toBe("true");
    expect(serializeScalar(toon.bool(false))).toBe("false");
    expect(encodeToToon({ a: null, b: undefined })).toBe("a: null\nb: null");
  });

  it("renders empty collections inline", () => {
    expect(serialize(toon.mapping())).toBe("{}");
    expect(serialize(toon.sequence())).toBe("[]");
    expect(encodeToToon({ a: {}, b: [] })).toBe("a: {}\nb: []");
  });

  it("quotes an empty mapping used as a sequence item but not an empty sequence", () => {
    expect(encodeToToon([{}, [], 1])).toBe('- "{}"\n- []\n- 1');
  });

  it("renders nested sequences", () => {
    expect(encodeToToon([[1, 2], [3]])).toBe("-\n  - 1\n  - 2\n-\n  - 3");
  });

  it("renders top-level scalars on their own", () => {
    expect(serialize(toon.text("x:y"))).toBe('"x:y"');
    expect(serialize(toon.number("2.50"))).toBe("2.50");
    expect(encodeToToon("hello")).toBe("hello");
  });

  it("never quotes keys", () => {
    expect(encodeToToon({ "a:b": 1, "#c": "d" })).toBe("a:b: 1\n#c: d");
  });

  it("honours a custom indent unit", () => {
    expect(encodeToToon({ a: { b: [1] } }, { indent: "\t" })).toBe("a:\n\tb:\n\t\t- 1");
    expect(serialize(toon.mapping(["a", toon.mapping(["b", toon.number(1)])]), "    ")).toBe("a:\n    b: 1");
  });

  it("is deterministic", () => {
    const value: ToonValue = toon.mapping(
      ["list", toon.sequence(toon.mapping(["k", toon.text("v")]), toon.text("w"))],
      ["n", toon.number(1)],
    );
    expect(serialize(value)).toBe(serialize(value));
  });

  it("does not exhaust the call stack on deeply nested values", () => {
    const depth = 100_000;
    let value: ToonValue = toon.mapping(["a", toon.number(1)]);
    for (let level = 1; level < depth; level++) {
      value = toon.mapping(["a", value]);
    }
    const lines = serialize(value, "").split("\n");
    expect(lines).toHaveLength(depth);
    expect(lines[0]).toBe("a:");
    expect(lines[depth - 1]).toBe("a: 1");
  });
});
