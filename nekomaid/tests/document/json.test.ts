import { describe, expect, test } from "vitest";
import { loadDocument } from "../../src/compile.js";
import { documentToJSON, valueToJSON } from "../../src/document/json.js";
import { documentsEqual } from "../../src/document/equal.js";
import { deepFreeze } from "../../src/document/freeze.js";
import { colorValue, dictValue, integerValue, listValue } from "../../src/types/value.js";

describe("valueToJSON", () => {
  test("maps scalars to kind and value", () => {
    expect(valueToJSON(integerValue(3))).toEqual({ kind: "integer", value: 3 });
  });

  test("maps colors, lists and dicts", () => {
    expect(valueToJSON(colorValue(1, 2, 3))).toEqual({ kind: "color", r: 1, g: 2, b: 3, a: 255 });
    expect(valueToJSON(listValue([integerValue(1)]))).toEqual({
      kind: "list",
      items: [{ kind: "integer", value: 1 }],
    });
    expect(valueToJSON(dictValue([["x", integerValue(1)]]))).toEqual({
      kind: "dict",
      entries: { x: { kind: "integer", value: 1 } },
    });
  });
});

describe("documentToJSON", () => {
  test("serializes the whole document", () => {
    const doc = loadDocument("var n = 2;\nstyle div +a { x: 1; }\nlayout div { class a; y: $n; }");
    expect(documentToJSON(doc)).toEqual({
      imports: [],
      variables: { n: { kind: "integer", value: 2 } },
      styles: [{ selector: "div +a", origin: null, properties: { x: { kind: "integer", value: 1 } } }],
      roots: [
        {
          widget: "div",
          classes: ["a"],
          properties: { x: { kind: "integer", value: 1 }, y: { kind: "integer", value: 2 } },
          children: [],
          line: 3,
          column: 1,
        },
      ],
    });
  });
});

describe("documentsEqual", () => {
  test("ignores source positions", () => {
    const a = loadDocument("layout div { x: 1; }");
    const b = loadDocument("\n\n   layout   div {\n x: 1;\n}");
    expect(documentsEqual(a, b)).toBe(true);
  });

  test("detects property, child and style differences", () => {
    const base = loadDocument("style div { c: 1; } layout div { x: 1; with span; }");
    expect(documentsEqual(base, loadDocument("style div { c: 1; } layout div { x: 2; with span; }"))).toBe(false);
    expect(documentsEqual(base, loadDocument("style div { c: 1; } layout div { x: 1; }"))).toBe(false);
    expect(documentsEqual(base, loadDocument("style div { c: 2; } layout div { x: 1; with span; }"))).toBe(false);
    expect(documentsEqual(base, loadDocument("style div { c: 1; } layout div { x: 1; with span; }"))).toBe(true);
  });
});

describe("deepFreeze", () => {
  test("freezes nested objects and map values", () => {
    const inner = { v: 1 };
    const value = deepFreeze({ list: [inner], map: new Map([["k", { w: 2 }]]) });
    expect(Object.isFrozen(value.list)).toBe(true);
    expect(Object.isFrozen(inner)).toBe(true);
    expect(Object.isFrozen(value.map.get("k"))).toBe(true);
  });
});
