import { describe, expect, test } from "vitest";
import { parseSource, parseTokens, tokenizeAll, LexError, ParseError } from "../../src/parser/index.js";
import type { SourceFile } from "../../src/types/ast.js";
import {
  booleanValue,
  colorValue,
  dictValue,
  floatValue,
  integerValue,
  listValue,
  percentageValue,
  pixelsValue,
  stringValue,
  valuesEqual,
  type Value,
} from "../../src/types/value.js";

function parse(source: string): SourceFile {
  return parseSource(source).file;
}

function parseError(source: string): ParseError {
  try {
    parseSource(source);
  } catch (err) {
    if (err instanceof ParseError) return err;
    throw err;
  }
  throw new Error(`expected a ParseError for ${JSON.stringify(source)}`);
}

function propertyOf(source: string, name: string): Value | undefined {
  return parse(source).layouts[0]?.properties.get(name)?.value;
}

describe("parser", () => {
  test("parses an empty file", () => {
    expect(parse("")).toEqual({ imports: [], variables: [], styles: [], layouts: [], widgets: [] });
  });

  test("parses a layout without a block", () => {
    const file = parse("layout spacer;");
    expect(file.layouts).toHaveLength(1);
    expect(file.layouts[0]?.widget).toBe("spacer");
    expect(file.layouts[0]?.properties.size).toBe(0);
  });

  test("parses properties of every value kind", () => {
    const file = parse(`
      layout div {
        title: "Hello";
        count: 3;
        ratio: 0.5;
        width: 50%;
        height: 100px;
        visible: true;
        color: #ab12cd34;
        align: center;
      }
    `);
    const props = file.layouts[0]?.properties;
    expect(props?.get("title")?.value).toEqual(stringValue("Hello"));
    expect(props?.get("count")?.value).toEqual(integerValue(3));
    expect(props?.get("ratio")?.value).toEqual(floatValue(0.5));
    expect(props?.get("width")?.value).toEqual(percentageValue(50));
    expect(props?.get("height")?.value).toEqual(pixelsValue(100));
    expect(props?.get("visible")?.value).toEqual(booleanValue(true));
    expect(props?.get("color")?.value).toEqual(colorValue(171, 18, 205, 52));
    expect(props?.get("align")?.value).toEqual(stringValue("center"));
  });

  test("records the span of a property name", () => {
    const file = parse("layout div {\n  width: 1px;\n}");
    expect(file.layouts[0]?.properties.get("width")?.span).toEqual({ line: 2, column: 3, offset: 15, length: 5 });
    expect(file.layouts[0]?.span.line).toBe(1);
  });

  test("parses lists and tolerates a trailing comma", () => {
    const withComma = propertyOf("layout div { items: [1, 2, 3,]; }", "items");
    const without = propertyOf("layout div { items: [1, 2, 3]; }", "items");
    expect(without).toEqual(listValue([integerValue(1), integerValue(2), integerValue(3)]));
    expect(withComma).toEqual(without);
    expect(propertyOf("layout div { items: []; }", "items")).toEqual(listValue([]));
  });

  test("parses heterogeneous and nested lists", () => {
    const value = propertyOf('layout div { items: ["a", [1px], {x: 1}]; }', "items");
    expect(value).toEqual(
      listValue([stringValue("a"), listValue([pixelsValue(1)]), dictValue([["x", integerValue(1)]])]),
    );
  });

  test("parses dicts", () => {
    const value = propertyOf("layout div { pad: {top: 1px, left: 2px,}; }", "pad");
    expect(value).toEqual(
      dictValue([
        ["top", pixelsValue(1)],
        ["left", pixelsValue(2)],
      ]),
    );
  });

  test("a repeated dict key fails whatever the values", () => {
    for (const source of ["layout div { p: {a: 1, a: 1}; }", "layout div { p: {a: 1, a: 2}; }"]) {
      const err = parseError(source);
      expect(err.detail).toBe("Duplicate property 'a' in dict");
      expect(err.code).toBe("duplicate-key");
    }
  });

  test("the block after a layout name is never a dict", () => {
    const file = parse("layout div { a: 1; }");
    expect(file.layouts[0]?.properties.get("a")?.value).toEqual(integerValue(1));
  });

  test("parses nested children with layout and with", () => {
    const file = parse(`
      layout panel {
        layout button { label: "OK"; }
        with label;
      }
    `);
    const panel = file.layouts[0];
    expect(panel?.children.map((c) => c.widget)).toEqual(["button", "label"]);
    expect(panel?.children[0]?.properties.get("label")?.value).toEqual(stringValue("OK"));
  });

  test("keywords are ordinary property names before a colon", () => {
    const file = parse("layout div { layout: 1; class: 2; var: 3; with: 4; }");
    expect([...(file.layouts[0]?.properties.keys() ?? [])]).toEqual(["layout", "class", "var", "with"]);
  });

  test("parses classes and ignores repeats", () => {
    const file = parse("layout button { class primary; class large; class primary; }");
    expect(file.layouts[0]?.classes).toEqual(["primary", "large"]);
  });

  test("parses variable declarations and references", () => {
    const file = parse(`
      var accent = #f00;
      layout div { var pad = 4px; color: $accent; margin: [$pad, $pad]; }
    `);
    expect(file.variables.map((v) => v.name)).toEqual(["accent"]);
    const div = file.layouts[0];
    expect(div?.variables.map((v) => v.name)).toEqual(["pad"]);
    expect(div?.properties.get("color")?.value).toMatchObject({ kind: "variable", name: "accent" });
  });

  test("a repeated variable in one block fails", () => {
    const err = parseError("var a = 1;\nvar a = 2;");
    expect(err.code).toBe("duplicate-variable");
    expect(err.message).toBe("Variable 'a' is already declared in this block at line 2, column 5");
  });

  test("the same variable name in different blocks is allowed", () => {
    const file = parse("var a = 1; layout div { var a = 2; }");
    expect(file.variables).toHaveLength(1);
    expect(file.layouts[0]?.variables).toHaveLength(1);
  });

  test("a repeated property keeps the last value and warns", () => {
    const { file, diagnostics } = parseSource("layout div { x: 1; x: 2; }");
    expect(file.layouts[0]?.properties.get("x")?.value).toEqual(integerValue(2));
    expect(diagnostics).toEqual([
      {
        severity: "warning",
        code: "duplicate-property",
        message: "Property 'x' is set more than once; the last value wins",
        span: { line: 1, column: 20, offset: 19, length: 1 },
      },
    ]);
  });

  test("parses imports", () => {
    const file = parse('import "base";\nimport "theme";');
    expect(file.imports.map((i) => i.path)).toEqual(["base", "theme"]);
    expect(file.imports[1]?.span.line).toBe(2);
  });

  test("parses style rules with selectors", () => {
    const file = parse("style button +primary !disabled { color: #fff; }");
    expect(file.styles).toHaveLength(1);
    expect(file.styles[0]?.selector).toEqual({
      hierarchy: [{ widget: "button", whitelist: ["primary"], blacklist: ["disabled"] }],
    });
  });

  test("nested with blocks extend the selector and follow their parent", () => {
    const file = parse(`
      style panel {
        padding: 2px;
        with * +title { bold: true; }
      }
    `);
    expect(file.styles.map((s) => s.selector.hierarchy.map((p) => p.widget))).toEqual([["panel"], ["panel", "*"]]);
  });

  test("empty style rules are dropped", () => {
    const file = parse("style panel { with label { size: 1; } }");
    expect(file.styles).toHaveLength(1);
    expect(file.styles[0]?.selector.hierarchy.map((p) => p.widget)).toEqual(["panel", "label"]);
  });

  test("reports what was expected and what was found", () => {
    const err = parseError("layout div { width: ; }");
    expect(err.expected).toEqual(["value"]);
    expect(err.found).toBe("';'");
    expect(err.message).toBe("Expected value but found ';' at line 1, column 21");
  });

  test("a missing colon points at the token after the name", () => {
    const err = parseError("layout div { width 10px; }");
    expect(err.detail).toBe("Expected ':' but found dimension 10px");
    expect(err.column).toBe(20);
  });

  test("an unclosed block reports end of input", () => {
    const err = parseError("layout div { a: 1;");
    expect(err.found).toBe("end of input");
  });

  test("rejects unknown top-level words", () => {
    const err = parseError("button;");
    expect(err.detail).toBe("Expected 'layout' or 'var' or 'style' or 'import' or 'def' but found identifier 'button'");
  });

  test("lexer errors propagate", () => {
    expect(() => parseSource("layout div { a: .5; }")).toThrow(LexError);
  });

  test("accepts any token iterable", () => {
    const tokens = tokenizeAll("layout a; layout b;");
    expect(parseTokens(tokens).file.layouts.map((l) => l.widget)).toEqual(["a", "b"]);
  });

  test("never mutates values shared between parses", () => {
    const a = parse("layout div { c: #abc; }");
    const b = parse("layout div { c: #abc; }");
    const va = a.layouts[0]?.properties.get("c")?.value;
    const vb = b.layouts[0]?.properties.get("c")?.value;
    expect(va !== undefined && vb !== undefined && valuesEqual(va, vb)).toBe(true);
    expect(va).not.toBe(vb);
  });
});

describe("widget definitions", () => {
  test("parses parameters, layout and output slot", () => {
    const file = parse('def card { var title = "x"; layout panel { class card; with body { output; } } }');
    const card = file.widgets[0];
    expect(card?.name).toBe("card");
    expect(card?.variables.map((v) => v.name)).toEqual(["title"]);
    expect(card?.layout.widget).toBe("panel");
    expect(card?.layout.classes).toEqual(["card"]);
    expect(card?.layout.output).toBe(false);
    expect(card?.layout.children[0]?.output).toBe(true);
    expect(file.layouts).toEqual([]);
  });

  test("output is only a keyword inside a definition", () => {
    expect(parseError("layout div { output; }").detail).toBe("Expected ':' but found ';'");
    expect(propertyOf("layout div { output: 1; }", "output")).toEqual(integerValue(1));
  });

  test("rejects a second layout", () => {
    const err = parseError("def w { layout a { output; } layout b { output; } }");
    expect(err.code).toBe("widget-definition");
    expect(err.detail).toBe("Widget 'w' cannot have more than one layout");
    expect(err.column).toBe(30);
  });

  test("rejects a layout without an output slot", () => {
    const err = parseError("def w { layout a; }");
    expect(err.detail).toBe("Layout of widget 'w' has no output slot");
    expect(err.column).toBe(5);
  });

  test("rejects more than one output slot", () => {
    const err = parseError("def w { layout a { with b { output; } with c { output; } } }");
    expect(err.detail).toBe("Widget 'w' has more than one output slot");
  });

  test("rejects a definition without a layout", () => {
    expect(parseError("def w { var x = 1; }").detail).toBe("Widget 'w' has no layout");
  });

  test("rejects a repeated definition", () => {
    const err = parseError("def w { layout a { output; } }\ndef w { layout b { output; } }");
    expect(err.detail).toBe("Widget 'w' is already defined");
    expect(err.line).toBe(2);
  });
});

describe("parser recovery", () => {
  test("records the error and resumes at the next declaration", () => {
    const { file, diagnostics } = parseSource("layout div { width 10px; }\nlayout span;", { recover: true });
    expect(file.layouts.map((l) => l.widget)).toEqual(["span"]);
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]).toMatchObject({
      severity: "error",
      code: "parse",
      message: "Expected ':' but found dimension 10px",
    });
  });

  test("skips stray top-level tokens", () => {
    const { file, diagnostics } = parseSource("foo; layout a; bar baz layout b;", { recover: true });
    expect(file.layouts.map((l) => l.widget)).toEqual(["a", "b"]);
    expect(diagnostics.map((d) => d.span.column)).toEqual([1, 16]);
  });

  test("does not resume inside a block", () => {
    const source = "layout a { x 1; layout inner; }\nlayout b;";
    const { file, diagnostics } = parseSource(source, { recover: true });
    expect(file.layouts.map((l) => l.widget)).toEqual(["b"]);
    expect(diagnostics).toHaveLength(1);
  });

  test("resumes after a broken widget definition", () => {
    const { file, diagnostics } = parseSource("def broken { layout a; }\nlayout b;", { recover: true });
    expect(file.layouts.map((l) => l.widget)).toEqual(["b"]);
    expect(file.widgets).toEqual([]);
    expect(diagnostics.map((d) => d.code)).toEqual(["widget-definition"]);
  });

  test("lexer errors still abort", () => {
    expect(() => parseSource("layout a { x: 1; }\nlayout b { y: @; }", { recover: true })).toThrow(LexError);
  });

  test("without recover the first error throws", () => {
    expect(() => parseSource("foo; layout a;")).toThrow(ParseError);
  });
});
