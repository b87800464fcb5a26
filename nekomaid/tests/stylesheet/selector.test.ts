import { describe, expect, test } from "vitest";
import { cascade, formatSelector, selectorMatches, type PathEntry } from "../../src/stylesheet/index.js";
import type { Selector, SelectorPart } from "../../src/types/ast.js";
import type { ResolvedStyleRule } from "../../src/types/document.js";
import { integerValue, stringValue, type ResolvedValue } from "../../src/types/value.js";

function part(widget: string, whitelist: string[] = [], blacklist: string[] = []): SelectorPart {
  return { widget, whitelist, blacklist };
}

function selector(...parts: SelectorPart[]): Selector {
  return { hierarchy: parts };
}

function rule(sel: Selector, props: Record<string, ResolvedValue>): ResolvedStyleRule {
  return { selector: sel, properties: new Map(Object.entries(props)), origin: undefined };
}

const path: PathEntry[] = [
  { widget: "window", classes: [] },
  { widget: "panel", classes: ["sidebar"] },
  { widget: "button", classes: ["primary", "large"] },
];

describe("selectorMatches", () => {
  test("a single part matches the node itself", () => {
    expect(selectorMatches(path, selector(part("button")))).toBe(true);
    expect(selectorMatches(path, selector(part("panel")))).toBe(false);
  });

  test("the wildcard matches any widget", () => {
    expect(selectorMatches(path, selector(part("*")))).toBe(true);
  });

  test("whitelisted classes must all be present", () => {
    expect(selectorMatches(path, selector(part("button", ["primary", "large"])))).toBe(true);
    expect(selectorMatches(path, selector(part("button", ["primary", "small"])))).toBe(false);
  });

  test("blacklisted classes must be absent", () => {
    expect(selectorMatches(path, selector(part("button", [], ["disabled"])))).toBe(true);
    expect(selectorMatches(path, selector(part("button", [], ["large"])))).toBe(false);
  });

  test("hierarchies match direct parent chains ending at the node", () => {
    expect(selectorMatches(path, selector(part("panel", ["sidebar"]), part("button")))).toBe(true);
    expect(selectorMatches(path, selector(part("window"), part("button")))).toBe(false);
    expect(selectorMatches(path, selector(part("window"), part("*"), part("button")))).toBe(true);
  });

  test("a selector longer than the path never matches", () => {
    expect(selectorMatches(path.slice(2), selector(part("*"), part("button")))).toBe(false);
  });

  test("an empty selector never matches", () => {
    expect(selectorMatches(path, selector())).toBe(false);
  });

  test("formats selectors in source order", () => {
    expect(formatSelector(selector(part("panel", ["a"], ["b"]), part("*")))).toBe("panel +a !b > *");
  });
});

describe("cascade", () => {
  test("explicit properties win over every rule", () => {
    const rules = [rule(selector(part("button")), { color: stringValue("red") })];
    const effective = cascade(path, rules, new Map([["color", stringValue("blue")]]));
    expect(effective.get("color")).toEqual(stringValue("blue"));
  });

  test("later matching rules overwrite earlier ones", () => {
    const rules = [
      rule(selector(part("*")), { size: integerValue(1), weight: integerValue(400) }),
      rule(selector(part("button", ["primary"])), { size: integerValue(2) }),
      rule(selector(part("label")), { size: integerValue(3) }),
    ];
    const effective = cascade(path, rules, new Map());
    expect(Object.fromEntries(effective)).toEqual({ size: integerValue(2), weight: integerValue(400) });
  });

  test("keeps rule properties the node does not set", () => {
    const rules = [rule(selector(part("button")), { a: integerValue(1) })];
    const effective = cascade(path, rules, new Map([["b", integerValue(2)]]));
    expect([...effective.keys()]).toEqual(["a", "b"]);
  });
});
