import type { Document, DocumentNode, ResolvedStyleRule } from "../types/document.js";
import type { ResolvedValue } from "../types/value.js";
import { formatSelector } from "../stylesheet/selector.js";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export function valueToJSON(value: ResolvedValue): JsonValue {
  switch (value.kind) {
    case "color":
      return { kind: "color", r: value.r, g: value.g, b: value.b, a: value.a };
    case "list":
      return { kind: "list", items: value.items.map(valueToJSON) };
    case "dict":
      return { kind: "dict", entries: mapToJSON(value.entries) };
    default:
      return { kind: value.kind, value: value.value };
  }
}

function mapToJSON(map: ReadonlyMap<string, ResolvedValue>): { [key: string]: JsonValue } {
  const out: { [key: string]: JsonValue } = {};
  for (const [key, value] of map) {
    out[key] = valueToJSON(value);
  }
  return out;
}

function nodeToJSON(node: DocumentNode): JsonValue {
  return {
    widget: node.widget,
    classes: [...node.classes],
    properties: mapToJSON(node.properties),
    children: node.children.map(nodeToJSON),
    line: node.span.line,
    column: node.span.column,
  };
}

function ruleToJSON(rule: ResolvedStyleRule): JsonValue {
  return {
    selector: formatSelector(rule.selector),
    origin: rule.origin ?? null,
    properties: mapToJSON(rule.properties),
  };
}

/** Plain-JSON form of a document, for tooling and `nekomaid print`. */
export function documentToJSON(document: Document): JsonValue {
  return {
    imports: [...document.imports],
    variables: mapToJSON(document.variables),
    styles: document.styles.map(ruleToJSON),
    roots: document.roots.map(nodeToJSON),
  };
}
