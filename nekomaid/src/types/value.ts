import type { SourceSpan } from "./token.js";

export interface StringValue {
  kind: "string";
  value: string;
}

export interface IntegerValue {
  kind: "integer";
  value: number;
}

export interface FloatValue {
  kind: "float";
  value: number;
}

export interface PercentageValue {
  kind: "percentage";
  value: number; // 50% -> 50
}

export interface PixelsValue {
  kind: "pixels";
  value: number;
}

export interface BooleanValue {
  kind: "boolean";
  value: boolean;
}

export interface ColorValue {
  kind: "color";
  r: number;
  g: number;
  b: number;
  a: number;
}

export interface ListValue<T> {
  kind: "list";
  items: readonly T[];
}

export interface DictValue<T> {
  kind: "dict";
  entries: ReadonlyMap<string, T>;
}

export interface VariableRef {
  kind: "variable";
  name: string;
  span: SourceSpan;
}

export type LiteralValue =
  | StringValue
  | IntegerValue
  | FloatValue
  | PercentageValue
  | PixelsValue
  | BooleanValue
  | ColorValue;

/** A value as written in source; may still reference variables. */
export type Value = LiteralValue | ListValue<Value> | DictValue<Value> | VariableRef;

/** A value after variable substitution. */
export type ResolvedValue = LiteralValue | ListValue<ResolvedValue> | DictValue<ResolvedValue>;

export function stringValue(value: string): StringValue {
  return { kind: "string", value };
}

export function integerValue(value: number): IntegerValue {
  return { kind: "integer", value };
}

export function floatValue(value: number): FloatValue {
  return { kind: "float", value };
}

export function percentageValue(value: number): PercentageValue {
  return { kind: "percentage", value };
}

export function pixelsValue(value: number): PixelsValue {
  return { kind: "pixels", value };
}

export function booleanValue(value: boolean): BooleanValue {
  return { kind: "boolean", value };
}

export function colorValue(r: number, g: number, b: number, a: number = 255): ColorValue {
  return { kind: "color", r, g, b, a };
}

export function listValue<T>(items: readonly T[]): ListValue<T> {
  return { kind: "list", items };
}

export function dictValue<T>(entries: ReadonlyMap<string, T> | Iterable<[string, T]>): DictValue<T> {
  return { kind: "dict", entries: new Map(entries) };
}

export function variableRef(name: string, span: SourceSpan): VariableRef {
  return { kind: "variable", name, span };
}

/**
 * Decodes 3, 4, 6 or 8 hex digits into a color. Short forms duplicate each
 * nibble; alpha is 255 when absent. Returns undefined for any other input.
 */
export function colorFromHex(digits: string): ColorValue | undefined {
  if (!/^[0-9a-fA-F]+$/.test(digits)) return undefined;

  let full: string;
  if (digits.length === 3 || digits.length === 4) {
    full = [...digits].map((d) => d + d).join("");
  } else if (digits.length === 6 || digits.length === 8) {
    full = digits;
  } else {
    return undefined;
  }

  const byte = (i: number): number => parseInt(full.slice(i * 2, i * 2 + 2), 16);
  return colorValue(byte(0), byte(1), byte(2), full.length === 8 ? byte(3) : 255);
}

export function valuesEqual(a: Value, b: Value): boolean {
  switch (a.kind) {
    case "string":
    case "integer":
    case "float":
    case "percentage":
    case "pixels":
    case "boolean":
      return b.kind === a.kind && b.value === a.value;
    case "color":
      return b.kind === "color" && a.r === b.r && a.g === b.g && a.b === b.b && a.a === b.a;
    case "variable":
      return b.kind === "variable" && a.name === b.name;
    case "list": {
      if (b.kind !== "list" || a.items.length !== b.items.length) return false;
      return a.items.every((item, i) => {
        const other = b.items[i];
        return other !== undefined && valuesEqual(item, other);
      });
    }
    case "dict": {
      if (b.kind !== "dict" || a.entries.size !== b.entries.size) return false;
      for (const [key, value] of a.entries) {
        const other = b.entries.get(key);
        if (other === undefined || !valuesEqual(value, other)) return false;
      }
      return true;
    }
  }
}

function hexByte(n: number): string {
  return n.toString(16).padStart(2, "0");
}

function formatNumber(n: number, float: boolean): string {
  const text = String(n);
  return float && Number.isInteger(n) ? `${text}.0` : text;
}

/** Renders a value in source-like form for diagnostics and CLI output. */
export function formatValue(value: Value): string {
  switch (value.kind) {
    case "string":
      return JSON.stringify(value.value);
    case "integer":
      return formatNumber(value.value, false);
    case "float":
      return formatNumber(value.value, true);
    case "percentage":
      return `${value.value}%`;
    case "pixels":
      return `${value.value}px`;
    case "boolean":
      return String(value.value);
    case "color":
      return `#${hexByte(value.r)}${hexByte(value.g)}${hexByte(value.b)}${hexByte(value.a)}`;
    case "variable":
      return `$${value.name}`;
    case "list":
      return `[${value.items.map(formatValue).join(", ")}]`;
    case "dict": {
      const parts = [...value.entries].map(([k, v]) => `${k}: ${formatValue(v)}`);
      return `{${parts.join(", ")}}`;
    }
  }
}
