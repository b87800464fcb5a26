import type { Selector } from "./ast.js";
import type { SourceSpan } from "./token.js";
import type { ResolvedValue } from "./value.js";

export interface DocumentNode {
  readonly widget: string;
  readonly classes: readonly string[];
  /** Effective properties: style-guide defaults overlaid with explicit ones. */
  readonly properties: ReadonlyMap<string, ResolvedValue>;
  readonly children: readonly DocumentNode[];
  readonly span: SourceSpan;
}

export interface ResolvedStyleRule {
  readonly selector: Selector;
  readonly properties: ReadonlyMap<string, ResolvedValue>;
  /** Style guide the rule came from; undefined for the file's own rules. */
  readonly origin: string | undefined;
}

export interface StyleGuide {
  readonly name: string;
  readonly rules: readonly ResolvedStyleRule[];
  readonly variables: ReadonlyMap<string, ResolvedValue>;
}

export interface Document {
  readonly roots: readonly DocumentNode[];
  readonly variables: ReadonlyMap<string, ResolvedValue>;
  /** Rules in cascade order: imported guides first, then the file's own. */
  readonly styles: readonly ResolvedStyleRule[];
  readonly imports: readonly string[];
}
