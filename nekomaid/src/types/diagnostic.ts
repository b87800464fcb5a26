import type { SourceSpan } from "./token.js";

export type Severity = "error" | "warning";

export const DiagnosticCode = {
  LEX: "lex",
  PARSE: "parse",
  DUPLICATE_KEY: "duplicate-key",
  DUPLICATE_PROPERTY: "duplicate-property",
  DUPLICATE_VARIABLE: "duplicate-variable",
  UNRESOLVED_VARIABLE: "unresolved-variable",
  UNDEFINED_STYLE: "undefined-style",
  UNKNOWN_WIDGET: "unknown-widget",
  WIDGET_DEFINITION: "widget-definition",
} as const;

export type DiagnosticCode = (typeof DiagnosticCode)[keyof typeof DiagnosticCode];

export interface Diagnostic {
  severity: Severity;
  code: DiagnosticCode;
  message: string;
  span: SourceSpan;
}

export function hasErrors(diagnostics: ReadonlyArray<Diagnostic>): boolean {
  return diagnostics.some((d) => d.severity === "error");
}

/** Renders `origin:line:column severity[code]: message`. */
export function formatDiagnostic(diagnostic: Diagnostic, origin: string = "<source>"): string {
  const { line, column } = diagnostic.span;
  return `${origin}:${line}:${column} ${diagnostic.severity}[${diagnostic.code}]: ${diagnostic.message}`;
}
