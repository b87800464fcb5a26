import type { SourceSpan } from "./token.js";
import { DiagnosticCode, type Diagnostic } from "./diagnostic.js";

export class NekoMaidError extends Error {
  readonly span: SourceSpan;
  readonly code: DiagnosticCode;
  /** The message without the trailing position. */
  readonly detail: string;

  constructor(detail: string, span: SourceSpan, code: DiagnosticCode, options?: ErrorOptions) {
    super(`${detail} at line ${span.line}, column ${span.column}`, options);
    this.name = "NekoMaidError";
    this.span = span;
    this.code = code;
    this.detail = detail;
  }

  get line(): number {
    return this.span.line;
  }

  get column(): number {
    return this.span.column;
  }

  toDiagnostic(): Diagnostic {
    return { severity: "error", code: this.code, message: this.detail, span: this.span };
  }
}

export class LexError extends NekoMaidError {
  /** The offending character or source fragment. */
  readonly unexpected: string;

  constructor(detail: string, span: SourceSpan, unexpected: string) {
    super(detail, span, DiagnosticCode.LEX);
    this.name = "LexError";
    this.unexpected = unexpected;
  }
}

export class ParseError extends NekoMaidError {
  readonly expected: readonly string[];
  readonly found: string;

  constructor(
    expected: readonly string[],
    found: string,
    span: SourceSpan,
    options?: { detail?: string; code?: DiagnosticCode },
  ) {
    const detail = options?.detail ?? `Expected ${expected.join(" or ")} but found ${found}`;
    super(detail, span, options?.code ?? DiagnosticCode.PARSE);
    this.name = "ParseError";
    this.expected = expected;
    this.found = found;
  }
}

export type ResolutionErrorKind =
  | "unresolved-variable"
  | "undefined-style"
  | "unknown-widget";

const RESOLUTION_CODES: Record<ResolutionErrorKind, DiagnosticCode> = {
  "unresolved-variable": DiagnosticCode.UNRESOLVED_VARIABLE,
  "undefined-style": DiagnosticCode.UNDEFINED_STYLE,
  "unknown-widget": DiagnosticCode.UNKNOWN_WIDGET,
};

export class ResolutionError extends NekoMaidError {
  readonly kind: ResolutionErrorKind;
  /** The variable, style guide or widget name that failed to resolve. */
  readonly reference: string;

  constructor(kind: ResolutionErrorKind, reference: string, detail: string, span: SourceSpan) {
    super(detail, span, RESOLUTION_CODES[kind]);
    this.name = "ResolutionError";
    this.kind = kind;
    this.reference = reference;
  }
}

export class ConfigError extends Error {
  readonly path: string | undefined;

  constructor(message: string, path?: string, options?: ErrorOptions) {
    super(path !== undefined ? `${path}: ${message}` : message, options);
    this.name = "ConfigError";
    this.path = path;
  }
}
