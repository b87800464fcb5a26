import chalk, { type ChalkInstance } from "chalk";
import { TokenKind, type Token } from "../types/token.js";
import { formatDiagnostic, type Diagnostic } from "../types/diagnostic.js";
import { DocumentEventKind, type DocumentEvent } from "../types/events.js";
import type { JsonValue } from "../document/json.js";

function tokenText(token: Token): string {
  switch (token.kind) {
    case TokenKind.EOF:
      return "";
    case TokenKind.STRING:
      return JSON.stringify(token.value);
    case TokenKind.DIMENSION:
      return `${token.value}${token.unit}`;
    case TokenKind.COLOR:
      return `#${token.value}`;
    case TokenKind.VARIABLE:
      return `$${token.value}`;
    default:
      return token.value;
  }
}

/** One line per token: `line:column kind text`. */
export function formatToken(token: Token): string {
  const position = `${token.span.line}:${token.span.column}`;
  return `${position.padEnd(8)}${token.kind.padEnd(12)}${tokenText(token)}`.trimEnd();
}

export function formatDiagnostics(
  diagnostics: readonly Diagnostic[],
  origin: string,
  c: ChalkInstance = chalk,
): string[] {
  return diagnostics.map((d) => {
    const line = formatDiagnostic(d, origin);
    return d.severity === "error" ? c.red(line) : c.yellow(line);
  });
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? "" : "s"}`;
}

/** `2 errors, 1 warning` */
export function summarize(diagnostics: readonly Diagnostic[]): string {
  const errors = diagnostics.filter((d) => d.severity === "error").length;
  return `${plural(errors, "error")}, ${plural(diagnostics.length - errors, "warning")}`;
}

export function diagnosticsToJSON(origin: string, diagnostics: readonly Diagnostic[]): JsonValue {
  return {
    origin,
    ok: !diagnostics.some((d) => d.severity === "error"),
    diagnostics: diagnostics.map((d) => ({
      severity: d.severity,
      code: d.code,
      message: d.message,
      line: d.span.line,
      column: d.span.column,
    })),
  };
}

export function formatEvent(event: DocumentEvent, c: ChalkInstance = chalk): string {
  const time = c.dim(`[${event.timestamp.toISOString().slice(11, 19)}]`);

  switch (event.kind) {
    case DocumentEventKind.RELOAD_STARTED:
      return `${time} ${c.dim(`reloading ${event.origin}`)}`;
    case DocumentEventKind.DOCUMENT_SWAPPED: {
      if (event.data.changed !== true) {
        return `${time} ${c.dim(`no changes in ${event.origin} (generation ${event.generation})`)}`;
      }
      const roots = typeof event.data.roots === "number" ? event.data.roots : 0;
      return `${time} ${c.green(`loaded ${event.origin}: generation ${event.generation}, ${plural(roots, "root")}`)}`;
    }
    case DocumentEventKind.RELOAD_FAILED:
      return `${time} ${c.red(`reload of ${event.origin} failed; keeping generation ${event.generation}`)}`;
  }
}
