import type { Document } from "./types/document.js";
import type { SourceFile } from "./types/ast.js";
import { hasErrors, type Diagnostic } from "./types/diagnostic.js";
import { NekoMaidError } from "./types/errors.js";
import { parseSource, type ParseOptions, type ParseResult } from "./parser/index.js";
import { resolve, type ResolveOptions } from "./resolver/index.js";

export interface CompileOptions extends ParseOptions, ResolveOptions {}

export type CompileResult =
  | { ok: true; document: Document; file: SourceFile; diagnostics: Diagnostic[] }
  | { ok: false; diagnostics: Diagnostic[] };

/**
 * Parse and resolve in one step. Throws the first LexError, ParseError or
 * ResolutionError. Warnings are dropped; use `compile` to see them.
 */
export function loadDocument(source: string, options: CompileOptions = {}): Document {
  const { file } = parseSource(source, { ...options, recover: false });
  return resolve(file, options);
}

/**
 * Parse and resolve without throwing for language errors. A file with any
 * error diagnostic is never resolved.
 */
export function compile(source: string, options: CompileOptions = {}): CompileResult {
  let parsed: ParseResult;
  try {
    parsed = parseSource(source, options);
  } catch (err) {
    if (err instanceof NekoMaidError) {
      return { ok: false, diagnostics: [err.toDiagnostic()] };
    }
    throw err;
  }

  const { file, diagnostics } = parsed;
  if (hasErrors(diagnostics)) {
    return { ok: false, diagnostics };
  }

  try {
    const document = resolve(file, options);
    return { ok: true, document, file, diagnostics };
  } catch (err) {
    if (err instanceof NekoMaidError) {
      return { ok: false, diagnostics: [...diagnostics, err.toDiagnostic()] };
    }
    throw err;
  }
}
