import type { Document, StyleGuide } from "../types/document.js";
import type { SourceFile } from "../types/ast.js";
import type { Diagnostic } from "../types/diagnostic.js";
import { NekoMaidError } from "../types/errors.js";
import { DocumentEventKind } from "../types/events.js";
import { compile, type CompileOptions } from "../compile.js";
import { resolve } from "../resolver/index.js";
import { documentsEqual } from "../document/equal.js";
import { DocumentEventEmitter } from "../events/emitter.js";

export interface DocumentStoreOptions extends CompileOptions {
  /** Label used in events when `reload` is called without one. */
  origin?: string;
}

export type ReloadResult =
  | {
      ok: true;
      document: Document;
      generation: number;
      /** False when the new document is structurally equal to the old one. */
      changed: boolean;
      diagnostics: Diagnostic[];
    }
  | {
      ok: false;
      /** The document still in place, if any. */
      document: Document | undefined;
      generation: number;
      diagnostics: Diagnostic[];
    };

/**
 * Holds the live document for hot-reload. Each successful reload builds a
 * new frozen Document and replaces the old one with a single assignment, so
 * a reader always sees either the whole old tree or the whole new one. A
 * failed reload leaves the current document untouched.
 */
export class DocumentStore {
  readonly events = new DocumentEventEmitter();

  private snapshot: Document | undefined;
  private file: SourceFile | undefined;
  /** Parse warnings of `file`; re-resolving does not re-parse, so they carry over. */
  private warnings: Diagnostic[] = [];
  private generation = 0;
  private options: CompileOptions;
  private readonly origin: string;

  constructor(options: DocumentStoreOptions = {}) {
    const { origin, ...compileOptions } = options;
    this.origin = origin ?? "<source>";
    this.options = { ...compileOptions, styleGuides: copyGuides(compileOptions.styleGuides) };
  }

  current(): Document | undefined {
    return this.snapshot;
  }

  get currentGeneration(): number {
    return this.generation;
  }

  reload(source: string, origin: string = this.origin): ReloadResult {
    this.emit(DocumentEventKind.RELOAD_STARTED, origin, {});

    const result = compile(source, this.options);
    if (!result.ok) {
      return this.fail(origin, result.diagnostics);
    }

    this.file = result.file;
    this.warnings = result.diagnostics;
    return this.swap(origin, result.document, result.diagnostics);
  }

  /**
   * Replaces the style guides and re-resolves the last good file against
   * them. Returns undefined when nothing has loaded yet.
   */
  setStyleGuides(styleGuides: ReadonlyMap<string, StyleGuide>, origin: string = this.origin): ReloadResult | undefined {
    this.options = { ...this.options, styleGuides: copyGuides(styleGuides) };
    if (this.file === undefined) return undefined;

    this.emit(DocumentEventKind.RELOAD_STARTED, origin, { styleGuidesOnly: true });
    try {
      return this.swap(origin, resolve(this.file, this.options), [...this.warnings]);
    } catch (err) {
      if (!(err instanceof NekoMaidError)) throw err;
      return this.fail(origin, [err.toDiagnostic()]);
    }
  }

  close(): void {
    this.events.close();
  }

  private swap(origin: string, document: Document, diagnostics: Diagnostic[]): ReloadResult {
    const previous = this.snapshot;
    const changed = previous === undefined || !documentsEqual(previous, document);

    this.snapshot = document;
    this.generation++;

    this.emit(DocumentEventKind.DOCUMENT_SWAPPED, origin, {
      changed,
      roots: document.roots.length,
      diagnostics,
    });
    return { ok: true, document, generation: this.generation, changed, diagnostics };
  }

  private fail(origin: string, diagnostics: Diagnostic[]): ReloadResult {
    this.emit(DocumentEventKind.RELOAD_FAILED, origin, { diagnostics });
    return { ok: false, document: this.snapshot, generation: this.generation, diagnostics };
  }

  private emit(kind: DocumentEventKind, origin: string, data: Record<string, unknown>): void {
    this.events.emit({ kind, timestamp: new Date(), origin, generation: this.generation, data });
  }
}

function copyGuides(
  styleGuides: ReadonlyMap<string, StyleGuide> | undefined,
): ReadonlyMap<string, StyleGuide> | undefined {
  return styleGuides !== undefined ? new Map(styleGuides) : undefined;
}
