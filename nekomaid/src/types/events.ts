export const DocumentEventKind = {
  RELOAD_STARTED: "reload_started",
  DOCUMENT_SWAPPED: "document_swapped",
  RELOAD_FAILED: "reload_failed",
} as const;

export type DocumentEventKind = (typeof DocumentEventKind)[keyof typeof DocumentEventKind];

export interface DocumentEvent {
  kind: DocumentEventKind;
  timestamp: Date;
  /** File path or other label of the source being reloaded. */
  origin: string;
  /** Increments on every successful swap. */
  generation: number;
  data: Record<string, unknown>;
}
