import { DocumentEventKind, type DocumentEvent } from "../types/events.js";

interface Consumer {
  queue: DocumentEvent[];
  waiters: Array<(event: DocumentEvent | null) => void>;
  closed: boolean;
}

export type DocumentListener = (event: DocumentEvent) => void;

export interface EventStreamOptions {
  /** Start the stream with the most recent `document_swapped` event, if any. */
  replayLatestSwap?: boolean;
}

export class DocumentEventEmitter {
  private consumers: Consumer[] = [];
  private listeners = new Set<DocumentListener>();
  private latestSwap: DocumentEvent | undefined;
  private closed = false;

  /** Registers a synchronous listener; returns a function that removes it. */
  subscribe(listener: DocumentListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(event: DocumentEvent): void {
    if (this.closed) return;
    if (event.kind === DocumentEventKind.DOCUMENT_SWAPPED) {
      this.latestSwap = event;
    }

    for (const listener of this.listeners) {
      listener(event);
    }
    for (const consumer of this.consumers) {
      if (consumer.closed) continue;

      const waiter = consumer.waiters.shift();
      if (waiter) {
        waiter(event);
      } else {
        consumer.queue.push(event);
      }
    }
  }

  events(options: EventStreamOptions = {}): AsyncGenerator<DocumentEvent> {
    // Registered eagerly so events emitted before the first next() are queued.
    const consumer: Consumer = { queue: [], waiters: [], closed: this.closed };
    if (options.replayLatestSwap === true && this.latestSwap !== undefined) {
      consumer.queue.push(this.latestSwap);
    }
    this.consumers.push(consumer);
    const consumers = this.consumers;

    async function* generate(): AsyncGenerator<DocumentEvent> {
      try {
        while (true) {
          const queued = consumer.queue.shift();
          if (queued) {
            yield queued;
          } else if (consumer.closed) {
            break;
          } else {
            const event = await new Promise<DocumentEvent | null>((resolve) => {
              consumer.waiters.push(resolve);
            });
            if (event === null) break;
            yield event;
          }
        }
      } finally {
        consumer.closed = true;
        const idx = consumers.indexOf(consumer);
        if (idx >= 0) consumers.splice(idx, 1);
      }
    }

    return generate();
  }

  /** Ends every open stream and drops listeners. Later emits are ignored. */
  close(): void {
    this.closed = true;
    this.listeners.clear();
    for (const consumer of this.consumers) {
      consumer.closed = true;
      for (const waiter of consumer.waiters) {
        waiter(null);
      }
      consumer.waiters.length = 0;
    }
  }
}
