import type { DocumentStoragePort } from '../../ports/DocumentStoragePort.js';
import { createLogger } from '../../utils/logger.js';
import { IOError } from '../../utils/errors.js';
import { entrySeparator, formatEntry, formatTimestamp } from './entryFormat.js';

export const DEFAULT_SAVE_DEBOUNCE_MS = 500;

export type DocumentChange =
  | { kind: 'load' }
  | { kind: 'replace' }
  | { kind: 'append'; inserted: string };

export interface DocumentSnapshot {
  content: string;
  change: DocumentChange;
}

export type DocumentObserver = (snapshot: DocumentSnapshot) => void;

export type LoadResult = { ok: true; found: boolean } | { ok: false; error: IOError };

export interface FileServiceOptions {
  debounceMs?: number;
  /** Read on every append so a timezone change in settings applies immediately. */
  timezone: () => string;
  now?: () => Date;
}

/**
 * Owns the single text document. Every mutation is republished to observers
 * and schedules a debounced write; writes are chained so they land in order.
 */
export class FileService {
  private readonly logger = createLogger({ service: 'FileService' });
  private readonly observers = new Set<DocumentObserver>();
  private readonly debounceMs: number;
  private readonly now: () => Date;
  private buffer = '';
  private dirty = false;
  private saveTimer: NodeJS.Timeout | null = null;
  private writeChain: Promise<void> = Promise.resolve();
  private writeInFlight = false;
  private closed = false;

  constructor(
    private readonly storage: DocumentStoragePort,
    private readonly options: FileServiceOptions
  ) {
    this.debounceMs = options.debounceMs ?? DEFAULT_SAVE_DEBOUNCE_MS;
    this.now = options.now ?? (() => new Date());
  }

  get content(): string {
    return this.buffer;
  }

  get hasUnsavedChanges(): boolean {
    return this.dirty;
  }

  async load(): Promise<LoadResult> {
    const logger = this.logger.child({ method: 'load', path: this.storage.location });
    let result: LoadResult;

    try {
      const content = await this.storage.read();
      this.buffer = content ?? '';
      result = { ok: true, found: content !== null };
      logger.info({ contentLength: this.buffer.length, found: result.found }, 'Document loaded');
    } catch (error) {
      const ioError =
        error instanceof IOError
          ? error
          : new IOError(this.storage.location, 'Failed to read document', { cause: error });
      logger.error({ error: ioError }, 'Document unreadable; starting with an empty buffer');
      this.buffer = '';
      result = { ok: false, error: ioError };
    }

    this.dirty = false;
    this.publish({ kind: 'load' });
    return result;
  }

  /**
   * Appends a timestamped entry to the end of the document. Returns the
   * inserted text, or null when `text` is blank.
   */
  append(text: string): string | null {
    if (!text.trim()) {
      return null;
    }

    const timestamp = formatTimestamp(this.now(), this.options.timezone());
    const inserted = entrySeparator(this.buffer) + formatEntry(text, timestamp);
    this.buffer += inserted;
    this.markChanged({ kind: 'append', inserted });
    this.logger.info({ entryLength: inserted.length }, 'Appended entry');
    return inserted;
  }

  replace(content: string): void {
    if (content === this.buffer) {
      return;
    }
    this.buffer = content;
    this.markChanged({ kind: 'replace' });
  }

  /** Schedules a write; calls within the debounce window coalesce into one. */
  save(): void {
    if (this.saveTimer) {
      clearTimeout(this.saveTimer);
    }
    this.saveTimer = setTimeout(() => {
      this.saveTimer = null;
      this.persist().catch((error) => {
        this.logger.error({ error }, 'Debounced save failed');
      });
    }, this.debounceMs);
  }

  /** Writes any pending change now and waits for queued writes to finish. */
  async flush(): Promise<void> {
    this.cancelTimer();
    await this.persist();
  }

  /**
   * Teardown: cancels the debounce timer and writes synchronously if dirty.
   * Queued async writes are dropped; one already in flight is followed by a
   * rewrite of the final buffer so it cannot leave an older snapshot behind.
   */
  close(): void {
    this.cancelTimer();
    this.closed = true;
    if (this.dirty) {
      const final = this.buffer;
      try {
        this.storage.writeSync(final);
        this.dirty = false;
        this.logger.info({ contentLength: final.length }, 'Flushed document on close');
      } catch (error) {
        this.logger.error({ error }, 'Failed to flush document on close');
      }
      if (this.writeInFlight) {
        this.writeChain = this.writeChain
          .then(() => this.storage.write(final))
          .catch((error: unknown) => {
            this.logger.error({ error }, 'Failed to rewrite document after close');
          });
      }
    }
    this.observers.clear();
  }

  subscribe(observer: DocumentObserver): () => void {
    this.observers.add(observer);
    return () => {
      this.observers.delete(observer);
    };
  }

  private markChanged(change: DocumentChange): void {
    this.dirty = true;
    this.publish(change);
    this.save();
  }

  private persist(): Promise<void> {
    if (!this.dirty) {
      return this.writeChain;
    }

    const snapshot = this.buffer;
    this.dirty = false;
    this.writeChain = this.writeChain
      .then(async () => {
        if (this.closed) {
          return;
        }
        this.writeInFlight = true;
        try {
          await this.storage.write(snapshot);
        } finally {
          this.writeInFlight = false;
        }
        this.logger.debug({ contentLength: snapshot.length }, 'Document saved');
      })
      .catch((error: unknown) => {
        // Left dirty so the next save retries.
        if (!this.closed) {
          this.dirty = true;
        }
        this.logger.error({ error }, 'Failed to save document');
      });
    return this.writeChain;
  }

  private cancelTimer(): void {
    if (this.saveTimer) {
      clearTimeout(this.saveTimer);
      this.saveTimer = null;
    }
  }

  private publish(change: DocumentChange): void {
    const snapshot: DocumentSnapshot = { content: this.buffer, change };
    for (const observer of this.observers) {
      try {
        observer(snapshot);
      } catch (error) {
        this.logger.error({ error, change: change.kind }, 'Document observer failed');
      }
    }
  }
}
