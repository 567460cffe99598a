/** Backing store for the single text document. */
export interface DocumentStoragePort {
  /** Human-readable location, used in logs and errors. */
  readonly location: string;
  /** Resolves to null when the document does not exist yet. */
  read(): Promise<string | null>;
  write(content: string): Promise<void>;
  /** Blocking write, used only while shutting down. */
  writeSync(content: string): void;
}
