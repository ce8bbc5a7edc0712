import type { Readable, Transform } from "node:stream";

export interface WrittenFile {
  bytes: number;
  /** SHA-256 hex digest of exactly the bytes written. */
  hash: string;
}

export interface OpenedFile {
  stream: Readable;
  size: number;
}

/** FileStorage abstracts byte persistence under already-resolved absolute paths. */
export interface FileStorage {
  /**
   * Stream `source` through `limiter` into a new file. On any failure the
   * partial file is removed before the error propagates.
   */
  write(absolutePath: string, source: Readable, limiter: Transform): Promise<WrittenFile>;
  /** Open for reading, or null when the file does not exist. */
  open(absolutePath: string): Promise<OpenedFile | null>;
  /** Remove the file. Returns false when it was already gone. */
  delete(absolutePath: string): Promise<boolean>;
}
