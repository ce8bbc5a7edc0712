import { createHash, randomUUID, type Hash } from "node:crypto";
import path from "node:path";
import { Transform, type TransformCallback } from "node:stream";

export function newFileId(): string {
  return randomUUID();
}

/** Lower-cased extension including the leading dot, or "" when there is none. */
export function extensionOf(filename: string): string {
  return path.extname(path.basename(filename.replace(/\\/g, "/"))).toLowerCase();
}

export function storedFilenameFor(fileId: string, originalFilename: string): string {
  return `${fileId}${extensionOf(originalFilename)}`;
}

/** Pass-through stream that hashes (SHA-256) and counts every byte it forwards. */
export class HashingCounter extends Transform {
  private hash: Hash = createHash("sha256");
  private total = 0;
  private hex: string | null = null;

  _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.hash.update(chunk);
    this.total += chunk.length;
    callback(null, chunk);
  }

  get bytes(): number {
    return this.total;
  }

  /** Final digest. Only valid once the stream has finished. */
  digest(): string {
    if (this.hex === null) {
      this.hex = this.hash.digest("hex");
    }
    return this.hex;
  }
}

/**
 * Issues upload timestamps that strictly increase within this process, so
 * uploads made in the same millisecond still order by arrival.
 */
export class UploadClock {
  private last = 0;
  private source: () => Date;

  constructor(source: () => Date = () => new Date()) {
    this.source = source;
  }

  now(): Date {
    return this.source();
  }

  next(): Date {
    const t = Math.max(this.source().getTime(), this.last + 1);
    this.last = t;
    return new Date(t);
  }
}
