import fs from "node:fs";
import fsp from "node:fs/promises";
import { once } from "node:events";
import { pipeline } from "node:stream/promises";
import type { Readable, Transform } from "node:stream";
import type { FileStorage, OpenedFile, WrittenFile } from "./storage.js";
import { isAppError, writeFailureError } from "./errors.js";
import { HashingCounter } from "./identity.js";
import { isErrnoCode } from "./paths.js";

/** Local filesystem storage implementation. */
export class LocalStorage implements FileStorage {
  async write(absolutePath: string, source: Readable, limiter: Transform): Promise<WrittenFile> {
    const hasher = new HashingCounter();
    // wx: never clobber an existing file
    const out = fs.createWriteStream(absolutePath, { flags: "wx" });

    try {
      await pipeline(source, limiter, hasher, out);
    } catch (err) {
      // the fd may still be opening; unlink only after it is released
      if (!out.closed) await new Promise<void>((resolve) => out.once("close", () => resolve()));
      if (isErrnoCode(err, "EEXIST")) {
        throw writeFailureError(`target already exists: ${absolutePath}`);
      }
      await this.delete(absolutePath);
      if (isAppError(err)) throw err;
      throw writeFailureError(err instanceof Error ? err.message : String(err));
    }

    if (out.bytesWritten !== hasher.bytes) {
      await this.delete(absolutePath);
      throw writeFailureError(`wrote ${out.bytesWritten} of ${hasher.bytes} bytes`);
    }
    return { bytes: hasher.bytes, hash: hasher.digest() };
  }

  async open(absolutePath: string): Promise<OpenedFile | null> {
    try {
      const st = await fsp.stat(absolutePath);
      if (!st.isFile()) return null;
      const stream = fs.createReadStream(absolutePath);
      // surface open errors here, before a response has started
      await once(stream, "open");
      return { stream, size: st.size };
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) return null;
      throw err;
    }
  }

  async delete(absolutePath: string): Promise<boolean> {
    try {
      await fsp.unlink(absolutePath);
      return true;
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) return false;
      throw err;
    }
  }
}
