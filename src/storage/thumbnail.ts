import fsp from "node:fs/promises";
import sharp from "sharp";
import type { ThumbnailConfig } from "../config/index.js";
import { isErrnoCode } from "./paths.js";

const THUMBNAIL_SOURCE_TYPES = new Set([
  "image/jpeg",
  "image/png",
  "image/gif",
  "image/webp",
]);

export const THUMBNAIL_MIME_TYPE = "image/jpeg";

export type ThumbnailOutcome =
  | { ok: true }
  | { ok: false; warning: string };

/**
 * Writes a JPEG preview that fits inside a size×size box. Failures come back
 * as a warning and never throw: a broken image must not fail its upload.
 */
export class ThumbnailDeriver {
  private cfg: ThumbnailConfig;

  constructor(cfg: ThumbnailConfig) {
    this.cfg = cfg;
  }

  supports(mimeType: string): boolean {
    return THUMBNAIL_SOURCE_TYPES.has(mimeType);
  }

  async derive(sourcePath: string, targetPath: string): Promise<ThumbnailOutcome> {
    try {
      await sharp(sourcePath)
        .rotate()
        .resize(this.cfg.size, this.cfg.size, { fit: "inside", withoutEnlargement: true })
        .flatten({ background: "#ffffff" })
        .jpeg({ quality: this.cfg.quality })
        .toFile(targetPath);
      return { ok: true };
    } catch (err) {
      await removeQuietly(targetPath);
      const reason = err instanceof Error ? err.message : String(err);
      return { ok: false, warning: `Thumbnail generation failed: ${reason}` };
    }
  }
}

async function removeQuietly(p: string): Promise<void> {
  try {
    await fsp.unlink(p);
  } catch (err) {
    if (!isErrnoCode(err, "ENOENT")) {
      console.warn(`WARN: could not remove partial thumbnail ${p}:`, err);
    }
  }
}
