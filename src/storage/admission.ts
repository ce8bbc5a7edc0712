import { Transform, type TransformCallback } from "node:stream";
import type { StorageConfig } from "../config/index.js";
import { sizeExceededError, unknownServiceError, unsupportedTypeError } from "./errors.js";
import { extensionOf } from "./identity.js";
import { assertSegment } from "./paths.js";

/** Counts bytes and fails the pipeline as soon as the running total passes `max`. */
export class SizeLimiter extends Transform {
  private total = 0;
  private max: number;

  constructor(max: number) {
    super();
    this.max = max;
  }

  _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.total += chunk.length;
    if (this.total > this.max) {
      callback(sizeExceededError(this.total, this.max));
      return;
    }
    callback(null, chunk);
  }

  get bytes(): number {
    return this.total;
  }
}

export class Admission {
  private allowed: Set<string>;
  private allowExtensionless: boolean;
  private services: Set<string>;
  readonly maxFileSize: number;

  constructor(cfg: Pick<StorageConfig, "allowed_extensions" | "allow_extensionless" | "services" | "max_file_size">) {
    this.allowed = new Set(cfg.allowed_extensions.map((e) => e.toLowerCase()));
    this.allowExtensionless = cfg.allow_extensionless;
    this.services = new Set(cfg.services);
    this.maxFileSize = cfg.max_file_size;
  }

  checkExtension(filename: string): void {
    const ext = extensionOf(filename).replace(/^\./, "");
    if (ext === "" ? !this.allowExtensionless : !this.allowed.has(ext)) {
      throw unsupportedTypeError(ext);
    }
  }

  checkDeclaredSize(size: number | undefined): void {
    if (size !== undefined && size > this.maxFileSize) {
      throw sizeExceededError(size, this.maxFileSize);
    }
  }

  /** Separators and traversal are a PATH_VIOLATION; anything else unknown is UNKNOWN_SERVICE. */
  checkService(service: string): void {
    assertSegment(service);
    if (!this.services.has(service)) {
      throw unknownServiceError(service);
    }
  }

  limiter(): SizeLimiter {
    return new SizeLimiter(this.maxFileSize);
  }
}
