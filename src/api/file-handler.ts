import type { Request, Response, NextFunction } from "express";
import type { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { StorageEngine } from "multer";
import type { StorageManager } from "../storage/manager.js";
import { invalidPayloadError } from "../storage/errors.js";
import { clampPage } from "../storage/metadata.js";
import { isErrnoCode } from "../storage/paths.js";
import type { FileRecord, UploadResult } from "../storage/types.js";

declare global {
  namespace Express {
    interface Request {
      upload?: UploadResult;
    }
  }
}

type AsyncHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

function asyncHandler(fn: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res, next).catch(next);
  };
}

function queryString(req: Request, name: string): string | undefined {
  const v = req.query[name];
  return typeof v === "string" && v !== "" ? v : undefined;
}

function queryInt(req: Request, name: string): number | undefined {
  const v = queryString(req, name);
  if (v === undefined) return undefined;
  const n = Number(v);
  if (!Number.isInteger(n)) {
    throw invalidPayloadError(`Query parameter '${name}' must be an integer`, [
      { field: name, message: `got ${JSON.stringify(v)}` },
    ]);
  }
  return n;
}

/** The path captured by a trailing `*` route segment. */
function wildcardPath(req: Request): string {
  const p = req.params[0];
  if (!p) {
    throw invalidPayloadError("Missing file path");
  }
  return p;
}

export function toResponse(record: FileRecord) {
  return {
    ...record,
    public_url: `/serve/${encodeURI(record.file_path)}`,
    thumbnail_url: record.thumbnail_path ? `/thumbnail/${encodeURI(record.file_path)}` : null,
  };
}

const DISCONNECT_CODES = ["ERR_STREAM_PREMATURE_CLOSE", "ECONNRESET", "EPIPE"];

/** Streams a file body; the read stream is destroyed if the client goes away. */
async function sendStream(res: Response, stream: Readable, filePath: string): Promise<void> {
  try {
    await pipeline(stream, res);
  } catch (err) {
    if (DISCONNECT_CODES.some((code) => isErrnoCode(err, code))) {
      console.warn(`WARN: client closed ${filePath} before the end`);
      return;
    }
    console.error(`ERROR: streaming ${filePath}:`, err);
  }
}

/**
 * Multer storage engine that streams the multipart file part straight into
 * StorageManager.upload, so size limits apply while bytes arrive.
 */
export class ManagerStorageEngine implements StorageEngine {
  private manager: StorageManager;

  constructor(manager: StorageManager) {
    this.manager = manager;
  }

  _handleFile(
    req: Request,
    file: Express.Multer.File,
    callback: (error?: Error | null, info?: Partial<Express.Multer.File>) => void,
  ): void {
    const service = queryString(req, "service");
    if (!service) {
      file.stream.resume();
      callback(invalidPayloadError("Missing 'service' query parameter"));
      return;
    }

    // busboy never ends the part when the client disconnects mid-body
    const abort = () => {
      if (!req.complete) file.stream.destroy(new Error("Client aborted the upload"));
    };
    if (req.destroyed) abort();
    else req.once("close", abort);

    this.manager
      .upload(file.stream, {
        originalFilename: file.originalname,
        service,
        folder: queryString(req, "folder"),
        userId: queryString(req, "user_id") ?? null,
      })
      .then(
        (result) => {
          req.off("close", abort);
          req.upload = result;
          callback(null, { size: result.record.file_size, path: result.record.file_path });
        },
        (err: Error) => {
          req.off("close", abort);
          // Drain whatever the manager did not read so busboy can finish
          file.stream.resume();
          callback(err);
        },
      );
  }

  _removeFile(req: Request, _file: Express.Multer.File, callback: (error: Error | null) => void): void {
    const uploaded = req.upload;
    if (!uploaded) {
      callback(null);
      return;
    }
    req.upload = undefined;
    this.manager.delete(uploaded.record.file_path).then(
      () => callback(null),
      (err: Error) => callback(err),
    );
  }
}

export class FileHandler {
  private manager: StorageManager;

  constructor(manager: StorageManager) {
    this.manager = manager;
  }

  upload = asyncHandler(async (req: Request, res: Response) => {
    const result = req.upload;
    if (!result) {
      throw invalidPayloadError("Missing file in form data");
    }

    res.status(201).json({
      success: true,
      message: "File uploaded successfully",
      file: toResponse(result.record),
      warnings: result.warnings,
    });
  });

  download = asyncHandler(async (req: Request, res: Response) => {
    const filePath = wildcardPath(req);
    const file = await this.manager.retrieve(filePath);

    res.attachment(file.filename);
    res.set("Content-Type", "application/octet-stream");
    res.set("Content-Length", String(file.record.file_size));
    await sendStream(res, file.stream, filePath);
  });

  serve = asyncHandler(async (req: Request, res: Response) => {
    const filePath = wildcardPath(req);
    const file = await this.manager.serve(filePath);

    res.set("Content-Type", file.mimeType);
    res.set("Content-Length", String(file.size));
    res.set("Content-Disposition", "inline");
    await sendStream(res, file.stream, filePath);
  });

  thumbnail = asyncHandler(async (req: Request, res: Response) => {
    const filePath = wildcardPath(req);
    const file = await this.manager.thumbnail(filePath);

    res.set("Content-Type", file.mimeType);
    res.set("Content-Length", String(file.size));
    await sendStream(res, file.stream, filePath);
  });

  delete = asyncHandler(async (req: Request, res: Response) => {
    const filePath = wildcardPath(req);
    const result = await this.manager.delete(filePath);

    res.json({
      success: true,
      deleted: result.deleted,
      message: result.deleted ? "File deleted successfully" : "File already absent",
    });
  });

  list = asyncHandler(async (req: Request, res: Response) => {
    const { limit, offset } = clampPage({ limit: queryInt(req, "limit"), offset: queryInt(req, "offset") });
    const files = await this.manager.list(
      {
        service: queryString(req, "service"),
        folder: queryString(req, "folder"),
        userId: queryString(req, "user_id"),
      },
      { limit, offset },
    );

    res.json({
      success: true,
      files: files.map(toResponse),
      count: files.length,
      limit,
      offset,
    });
  });

  stats = asyncHandler(async (_req: Request, res: Response) => {
    res.json({ success: true, stats: await this.manager.stats() });
  });

  cleanup = asyncHandler(async (req: Request, res: Response) => {
    const result = await this.manager.cleanup(queryInt(req, "days"));
    res.json({ success: true, message: "Cleanup completed", result });
  });

  reconcile = asyncHandler(async (_req: Request, res: Response) => {
    const result = await this.manager.reconcile();
    res.json({ success: true, message: "Reconcile completed", result });
  });
}
