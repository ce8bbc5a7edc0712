import fsp from "node:fs/promises";
import path from "node:path";
import type { Readable } from "node:stream";
import mime from "mime-types";
import type { CleanupConfig, StorageConfig } from "../config/index.js";
import { Admission } from "./admission.js";
import { invalidPayloadError, isAppError, notFoundError, writeFailureError } from "./errors.js";
import { UploadClock, newFileId, storedFilenameFor } from "./identity.js";
import { LocalStorage } from "./local.js";
import type { MetadataStore } from "./metadata.js";
import { PathResolver, isErrnoCode } from "./paths.js";
import { computeStats } from "./stats.js";
import type { FileStorage, OpenedFile } from "./storage.js";
import { RetentionSweeper, type MaintenanceTarget, type SweepTarget } from "./sweeper.js";
import { THUMBNAIL_MIME_TYPE, ThumbnailDeriver } from "./thumbnail.js";
import type {
  CleanupResult,
  DeleteResult,
  FileRecord,
  ListFilter,
  Page,
  ReconcileResult,
  RetrievedFile,
  ServedFile,
  StorageStats,
  UploadParams,
  UploadResult,
} from "./types.js";

const MINUTE_MS = 60_000;

export interface StorageManagerOptions {
  files?: FileStorage;
  /** Time source; tests use it to backdate uploads. */
  clock?: () => Date;
}

/**
 * Owns file identity, on-disk layout, metadata lifecycle, thumbnails and
 * retention. The HTTP layer talks to nothing else.
 */
export class StorageManager implements SweepTarget, MaintenanceTarget {
  readonly paths: PathResolver;
  readonly admission: Admission;
  readonly sweeper: RetentionSweeper;
  private cfg: StorageConfig;
  private cleanupCfg: CleanupConfig;
  private metadata: MetadataStore;
  private files: FileStorage;
  private thumbnails: ThumbnailDeriver;
  private clock: UploadClock;

  constructor(
    cfg: StorageConfig,
    cleanupCfg: CleanupConfig,
    metadata: MetadataStore,
    opts: StorageManagerOptions = {},
  ) {
    this.cfg = cfg;
    this.cleanupCfg = cleanupCfg;
    this.metadata = metadata;
    this.files = opts.files ?? new LocalStorage();
    this.clock = new UploadClock(opts.clock);
    this.paths = new PathResolver(cfg.base_path, cfg.thumbnail.prefix);
    this.admission = new Admission(cfg);
    this.thumbnails = new ThumbnailDeriver(cfg.thumbnail);
    this.sweeper = new RetentionSweeper(this, () => this.clock.now());
  }

  get services(): string[] {
    return this.cfg.services;
  }

  /** Creates the storage root and one directory per service. */
  async init(): Promise<void> {
    for (const service of this.cfg.services) {
      const dir = path.join(this.paths.root, service);
      await fsp.mkdir(dir, { recursive: true });
    }
    console.log(`Storage root ready: ${this.paths.root} (${this.cfg.services.join(", ")})`);
  }

  async upload(source: Readable, params: UploadParams): Promise<UploadResult> {
    const { originalFilename, service } = params;

    this.admission.checkExtension(originalFilename);
    this.admission.checkDeclaredSize(params.declaredSize);
    this.admission.checkService(service);

    const folder = this.paths
      .folderSegments(params.folder ? params.folder : this.cfg.default_folder)
      .join("/");
    const fileId = newFileId();
    const storedFilename = storedFilenameFor(fileId, originalFilename);
    const target = this.paths.resolve(service, folder, storedFilename);

    try {
      await this.paths.ensureDir(target.absoluteDir);
    } catch (err) {
      if (isAppError(err)) throw err;
      throw writeFailureError(err instanceof Error ? err.message : String(err));
    }

    const written = await this.files.write(target.absolutePath, source, this.admission.limiter());

    const mimeType = mime.lookup(originalFilename) || "application/octet-stream";
    const warnings: string[] = [];
    let thumbnailPath: string | null = null;
    let thumbnailAbsolute: string | null = null;

    if (this.thumbnails.supports(mimeType)) {
      const rel = this.paths.thumbnailPathFor(target.relativePath);
      const abs = path.join(target.absoluteDir, path.posix.basename(rel));
      const outcome = await this.thumbnails.derive(target.absolutePath, abs);
      if (outcome.ok) {
        thumbnailPath = rel;
        thumbnailAbsolute = abs;
      } else {
        console.warn(`WARN: ${target.relativePath}: ${outcome.warning}`);
        warnings.push(outcome.warning);
      }
    }

    const record: FileRecord = {
      file_id: fileId,
      original_filename: originalFilename,
      stored_filename: storedFilename,
      service,
      folder,
      file_path: target.relativePath,
      file_size: written.bytes,
      file_hash: written.hash,
      mime_type: mimeType,
      user_id: params.userId ?? null,
      thumbnail_path: thumbnailPath,
      uploaded_at: this.clock.next(),
      expires_at: null,
    };

    try {
      await this.metadata.put(record);
    } catch (err) {
      // Roll back the bytes so no file outlives a failed insert
      await this.files.delete(target.absolutePath);
      if (thumbnailAbsolute) await this.files.delete(thumbnailAbsolute);
      throw err;
    }

    return { record, warnings };
  }

  async retrieve(filePath: string): Promise<RetrievedFile> {
    const { record, opened } = await this.openRecorded(filePath);
    return { stream: opened.stream, record, filename: record.original_filename };
  }

  async serve(filePath: string): Promise<ServedFile> {
    const { record, opened } = await this.openRecorded(filePath);
    return { stream: opened.stream, record, mimeType: record.mime_type, size: opened.size };
  }

  async thumbnail(filePath: string): Promise<ServedFile> {
    await this.paths.resolveExisting(filePath);
    const record = await this.metadata.get(filePath);
    if (!record.thumbnail_path) {
      throw notFoundError(`${filePath} (thumbnail)`);
    }
    const opened = await this.files.open(await this.paths.resolveExisting(record.thumbnail_path));
    if (!opened) {
      throw notFoundError(record.thumbnail_path);
    }
    return { stream: opened.stream, record, mimeType: THUMBNAIL_MIME_TYPE, size: opened.size };
  }

  /**
   * Removes the primary file, its thumbnail, then the record. A path with no
   * record is a successful no-op, so sweeps and explicit deletes commute.
   */
  async delete(filePath: string): Promise<DeleteResult> {
    const absolute = await this.paths.resolveExisting(filePath);
    const record = await this.metadata.find(filePath);
    if (!record) {
      return { deleted: false, freed_bytes: 0 };
    }

    await this.files.delete(absolute);
    if (record.thumbnail_path) {
      await this.files.delete(await this.paths.resolveExisting(record.thumbnail_path));
    }

    const removed = await this.metadata.remove(filePath);
    return { deleted: removed, freed_bytes: removed ? record.file_size : 0 };
  }

  list(filter: ListFilter, page: Page = {}): Promise<FileRecord[]> {
    return this.metadata.list(filter, page);
  }

  stats(): Promise<StorageStats> {
    return computeStats(this.metadata, this.cfg.services, this.paths.root);
  }

  candidates(uploadedBefore: Date): AsyncIterable<FileRecord> {
    return this.metadata.scan({ uploadedBefore });
  }

  cleanup(days: number = this.cleanupCfg.older_than_days, signal?: AbortSignal): Promise<CleanupResult> {
    if (!Number.isFinite(days) || days < 0) {
      return Promise.reject(invalidPayloadError(`days must be a non-negative number, got ${days}`));
    }
    return this.sweeper.sweep(days, signal);
  }

  /**
   * Heals the two kinds of orphan: records whose file has vanished, and files
   * under a service directory with no record that are older than the grace
   * period (younger ones may still be mid-upload).
   */
  async reconcile(signal?: AbortSignal): Promise<ReconcileResult> {
    const result: ReconcileResult = { orphan_records: 0, orphan_files: 0 };

    const missing: FileRecord[] = [];
    for await (const record of this.metadata.scan({})) {
      if (signal?.aborted) return result;
      const absolute = await this.paths.resolveExisting(record.file_path);
      if (!(await exists(absolute))) missing.push(record);
    }
    for (const record of missing) {
      try {
        if (record.thumbnail_path) {
          await this.files.delete(await this.paths.resolveExisting(record.thumbnail_path));
        }
        if (await this.metadata.remove(record.file_path)) result.orphan_records++;
      } catch (err) {
        console.error(`ERROR: reconcile record ${record.file_path}:`, err);
      }
    }

    const cutoff = this.clock.now().getTime() - this.cleanupCfg.orphan_grace_minutes * MINUTE_MS;
    for (const service of this.cfg.services) {
      for await (const file of walkFiles(path.join(this.paths.root, service), service)) {
        if (signal?.aborted) return result;
        if (file.mtimeMs >= cutoff) continue;
        try {
          if (await this.isOwned(file.relativePath)) continue;
          if (await this.files.delete(file.absolutePath)) result.orphan_files++;
        } catch (err) {
          console.error(`ERROR: reconcile file ${file.relativePath}:`, err);
        }
      }
    }

    return result;
  }

  private async isOwned(relativePath: string): Promise<boolean> {
    const name = path.posix.basename(relativePath);
    const primary = this.paths.primaryNameOf(name);
    const owner = primary === null
      ? relativePath
      : `${path.posix.dirname(relativePath)}/${primary}`;
    return (await this.metadata.find(owner)) !== null;
  }

  private async openRecorded(filePath: string): Promise<{ record: FileRecord; opened: OpenedFile }> {
    const absolute = await this.paths.resolveExisting(filePath);
    const record = await this.metadata.get(filePath);
    const opened = await this.files.open(absolute);
    if (!opened) {
      throw notFoundError(filePath);
    }
    return { record, opened };
  }
}

async function exists(p: string): Promise<boolean> {
  try {
    await fsp.stat(p);
    return true;
  } catch (err) {
    if (isErrnoCode(err, "ENOENT")) return false;
    throw err;
  }
}

interface WalkedFile {
  absolutePath: string;
  relativePath: string;
  mtimeMs: number;
}

/** Regular files below `dir`, depth first. Symlinks are not followed. */
async function* walkFiles(dir: string, relativeDir: string): AsyncGenerator<WalkedFile> {
  const entries = await fsp.readdir(dir, { withFileTypes: true }).catch((err: unknown) => {
    if (isErrnoCode(err, "ENOENT")) return null;
    throw err;
  });
  if (!entries) return;
  for (const entry of entries) {
    const absolutePath = path.join(dir, entry.name);
    const relativePath = `${relativeDir}/${entry.name}`;
    if (entry.isDirectory()) {
      yield* walkFiles(absolutePath, relativePath);
    } else if (entry.isFile()) {
      const st = await fsp.stat(absolutePath);
      yield { absolutePath, relativePath, mtimeMs: st.mtimeMs };
    }
  }
}
