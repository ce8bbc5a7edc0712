import type { Store, Row, SqlParam } from "../store/postgres.js";
import { queryRows, exec, UniqueViolationError } from "../store/postgres.js";
import { duplicatePathError, notFoundError } from "./errors.js";
import type { FileRecord, ListFilter, Page, ScanFilter, UsageRow } from "./types.js";

export const DEFAULT_LIST_LIMIT = 100;
export const MAX_LIST_LIMIT = 1000;

/** Persisted FileRecord set, keyed by file_path. */
export interface MetadataStore {
  put(record: FileRecord): Promise<void>;
  get(filePath: string): Promise<FileRecord>;
  find(filePath: string): Promise<FileRecord | null>;
  list(filter: ListFilter, page?: Page): Promise<FileRecord[]>;
  scan(filter: ScanFilter, batchSize?: number): AsyncGenerator<FileRecord>;
  remove(filePath: string): Promise<boolean>;
  usage(): Promise<UsageRow[]>;
}

const COLUMNS =
  "file_path, file_id, original_filename, stored_filename, service, folder, file_size, " +
  "file_hash, mime_type, user_id, thumbnail_path, uploaded_at, expires_at";

const ORDER = "ORDER BY uploaded_at DESC, file_id ASC";

function text(row: Row, key: string): string {
  const v = row[key];
  if (typeof v !== "string") {
    throw new Error(`_files.${key}: expected text, got ${typeof v}`);
  }
  return v;
}

function optionalText(row: Row, key: string): string | null {
  const v = row[key];
  return v === null || v === undefined ? null : String(v);
}

function toNumber(v: unknown): number {
  if (typeof v === "number") return v;
  if (typeof v === "string" || typeof v === "bigint") return Number(v);
  return 0;
}

function toDate(v: unknown): Date | null {
  if (v instanceof Date) return v;
  if (typeof v === "string") return new Date(v);
  return null;
}

export function parseRecord(row: Row): FileRecord {
  const uploadedAt = toDate(row.uploaded_at);
  if (uploadedAt === null) {
    throw new Error("_files.uploaded_at is missing");
  }
  return {
    file_id: String(row.file_id),
    original_filename: text(row, "original_filename"),
    stored_filename: text(row, "stored_filename"),
    service: text(row, "service"),
    folder: text(row, "folder"),
    file_path: text(row, "file_path"),
    file_size: toNumber(row.file_size),
    file_hash: text(row, "file_hash"),
    mime_type: text(row, "mime_type"),
    user_id: optionalText(row, "user_id"),
    thumbnail_path: optionalText(row, "thumbnail_path"),
    uploaded_at: uploadedAt,
    expires_at: toDate(row.expires_at),
  };
}

function whereClause(filter: ScanFilter, params: SqlParam[]): string[] {
  const clauses: string[] = [];
  if (filter.service) {
    params.push(filter.service);
    clauses.push(`service = $${params.length}`);
  }
  if (filter.folder) {
    params.push(filter.folder);
    clauses.push(`folder = $${params.length}`);
  }
  if (filter.userId) {
    params.push(filter.userId);
    clauses.push(`user_id = $${params.length}`);
  }
  if (filter.uploadedBefore) {
    params.push(filter.uploadedBefore);
    clauses.push(`uploaded_at < $${params.length}`);
  }
  return clauses;
}

function clampLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit)) return DEFAULT_LIST_LIMIT;
  return Math.min(Math.max(Math.trunc(limit), 1), MAX_LIST_LIMIT);
}

function clampOffset(offset: number | undefined): number {
  if (offset === undefined || !Number.isFinite(offset)) return 0;
  return Math.max(Math.trunc(offset), 0);
}

/** The limit and offset a list call actually applies. */
export function clampPage(page: Page): Required<Page> {
  return { limit: clampLimit(page.limit), offset: clampOffset(page.offset) };
}

export class SqlMetadataStore implements MetadataStore {
  private store: Store;

  constructor(store: Store) {
    this.store = store;
  }

  async put(r: FileRecord): Promise<void> {
    try {
      await exec(
        this.store.pool,
        `INSERT INTO _files (${COLUMNS})
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)`,
        [
          r.file_path, r.file_id, r.original_filename, r.stored_filename, r.service, r.folder,
          r.file_size, r.file_hash, r.mime_type, r.user_id, r.thumbnail_path, r.uploaded_at, r.expires_at,
        ],
      );
    } catch (err) {
      if (err instanceof UniqueViolationError) {
        throw duplicatePathError(r.file_path);
      }
      throw err;
    }
  }

  async get(filePath: string): Promise<FileRecord> {
    const record = await this.find(filePath);
    if (!record) {
      throw notFoundError(filePath);
    }
    return record;
  }

  async find(filePath: string): Promise<FileRecord | null> {
    const rows = await queryRows(
      this.store.pool,
      `SELECT ${COLUMNS} FROM _files WHERE file_path = $1`,
      [filePath],
    );
    return rows.length > 0 ? parseRecord(rows[0]) : null;
  }

  async list(filter: ListFilter, page: Page = {}): Promise<FileRecord[]> {
    const params: SqlParam[] = [];
    const clauses = whereClause(filter, params);
    const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";
    const { limit, offset } = clampPage(page);
    params.push(limit, offset);

    const rows = await queryRows(
      this.store.pool,
      `SELECT ${COLUMNS} FROM _files ${where} ${ORDER} LIMIT $${params.length - 1} OFFSET $${params.length}`,
      params,
    );
    return rows.map(parseRecord);
  }

  /**
   * Walks every matching record in list order, one batch at a time. Paging is
   * keyed on (uploaded_at, file_id), so rows deleted mid-walk shift nothing.
   */
  async *scan(filter: ScanFilter, batchSize: number = 200): AsyncGenerator<FileRecord> {
    let cursor: FileRecord | null = null;
    for (;;) {
      const params: SqlParam[] = [];
      const clauses = whereClause(filter, params);
      if (cursor) {
        params.push(cursor.uploaded_at, cursor.file_id);
        const a = params.length - 1;
        const b = params.length;
        clauses.push(`(uploaded_at < $${a} OR (uploaded_at = $${a} AND file_id > $${b}))`);
      }
      const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";
      params.push(clampLimit(batchSize));

      const rows = await queryRows(
        this.store.pool,
        `SELECT ${COLUMNS} FROM _files ${where} ${ORDER} LIMIT $${params.length}`,
        params,
      );
      if (rows.length === 0) return;

      for (const row of rows) {
        cursor = parseRecord(row);
        yield cursor;
      }
      if (rows.length < clampLimit(batchSize)) return;
    }
  }

  async remove(filePath: string): Promise<boolean> {
    const n = await exec(this.store.pool, "DELETE FROM _files WHERE file_path = $1", [filePath]);
    return n > 0;
  }

  async usage(): Promise<UsageRow[]> {
    const rows = await queryRows(
      this.store.pool,
      `SELECT service, COUNT(*) AS file_count, COALESCE(SUM(file_size), 0) AS total_bytes
       FROM _files GROUP BY service ORDER BY service`,
    );
    return rows.map((row) => ({
      service: text(row, "service"),
      file_count: toNumber(row.file_count),
      total_bytes: toNumber(row.total_bytes),
    }));
  }
}
