import type { Dialect } from "./dialect.js";

// Timestamps are stored as ISO-8601 text, which sorts chronologically.
const sqliteFilesTableSQL = `
CREATE TABLE IF NOT EXISTS _files (
    file_path          TEXT PRIMARY KEY,
    file_id            TEXT NOT NULL UNIQUE,
    original_filename  TEXT NOT NULL,
    stored_filename    TEXT NOT NULL,
    service            TEXT NOT NULL,
    folder             TEXT NOT NULL,
    file_size          INTEGER NOT NULL DEFAULT 0,
    file_hash          TEXT NOT NULL,
    mime_type          TEXT NOT NULL DEFAULT 'application/octet-stream',
    user_id            TEXT,
    thumbnail_path     TEXT,
    uploaded_at        TEXT NOT NULL,
    expires_at         TEXT
);

CREATE INDEX IF NOT EXISTS idx_files_uploaded ON _files (uploaded_at DESC, file_id);
CREATE INDEX IF NOT EXISTS idx_files_service ON _files (service, uploaded_at DESC);
CREATE INDEX IF NOT EXISTS idx_files_user ON _files (user_id);
`;

export class SQLiteDialect implements Dialect {
  name(): "sqlite" {
    return "sqlite";
  }

  filesTableSQL(): string {
    return sqliteFilesTableSQL;
  }
}
