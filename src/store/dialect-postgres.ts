import type { Dialect } from "./dialect.js";

const postgresFilesTableSQL = `
CREATE TABLE IF NOT EXISTS _files (
    file_path          TEXT PRIMARY KEY,
    file_id            UUID NOT NULL UNIQUE,
    original_filename  TEXT NOT NULL,
    stored_filename    TEXT NOT NULL,
    service            TEXT NOT NULL,
    folder             TEXT NOT NULL,
    file_size          BIGINT NOT NULL DEFAULT 0,
    file_hash          TEXT NOT NULL,
    mime_type          TEXT NOT NULL DEFAULT 'application/octet-stream',
    user_id            TEXT,
    thumbnail_path     TEXT,
    uploaded_at        TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    expires_at         TIMESTAMPTZ
);

CREATE INDEX IF NOT EXISTS idx_files_uploaded ON _files (uploaded_at DESC, file_id);
CREATE INDEX IF NOT EXISTS idx_files_service ON _files (service, uploaded_at DESC);
CREATE INDEX IF NOT EXISTS idx_files_user ON _files (user_id);
`;

export class PostgresDialect implements Dialect {
  name(): "postgres" {
    return "postgres";
  }

  filesTableSQL(): string {
    return postgresFilesTableSQL;
  }
}
