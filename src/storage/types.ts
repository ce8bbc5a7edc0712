import type { Readable } from "node:stream";

export interface FileRecord {
  file_id: string;
  original_filename: string;
  stored_filename: string;
  service: string;
  folder: string;
  file_path: string;
  file_size: number;
  file_hash: string;
  mime_type: string;
  user_id: string | null;
  thumbnail_path: string | null;
  uploaded_at: Date;
  expires_at: Date | null;
}

export interface UploadParams {
  originalFilename: string;
  service: string;
  folder?: string;
  userId?: string | null;
  /** Size announced by the transport, checked before any byte is read. */
  declaredSize?: number;
}

export interface UploadResult {
  record: FileRecord;
  warnings: string[];
}

export interface ListFilter {
  service?: string;
  folder?: string;
  userId?: string;
}

export interface ScanFilter extends ListFilter {
  uploadedBefore?: Date;
}

export interface Page {
  limit?: number;
  offset?: number;
}

export interface RetrievedFile {
  stream: Readable;
  record: FileRecord;
  /** Suggested download name. */
  filename: string;
}

export interface ServedFile {
  stream: Readable;
  record: FileRecord;
  mimeType: string;
  size: number;
}

export interface DeleteResult {
  deleted: boolean;
  freed_bytes: number;
}

export interface CleanupResult {
  deleted_count: number;
  failed_count: number;
  freed_bytes: number;
}

export interface ReconcileResult {
  orphan_records: number;
  orphan_files: number;
}

export interface UsageRow {
  service: string;
  file_count: number;
  total_bytes: number;
}

export interface UsageTotals {
  file_count: number;
  total_bytes: number;
  total_mb: number;
}

export interface DiskSpace {
  total_bytes: number;
  free_bytes: number;
  available_bytes: number;
}

export interface StorageStats {
  services: Record<string, UsageTotals>;
  total: UsageTotals;
  disk: DiskSpace;
}
