import fsp from "node:fs/promises";
import type { MetadataStore } from "./metadata.js";
import type { DiskSpace, StorageStats, UsageTotals } from "./types.js";

const MB = 1024 * 1024;

function totals(fileCount: number, totalBytes: number): UsageTotals {
  return {
    file_count: fileCount,
    total_bytes: totalBytes,
    total_mb: Math.round((totalBytes / MB) * 100) / 100,
  };
}

export async function diskSpace(root: string): Promise<DiskSpace> {
  const s = await fsp.statfs(root);
  return {
    total_bytes: s.blocks * s.bsize,
    free_bytes: s.bfree * s.bsize,
    available_bytes: s.bavail * s.bsize,
  };
}

/**
 * Per-service and overall usage from record sums, plus volume free space.
 * Every configured service is present, zero-filled when it holds nothing.
 */
export async function computeStats(
  metadata: MetadataStore,
  services: string[],
  root: string,
): Promise<StorageStats> {
  const counts = new Map<string, { files: number; bytes: number }>();
  for (const s of services) counts.set(s, { files: 0, bytes: 0 });

  for (const row of await metadata.usage()) {
    counts.set(row.service, { files: row.file_count, bytes: row.total_bytes });
  }

  const byService: Record<string, UsageTotals> = {};
  let files = 0;
  let bytes = 0;
  for (const [service, c] of counts) {
    byService[service] = totals(c.files, c.bytes);
    files += c.files;
    bytes += c.bytes;
  }

  return {
    services: byService,
    total: totals(files, bytes),
    disk: await diskSpace(root),
  };
}
