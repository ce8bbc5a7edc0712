import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { Readable } from "node:stream";
import { loadConfig, type Config } from "../config/index.js";
import { Store } from "../store/postgres.js";
import { bootstrap } from "../store/bootstrap.js";
import { SqlMetadataStore } from "../storage/metadata.js";
import { StorageManager } from "../storage/manager.js";

export interface TestContext {
  cfg: Config;
  dir: string;
  root: string;
  store: Store;
  metadata: SqlMetadataStore;
  manager: StorageManager;
  /** Settable time source shared with the manager. */
  clock: { now: Date };
  close(): Promise<void>;
}

export function tempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function bytes(n: number, fill = 0x61): Buffer {
  return Buffer.alloc(n, fill);
}

export function streamOf(buf: Buffer | string): Readable {
  return Readable.from([Buffer.from(buf)]);
}

export async function readAll(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}

/** A manager over a fresh temp root and a file-backed SQLite database. */
export async function createTestContext(tune: (cfg: Config) => void = () => {}): Promise<TestContext> {
  const dir = tempDir("depot-test-");
  const cfg = loadConfig(
    {
      STORAGE_BASE_PATH: path.join(dir, "files"),
      DB_DATA_DIR: path.join(dir, "db"),
      DB_DRIVER: "sqlite",
      API_KEY: "test-secret",
    },
    [],
  );
  tune(cfg);

  const store = await Store.connect(cfg.database);
  await bootstrap(store);
  const metadata = new SqlMetadataStore(store);
  const clock = { now: new Date() };
  const manager = new StorageManager(cfg.storage, cfg.cleanup, metadata, { clock: () => clock.now });
  await manager.init();

  return {
    cfg,
    dir,
    root: cfg.storage.base_path,
    store,
    metadata,
    manager,
    clock,
    async close() {
      await store.close();
      fs.rmSync(dir, { recursive: true, force: true });
    },
  };
}
