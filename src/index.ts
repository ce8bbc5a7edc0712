import "dotenv/config";
import { loadConfig } from "./config/index.js";
import { Store } from "./store/postgres.js";
import { bootstrap } from "./store/bootstrap.js";
import { SqlMetadataStore } from "./storage/metadata.js";
import { StorageManager } from "./storage/manager.js";
import { RetentionScheduler } from "./storage/sweeper.js";
import { createApp } from "./api/app.js";

async function main() {
  // 1. Load config
  const cfg = loadConfig();
  console.log(
    `Config loaded (port: ${cfg.server.port}, storage: ${cfg.storage.base_path}, max file size: ${(cfg.storage.max_file_size / (1024 * 1024)).toFixed(1)}MB)`,
  );

  // 2. Connect metadata database and create the _files table
  const store = await Store.connect(cfg.database);
  console.log(`Database driver: ${cfg.database.driver}`);
  await bootstrap(store);
  console.log("Metadata table ready");

  // 3. Storage manager and service directories
  const manager = new StorageManager(cfg.storage, cfg.cleanup, new SqlMetadataStore(store));
  await manager.init();

  // 4. HTTP app
  const app = createApp(manager, cfg);

  // 5. Retention scheduler
  const scheduler = new RetentionScheduler(manager, cfg.cleanup);
  if (cfg.cleanup.enabled) {
    scheduler.start();
  }

  // 6. Start server
  const server = app.listen(cfg.server.port, cfg.server.host, () => {
    console.log(`Starting server on ${cfg.server.host}:${cfg.server.port}`);
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`${signal} received, shutting down`);
    await scheduler.stop();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await store.close();
    process.exit(0);
  };
  for (const sig of ["SIGINT", "SIGTERM"] as const) {
    process.on(sig, () => {
      shutdown(sig).catch((err) => {
        console.error("ERROR: shutdown:", err);
        process.exit(1);
      });
    });
  }
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
