import express from "express";
import morgan from "morgan";
import type { Config } from "../config/index.js";
import type { StorageManager } from "../storage/manager.js";
import { apiKeyMiddleware } from "../auth/middleware.js";
import { errorHandler } from "../middleware/error-handler.js";
import { registerFileRoutes } from "./router.js";

export const SERVICE_NAME = "file-depot";
export const SERVICE_VERSION = "1.0.0";

export interface AppOptions {
  /** Access log to stdout; off in tests. */
  accessLog?: boolean;
}

export function createApp(manager: StorageManager, cfg: Config, opts: AppOptions = {}): express.Express {
  const app = express();
  app.disable("x-powered-by");
  if (opts.accessLog ?? true) {
    app.use(
      morgan(":date[clf] :status :method :url :response-time ms", {
        stream: { write: (msg: string) => process.stdout.write(msg) },
      }),
    );
  }

  app.get("/", (_req, res, next) => {
    manager
      .stats()
      .then((stats) => {
        res.json({
          status: "healthy",
          service: SERVICE_NAME,
          version: SERVICE_VERSION,
          storage_stats: stats,
        });
      })
      .catch(next);
  });

  app.get("/health", (_req, res) => {
    manager
      .stats()
      .then((stats) => {
        res.json({
          status: "healthy",
          timestamp: new Date().toISOString(),
          version: SERVICE_VERSION,
          storage: {
            base_path: cfg.storage.base_path,
            total_files: stats.total.file_count,
            total_size_mb: stats.total.total_mb,
            services: Object.keys(stats.services),
          },
          config: {
            max_file_size_mb: cfg.storage.max_file_size / (1024 * 1024),
            allowed_extensions: cfg.storage.allowed_extensions,
            auto_cleanup: cfg.cleanup.enabled,
          },
        });
      })
      .catch((err: unknown) => {
        res.status(503).json({
          status: "unhealthy",
          error: err instanceof Error ? err.message : String(err),
        });
      });
  });

  registerFileRoutes(app, manager, apiKeyMiddleware(cfg.api_key));

  // Error handler (must be last middleware)
  app.use(errorHandler);
  return app;
}
