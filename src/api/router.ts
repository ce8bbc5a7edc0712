import { Router } from "express";
import type { Express, Request, Response, NextFunction } from "express";
import multer from "multer";
import type { StorageManager } from "../storage/manager.js";
import { FileHandler, ManagerStorageEngine } from "./file-handler.js";

type Middleware = (req: Request, res: Response, next: NextFunction) => void;

// registerFileRoutes mounts the storage API. Reads of individual files are
// public; uploads, listing and maintenance need the API key.
export function registerFileRoutes(app: Express, manager: StorageManager, authMW: Middleware): void {
  const handler = new FileHandler(manager);
  const upload = multer({
    storage: new ManagerStorageEngine(manager),
    limits: { files: 1, fields: 20 },
    // filenames in part headers are UTF-8 from browsers and curl
    defParamCharset: "utf8",
  });

  const publicRouter = Router();
  publicRouter.get("/file/*", handler.download);
  publicRouter.get("/serve/*", handler.serve);
  publicRouter.get("/thumbnail/*", handler.thumbnail);
  app.use(publicRouter);

  const protectedRouter = Router();
  protectedRouter.post("/upload", authMW, upload.single("file"), handler.upload);
  protectedRouter.delete("/file/*", authMW, handler.delete);
  protectedRouter.get("/files", authMW, handler.list);
  protectedRouter.get("/stats", authMW, handler.stats);
  protectedRouter.post("/cleanup", authMW, handler.cleanup);
  protectedRouter.post("/reconcile", authMW, handler.reconcile);
  app.use(protectedRouter);
}
