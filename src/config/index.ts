import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";

export interface ServerConfig {
  host: string;
  port: number;
}

export type DatabaseDriver = "sqlite" | "postgres";

export interface DatabaseConfig {
  driver: DatabaseDriver;
  host: string;
  port: number;
  user: string;
  password: string;
  name: string;
  pool_size: number;
  data_dir: string;
}

export interface ThumbnailConfig {
  size: number;
  quality: number;
  prefix: string;
}

export interface StorageConfig {
  base_path: string;
  max_file_size: number;
  allowed_extensions: string[];
  allow_extensionless: boolean;
  services: string[];
  default_folder: string;
  thumbnail: ThumbnailConfig;
}

export interface CleanupConfig {
  enabled: boolean;
  older_than_days: number;
  interval_hours: number;
  orphan_grace_minutes: number;
}

export interface Config {
  server: ServerConfig;
  database: DatabaseConfig;
  storage: StorageConfig;
  cleanup: CleanupConfig;
  api_key: string;
}

type Env = Record<string, string | undefined>;
type Section = Record<string, unknown>;

export const DEFAULT_EXTENSIONS = [
  "jpg", "jpeg", "png", "gif", "webp",
  "mp4", "webm", "mov", "avi", "mkv",
  "mp3", "wav", "m4a", "aac",
  "pdf", "pptx", "ppt", "docx", "doc",
];

export const DEFAULT_SERVICES = ["web", "ai", "presentai", "office"];

const DEFAULT_CANDIDATES = [
  path.resolve("app.yaml"),
  path.resolve("../../app.yaml"),
];

function isSection(v: unknown): v is Section {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function section(raw: Section, key: string): Section {
  const v = raw[key];
  return isSection(v) ? v : {};
}

function str(v: unknown, fallback: string): string {
  return typeof v === "string" && v !== "" ? v : fallback;
}

function int(v: unknown, fallback: number): number {
  const n = typeof v === "string" ? Number(v) : v;
  return typeof n === "number" && Number.isInteger(n) && n >= 0 ? n : fallback;
}

function bool(v: unknown, fallback: boolean): boolean {
  if (typeof v === "boolean") return v;
  if (typeof v === "string") {
    const s = v.trim().toLowerCase();
    if (s === "true" || s === "1" || s === "yes") return true;
    if (s === "false" || s === "0" || s === "no") return false;
  }
  return fallback;
}

function list(v: unknown, fallback: string[]): string[] {
  let items: unknown[] | null = null;
  if (Array.isArray(v)) items = v;
  else if (typeof v === "string") items = v.split(",");
  if (!items) return fallback;

  const out = items
    .map((i) => String(i).trim().toLowerCase().replace(/^\./, ""))
    .filter((i) => i !== "");
  return out.length > 0 ? [...new Set(out)] : fallback;
}

function driver(v: unknown): DatabaseDriver {
  return v === "postgres" ? "postgres" : "sqlite";
}

function readYaml(candidates: string[]): Section {
  for (const p of candidates) {
    if (fs.existsSync(p)) {
      const doc = yaml.load(fs.readFileSync(p, "utf-8"));
      return isSection(doc) ? doc : {};
    }
  }
  return {};
}

/**
 * Loads app.yaml (first candidate that exists) and applies environment
 * overrides on top. Unparseable values fall back to the defaults.
 */
export function loadConfig(env: Env = process.env, candidates: string[] = DEFAULT_CANDIDATES): Config {
  const raw = readYaml(candidates);

  const server = section(raw, "server");
  const database = section(raw, "database");
  const storage = section(raw, "storage");
  const thumbnail = section(storage, "thumbnail");
  const cleanup = section(raw, "cleanup");

  return {
    server: {
      host: str(env.HOST ?? server.host, "0.0.0.0"),
      port: int(env.PORT ?? server.port, 8005),
    },
    api_key: str(env.API_KEY ?? raw.api_key, "changeme-api-key"),
    database: {
      driver: driver(env.DB_DRIVER ?? database.driver),
      host: str(env.DB_HOST ?? database.host, "localhost"),
      port: int(env.DB_PORT ?? database.port, 5432),
      user: str(env.DB_USER ?? database.user, "depot"),
      password: str(env.DB_PASSWORD ?? database.password, "depot"),
      name: str(env.DB_NAME ?? database.name, "storage"),
      pool_size: int(database.pool_size, 10),
      data_dir: str(env.DB_DATA_DIR ?? database.data_dir, "./db"),
    },
    storage: {
      base_path: path.resolve(str(env.STORAGE_BASE_PATH ?? storage.base_path, "./data")),
      max_file_size: int(env.MAX_FILE_SIZE ?? storage.max_file_size, 52_428_800),
      allowed_extensions: list(env.ALLOWED_EXTENSIONS ?? storage.allowed_extensions, DEFAULT_EXTENSIONS),
      allow_extensionless: bool(storage.allow_extensionless, false),
      services: list(env.STORAGE_SERVICES ?? storage.services, DEFAULT_SERVICES),
      default_folder: str(storage.default_folder, "general"),
      thumbnail: {
        size: int(thumbnail.size, 300),
        quality: int(thumbnail.quality, 85),
        prefix: str(thumbnail.prefix, "thumb_"),
      },
    },
    cleanup: {
      enabled: bool(env.AUTO_CLEANUP_ENABLED ?? cleanup.enabled, true),
      older_than_days: int(env.CLEANUP_OLDER_THAN_DAYS ?? cleanup.older_than_days, 30),
      interval_hours: int(env.CLEANUP_INTERVAL_HOURS ?? cleanup.interval_hours, 24),
      orphan_grace_minutes: int(cleanup.orphan_grace_minutes, 60),
    },
  };
}
