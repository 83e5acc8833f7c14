import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import yaml from "js-yaml";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface ServerConfig {
  readonly host: string;
  readonly port: number;
}

export interface AuthConfig {
  /** Shared upload secret. Empty means no secret configured: every check fails. */
  readonly upload_password: string;
}

export interface StorageConfig {
  readonly root: string;
  readonly base_url: string;
  readonly max_file_size: number;
  /** Lower-case extensions without the dot. Empty allows everything not blocked. */
  readonly allowed_extensions: readonly string[];
  readonly blocked_extensions: readonly string[];
  /** When false, GET /files/:name requires the password too. */
  readonly public_read: boolean;
}

export interface Config {
  readonly server: ServerConfig;
  readonly auth: AuthConfig;
  readonly storage: StorageConfig;
  readonly log_level: LogLevel;
}

export const DEFAULT_MAX_FILE_SIZE = 500 * 1024 * 1024;

export const DEFAULT_BLOCKED_EXTENSIONS = [
  "exe", "dll", "bat", "cmd", "sh", "ps1",
  "msi", "scr", "com", "vbs", "vbe", "wsf",
  "jar", "war", "ear",
];

type Env = Record<string, string | undefined>;
type RawSection = Record<string, unknown>;

function isRecord(v: unknown): v is RawSection {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function section(raw: RawSection, key: string): RawSection {
  const v = raw[key];
  return isRecord(v) ? v : {};
}

function str(envValue: string | undefined, fileValue: unknown, fallback: string): string {
  if (envValue !== undefined) return envValue;
  if (typeof fileValue === "string") return fileValue;
  if (typeof fileValue === "number") return String(fileValue);
  return fallback;
}

function int(envValue: string | undefined, fileValue: unknown, fallback: number): number {
  if (envValue !== undefined) {
    const n = Number.parseInt(envValue, 10);
    return Number.isFinite(n) ? n : fallback;
  }
  if (typeof fileValue === "number" && Number.isInteger(fileValue)) return fileValue;
  return fallback;
}

function bool(envValue: string | undefined, fileValue: unknown, fallback: boolean): boolean {
  if (envValue !== undefined) {
    return ["true", "1", "yes", "on"].includes(envValue.trim().toLowerCase());
  }
  if (typeof fileValue === "boolean") return fileValue;
  return fallback;
}

export function normalizeExtension(ext: string): string {
  return ext.trim().toLowerCase().replace(/^\.+/, "");
}

function extList(envValue: string | undefined, fileValue: unknown, fallback: string[]): string[] {
  let items: string[] = fallback;
  if (envValue !== undefined) {
    items = envValue.split(",");
  } else if (Array.isArray(fileValue)) {
    items = fileValue.filter((v): v is string => typeof v === "string");
  }
  return [...new Set(items.map(normalizeExtension).filter((e) => e.length > 0))];
}

function logLevel(value: string): LogLevel {
  const v = value.toLowerCase();
  if (v === "debug" || v === "info" || v === "warn" || v === "error") return v;
  if (v === "warning") return "warn";
  return "info";
}

function readConfigFile(): RawSection {
  const candidates = [
    path.resolve("app.yaml"),
    path.resolve("../../app.yaml"),
  ];

  for (const p of candidates) {
    if (fs.existsSync(p)) {
      const parsed = yaml.load(fs.readFileSync(p, "utf-8"));
      return isRecord(parsed) ? parsed : {};
    }
  }
  return {};
}

function deepFreeze<T extends object>(obj: T): T {
  for (const v of Object.values(obj)) {
    if (typeof v === "object" && v !== null) deepFreeze(v);
  }
  return Object.freeze(obj);
}

/**
 * Builds the immutable configuration: values from app.yaml, overridden by
 * environment variables. Pass `raw` to skip the file lookup.
 */
export function loadConfig(env: Env = process.env, raw: RawSection = readConfigFile()): Config {
  const server = section(raw, "server");
  const auth = section(raw, "auth");
  const storage = section(raw, "storage");

  return deepFreeze({
    server: {
      host: str(env.HOST, server.host, "0.0.0.0"),
      port: int(env.PORT, server.port, 8008),
    },
    auth: {
      upload_password: str(env.UPLOAD_PASSWORD, auth.upload_password, ""),
    },
    storage: {
      root: path.resolve(
        str(env.STORAGE_DIR, storage.root, path.join(os.homedir(), "data", "file-server")),
      ),
      base_url: str(env.BASE_URL, storage.base_url, "http://localhost:8008").replace(/\/+$/, ""),
      max_file_size: int(env.MAX_FILE_SIZE, storage.max_file_size, DEFAULT_MAX_FILE_SIZE),
      allowed_extensions: extList(env.ALLOWED_EXTENSIONS, storage.allowed_extensions, []),
      blocked_extensions: extList(
        env.BLOCKED_EXTENSIONS,
        storage.blocked_extensions,
        DEFAULT_BLOCKED_EXTENSIONS,
      ),
      public_read: bool(env.PUBLIC_READ, storage.public_read, true),
    },
    log_level: logLevel(str(env.LOG_LEVEL, raw.log_level, "info")),
  });
}
