import fs, { type Dirent, type Stats } from "node:fs";
import fsp, { type FileHandle } from "node:fs/promises";
import path from "node:path";
import { randomBytes } from "node:crypto";
import { Transform, type Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { FileStorage, StoredFile } from "./storage.js";
import { PathSanitizer } from "./sanitizer.js";
import { extractExtension } from "./naming.js";
import {
  AppError,
  fileTooLargeError,
  notFoundError,
  storageError,
  unsupportedTypeError,
  validationError,
  type Stage,
} from "../engine/errors.js";
import { silentLogger, type Logger } from "../lib/logger.js";

export interface LocalStorageOptions {
  maxFileSize: number;
  allowedExtensions: readonly string[];
  blockedExtensions: readonly string[];
  logger?: Logger;
}

const TEMP_PREFIX = ".upload-";
// O_NOFOLLOW is missing on Windows.
const OPEN_READ_FLAGS = fs.constants.O_RDONLY | (fs.constants.O_NOFOLLOW ?? 0);

const FAILURE_MESSAGES: Record<Stage, string> = {
  authenticate: "Storage failure",
  validate: "Storage failure",
  persist: "Failed to save file",
  read: "Failed to read file",
  list: "Failed to read file list",
  delete: "Failed to delete file",
};

export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function createdAt(st: Stats): Date {
  return st.birthtimeMs > 0 ? st.birthtime : st.mtime;
}

/**
 * Local filesystem storage over one flat directory. Uploads land in a hidden
 * temp file in the same directory and are hard-linked under their final name
 * when complete, so a file is either absent or whole and never overwritten.
 */
export class LocalStorage implements FileStorage {
  readonly root: string;
  private readonly sanitizer: PathSanitizer;
  private readonly opts: LocalStorageOptions;
  private readonly logger: Logger;

  private constructor(root: string, opts: LocalStorageOptions) {
    this.root = root;
    this.sanitizer = new PathSanitizer(root);
    this.opts = opts;
    this.logger = opts.logger ?? silentLogger;
  }

  /** Creates the root if needed and pins it to its real path. */
  static async open(root: string, opts: LocalStorageOptions): Promise<LocalStorage> {
    await fsp.mkdir(root, { recursive: true });
    const real = await fsp.realpath(root);
    return new LocalStorage(real, opts);
  }

  validate(storedName: string, declaredSize?: number): void {
    this.checkType(this.sanitizer.sanitize(storedName, "validate"));
    this.checkDeclaredSize(declaredSize);
  }

  private checkType(name: string): void {
    const ext = extractExtension(name);
    if (this.opts.blockedExtensions.includes(ext)) {
      throw unsupportedTypeError(ext);
    }
    if (this.opts.allowedExtensions.length > 0 && !this.opts.allowedExtensions.includes(ext)) {
      throw unsupportedTypeError(ext);
    }
  }

  private checkDeclaredSize(declaredSize: number | undefined): void {
    if (declaredSize === undefined) return;
    if (!Number.isSafeInteger(declaredSize) || declaredSize < 0) {
      throw validationError("Invalid declared size");
    }
    if (declaredSize > this.opts.maxFileSize) {
      throw fileTooLargeError(declaredSize, this.opts.maxFileSize);
    }
  }

  async write(storedName: string, content: Readable, declaredSize?: number): Promise<StoredFile> {
    const name = this.sanitizer.sanitize(storedName, "persist");
    this.validate(name, declaredSize);

    const max = this.opts.maxFileSize;
    const finalPath = this.sanitizer.resolve(name);
    const tmpPath = path.join(this.root, `${TEMP_PREFIX}${randomBytes(8).toString("hex")}.tmp`);

    let written = 0;
    const counter = new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        written += chunk.length;
        if (written > max) {
          callback(fileTooLargeError(written, max));
          return;
        }
        callback(null, chunk);
      },
    });

    let st: Stats;
    try {
      const handle = await fsp.open(tmpPath, "wx", 0o644);
      await pipeline(content, counter, handle.createWriteStream());
      if (declaredSize !== undefined && written !== declaredSize) {
        throw validationError(
          `Upload size mismatch: declared ${declaredSize} bytes, received ${written}`,
        );
      }
      st = await fsp.stat(tmpPath);
      // link fails with EEXIST instead of replacing an existing file.
      await fsp.link(tmpPath, finalPath);
    } catch (err) {
      await this.discard(tmpPath);
      if (errnoCode(err) === "EEXIST") {
        throw storageError("Stored name already in use", "persist");
      }
      throw this.toStorageError(err, "persist");
    }
    await this.discard(tmpPath);

    return { storedName: name, sizeBytes: st.size, createdAt: createdAt(st) };
  }

  async read(storedName: string): Promise<Readable> {
    const name = this.sanitizer.sanitize(storedName, "read");

    let handle: FileHandle;
    try {
      handle = await fsp.open(this.sanitizer.resolve(name), OPEN_READ_FLAGS);
    } catch (err) {
      const code = errnoCode(err);
      if (code === "ENOENT" || code === "ELOOP" || code === "ENOTDIR") {
        throw notFoundError(name, "read");
      }
      throw this.toStorageError(err, "read");
    }

    try {
      const st = await handle.stat();
      if (!st.isFile()) {
        throw notFoundError(name, "read");
      }
    } catch (err) {
      await handle.close();
      throw this.toStorageError(err, "read");
    }
    return handle.createReadStream();
  }

  async list(): Promise<StoredFile[]> {
    let entries: Dirent[];
    try {
      entries = await fsp.readdir(this.root, { withFileTypes: true });
    } catch (err) {
      throw this.toStorageError(err, "list");
    }

    const files: StoredFile[] = [];
    for (const entry of entries) {
      // Dirent types come from the entry itself, so symlinks are never followed.
      if (!entry.isFile() || entry.name.startsWith(".")) continue;
      try {
        const st = await fsp.lstat(path.join(this.root, entry.name));
        files.push({ storedName: entry.name, sizeBytes: st.size, createdAt: createdAt(st) });
      } catch (err) {
        // Removed between readdir and lstat.
        if (errnoCode(err) === "ENOENT") continue;
        throw this.toStorageError(err, "list");
      }
    }

    files.sort(
      (a, b) =>
        b.createdAt.getTime() - a.createdAt.getTime() ||
        (a.storedName < b.storedName ? 1 : a.storedName > b.storedName ? -1 : 0),
    );
    return files;
  }

  async delete(storedName: string): Promise<void> {
    const name = this.sanitizer.sanitize(storedName, "delete");
    const target = this.sanitizer.resolve(name);

    try {
      const st = await fsp.lstat(target);
      if (!st.isFile()) {
        throw notFoundError(name, "delete");
      }
      await fsp.unlink(target);
    } catch (err) {
      if (errnoCode(err) === "ENOENT") {
        throw notFoundError(name, "delete");
      }
      throw this.toStorageError(err, "delete");
    }
  }

  private async discard(tmpPath: string): Promise<void> {
    try {
      await fsp.unlink(tmpPath);
    } catch (err) {
      if (errnoCode(err) !== "ENOENT") {
        this.logger.warn(`Failed to remove temp file ${path.basename(tmpPath)}:`, err);
      }
    }
  }

  // AppErrors pass through; anything else becomes a STORAGE_ERROR whose
  // message carries no path. The underlying error is logged.
  private toStorageError(err: unknown, stage: Stage): AppError {
    if (err instanceof AppError) return err;

    this.logger.error(`Storage ${stage} failed:`, err);
    switch (errnoCode(err)) {
      case "ENOSPC":
      case "EDQUOT":
        return storageError("Storage is full", stage);
      case "EACCES":
      case "EPERM":
      case "EROFS":
        return storageError("Storage is not writable", stage);
      default:
        return storageError(FAILURE_MESSAGES[stage], stage);
    }
  }
}
