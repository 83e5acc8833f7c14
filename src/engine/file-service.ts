import type { Readable } from "node:stream";
import type { Authenticator } from "../auth/authenticator.js";
import type { NameGenerator } from "../storage/naming.js";
import type { PathSanitizer } from "../storage/sanitizer.js";
import type { FileStorage, StoredFile } from "../storage/storage.js";
import { AppError, authError, type Stage } from "./errors.js";
import { silentLogger, type Logger } from "../lib/logger.js";

export interface UploadInput {
  secret?: string;
  originalName: string;
  content: Readable;
  declaredSize?: number;
}

export interface FileEntry {
  storedName: string;
  sizeBytes: number;
  createdAt: Date;
  url: string;
}

export interface FileServiceOptions {
  baseUrl: string;
  /** When false, read() requires the secret as well. */
  publicRead: boolean;
  logger?: Logger;
}

export interface FileServiceDeps {
  authenticator: Authenticator;
  names: NameGenerator;
  sanitizer: PathSanitizer;
  storage: FileStorage;
}

/**
 * FileService runs each request through authenticate, then validate, then the
 * storage operation. A failure at any step throws an AppError carrying the
 * stage it failed at; nothing after that step runs.
 */
export class FileService {
  private readonly auth: Authenticator;
  private readonly names: NameGenerator;
  private readonly sanitizer: PathSanitizer;
  private readonly storage: FileStorage;
  private readonly baseUrl: string;
  private readonly publicRead: boolean;
  private readonly logger: Logger;

  constructor(deps: FileServiceDeps, opts: FileServiceOptions) {
    this.auth = deps.authenticator;
    this.names = deps.names;
    this.sanitizer = deps.sanitizer;
    this.storage = deps.storage;
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
    this.publicRead = opts.publicRead;
    this.logger = opts.logger ?? silentLogger;
  }

  get readIsPublic(): boolean {
    return this.publicRead;
  }

  urlFor(storedName: string): string {
    return `${this.baseUrl}/files/${encodeURIComponent(storedName)}`;
  }

  authenticate(secret: string | undefined, stage: Stage = "authenticate"): void {
    if (!this.auth.verify(secret)) {
      this.logger.warn(`Rejected credentials (${stage})`);
      throw authError(stage);
    }
  }

  async upload(input: UploadInput): Promise<FileEntry> {
    this.authenticate(input.secret);

    this.noteOriginalName(input.originalName);
    const storedName = this.names.generate(input.originalName);
    this.storage.validate(storedName, input.declaredSize);

    const stored = await this.storage.write(storedName, input.content, input.declaredSize);
    this.logger.info(`File uploaded: ${stored.storedName} (${stored.sizeBytes} bytes)`);
    return this.toEntry(stored);
  }

  async list(secret: string | undefined): Promise<FileEntry[]> {
    this.authenticate(secret);
    const files = await this.storage.list();
    return files.map((f) => this.toEntry(f));
  }

  async delete(secret: string | undefined, targetName: string): Promise<void> {
    this.authenticate(secret);
    const name = this.sanitizeOrWarn(targetName, "delete");
    await this.storage.delete(name);
    this.logger.info(`File deleted: ${name}`);
  }

  /** Opens a stored file. Requires the secret only when reads are not public. */
  async read(targetName: string, secret?: string): Promise<Readable> {
    if (!this.publicRead) {
      this.authenticate(secret, "read");
    }
    const name = this.sanitizeOrWarn(targetName, "read");
    return this.storage.read(name);
  }

  private sanitizeOrWarn(candidate: string, stage: Stage): string {
    try {
      return this.sanitizer.sanitize(candidate, stage);
    } catch (err) {
      if (err instanceof AppError) {
        this.logger.warn(`Rejected file name ${JSON.stringify(candidate)} (${stage}): ${err.message}`);
      }
      throw err;
    }
  }

  // Logged only: nothing of the original reaches the stored name except what
  // NameGenerator keeps from it.
  private noteOriginalName(originalName: string): void {
    try {
      this.sanitizer.sanitize(originalName);
    } catch (err) {
      if (!(err instanceof AppError)) throw err;
      this.logger.warn(`Unsafe original name ${JSON.stringify(originalName)}: ${err.message}`);
    }
  }

  private toEntry(f: StoredFile): FileEntry {
    return {
      storedName: f.storedName,
      sizeBytes: f.sizeBytes,
      createdAt: f.createdAt,
      url: this.urlFor(f.storedName),
    };
  }
}
