import { pipeline } from "node:stream/promises";
import type { Request, Response, NextFunction } from "express";
import type { FileEntry, FileService } from "./file-service.js";
import { validationError } from "./errors.js";
import { uploadSecret, uploadedEntry } from "./upload-storage.js";
import { extractExtension } from "../storage/naming.js";
import { formatFileSize } from "../lib/format.js";
import { silentLogger, type Logger } from "../lib/logger.js";

type AsyncHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

function asyncHandler(fn: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res, next).catch(next);
  };
}

/** Secret for list/delete/read: `?password=`, else the X-Upload-Password header. */
export function querySecret(req: Request): string | undefined {
  const q = req.query.password;
  return typeof q === "string" ? q : req.get("x-upload-password");
}

function toJSON(f: FileEntry) {
  return {
    name: f.storedName,
    url: f.url,
    size: f.sizeBytes,
    size_formatted: formatFileSize(f.sizeBytes),
    created_at: f.createdAt.toISOString(),
  };
}

export class FileHandler {
  private service: FileService;
  private logger: Logger;

  constructor(service: FileService, logger: Logger = silentLogger) {
    this.service = service;
    this.logger = logger;
  }

  // Runs after multer; the file has already been stored by ServiceStorageEngine.
  upload = asyncHandler(async (req: Request, res: Response) => {
    const entry = uploadedEntry(req);
    if (!entry) {
      this.service.authenticate(uploadSecret(req));
      throw validationError("Missing file in form data");
    }

    res.status(201).json({
      data: {
        ...toJSON(entry),
        message: "Upload successful",
      },
    });
  });

  list = asyncHandler(async (req: Request, res: Response) => {
    const files = await this.service.list(querySecret(req));
    res.json({ data: files.map(toJSON), total: files.length });
  });

  delete = asyncHandler(async (req: Request, res: Response) => {
    const name = req.params.filename;
    await this.service.delete(querySecret(req), name);
    res.json({ data: { deleted: true, name } });
  });

  serve = asyncHandler(async (req: Request, res: Response) => {
    const name = req.params.filename;
    const stream = await this.service.read(name, querySecret(req));

    res.type(extractExtension(name) || "bin");
    res.set("Content-Disposition", `inline; filename="${name}"`);
    res.set("X-Content-Type-Options", "nosniff");

    // pipeline destroys the file stream (and closes its handle) when the
    // client goes away mid-download.
    try {
      await pipeline(stream, res);
    } catch (err) {
      if (!res.headersSent) throw err;
      this.logger.debug(`Download of ${name} interrupted:`, err);
    }
  });
}
