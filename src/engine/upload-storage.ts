import type { Request } from "express";
import type { StorageEngine } from "multer";
import type { FileEntry, FileService } from "./file-service.js";

const uploaded = new WeakMap<Request, FileEntry>();

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

/** Text field from a multipart body, when present and a string. */
export function formField(req: Request, key: string): string | undefined {
  const body: unknown = req.body;
  if (!isRecord(body)) return undefined;
  const v = body[key];
  return typeof v === "string" ? v : undefined;
}

/** Upload secret: the `password` form field, else the X-Upload-Password header. */
export function uploadSecret(req: Request): string | undefined {
  return formField(req, "password") ?? req.get("x-upload-password");
}

function declaredSize(req: Request): number | undefined {
  const raw = formField(req, "size");
  if (raw === undefined || raw.trim() === "") return undefined;
  return /^\d+$/.test(raw.trim()) ? Number(raw.trim()) : Number.NaN;
}

/** The entry stored for this request by the upload engine, if any. */
export function uploadedEntry(req: Request): FileEntry | undefined {
  return uploaded.get(req);
}

/**
 * Multer storage engine that streams each file part into FileService.upload.
 * Only fields sent before the file part (password, size) are visible here.
 */
export class ServiceStorageEngine implements StorageEngine {
  private readonly service: FileService;

  constructor(service: FileService) {
    this.service = service;
  }

  _handleFile(
    req: Request,
    file: Express.Multer.File,
    callback: (error?: unknown, info?: Partial<Express.Multer.File>) => void,
  ): void {
    this.service
      .upload({
        secret: uploadSecret(req),
        originalName: file.originalname,
        content: file.stream,
        declaredSize: declaredSize(req),
      })
      .then((entry) => {
        uploaded.set(req, entry);
        callback(null, { filename: entry.storedName, size: entry.sizeBytes });
      })
      .catch((err: unknown) => callback(err));
  }

  _removeFile(
    req: Request,
    file: Express.Multer.File,
    callback: (error: Error | null) => void,
  ): void {
    uploaded.delete(req);
    this.service
      .delete(uploadSecret(req), file.filename)
      .then(() => callback(null))
      .catch((err: unknown) => callback(err instanceof Error ? err : new Error(String(err))));
  }
}
