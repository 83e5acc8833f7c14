import { Router, type Express } from "express";
import multer from "multer";
import type { FileHandler } from "./file-handler.js";
import type { FileService } from "./file-service.js";
import { ServiceStorageEngine } from "./upload-storage.js";

const FORM_LIMITS = {
  files: 1,
  fields: 10,
  fieldSize: 64 * 1024,
};

export function registerFileRoutes(app: Express, handler: FileHandler, service: FileService): void {
  const upload = multer({ storage: new ServiceStorageEngine(service), limits: FORM_LIMITS });
  const api = Router();

  api.post("/upload", upload.single("file"), handler.upload);
  api.get("/list", handler.list);
  api.delete("/delete/:filename", handler.delete);
  api.get("/files/:filename", handler.serve);

  app.use(api);
}
