import express, { type Request, type Response } from "express";
import morgan from "morgan";
import type { Config } from "./config/index.js";
import { Authenticator } from "./auth/authenticator.js";
import { NameGenerator } from "./storage/naming.js";
import { PathSanitizer } from "./storage/sanitizer.js";
import { LocalStorage } from "./storage/local.js";
import type { FileStorage } from "./storage/storage.js";
import { FileService } from "./engine/file-service.js";
import { FileHandler } from "./engine/file-handler.js";
import { registerFileRoutes } from "./engine/router.js";
import { errorHandler } from "./middleware/error-handler.js";
import { createLogger, type Logger } from "./lib/logger.js";
import { formatFileSize } from "./lib/format.js";
import { VERSION } from "./version.js";

export interface AppOptions {
  logger?: Logger;
  /** Skip the request log (tests). */
  requestLog?: boolean;
  names?: NameGenerator;
}

export interface BuiltApp {
  app: express.Express;
  service: FileService;
  storage: FileStorage;
}

// Request paths only: the query string may carry the password.
morgan.token<Request, Response>("path", (req) => req.path);

export async function buildApp(cfg: Config, opts: AppOptions = {}): Promise<BuiltApp> {
  const logger = opts.logger ?? createLogger(cfg.log_level);

  const storage = await LocalStorage.open(cfg.storage.root, {
    maxFileSize: cfg.storage.max_file_size,
    allowedExtensions: cfg.storage.allowed_extensions,
    blockedExtensions: cfg.storage.blocked_extensions,
    logger,
  });

  const authenticator = new Authenticator(cfg.auth.upload_password);
  if (!authenticator.hasSecret) {
    logger.warn("No upload password configured; uploads, listing and deletes are refused");
  }

  const service = new FileService(
    {
      authenticator,
      names: opts.names ?? new NameGenerator(),
      sanitizer: new PathSanitizer(storage.root),
      storage,
    },
    {
      baseUrl: cfg.storage.base_url,
      publicRead: cfg.storage.public_read,
      logger,
    },
  );

  const app = express();
  app.disable("x-powered-by");
  if (opts.requestLog ?? true) {
    app.use(
      morgan<Request, Response>(":date[clf] :status :method :path :response-time ms", {
        stream: { write: (msg: string) => process.stdout.write(msg) },
      }),
    );
  }

  app.get("/health", (_req, res) => {
    res.json({ status: "healthy", version: VERSION, timestamp: new Date().toISOString() });
  });

  app.get("/api", (_req, res) => {
    res.json({
      name: "File Store API",
      version: VERSION,
      endpoints: {
        upload: { method: "POST", path: "/upload", auth: "password" },
        list: { method: "GET", path: "/list", auth: "password" },
        delete: { method: "DELETE", path: "/delete/{filename}", auth: "password" },
        read: { method: "GET", path: "/files/{filename}", auth: service.readIsPublic ? "none" : "password" },
        health: { method: "GET", path: "/health", auth: "none" },
      },
      limits: {
        max_file_size: cfg.storage.max_file_size,
        max_file_size_formatted: formatFileSize(cfg.storage.max_file_size),
        allowed_extensions: cfg.storage.allowed_extensions,
        blocked_extensions: cfg.storage.blocked_extensions,
      },
    });
  });

  registerFileRoutes(app, new FileHandler(service, logger), service);

  // Must be last
  app.use(errorHandler(logger));

  return { app, service, storage };
}
