import type { Request, Response, NextFunction } from "express";
import multer from "multer";
import { AppError, validationError } from "../engine/errors.js";
import type { Logger } from "../lib/logger.js";

interface ErrorBody {
  error: {
    code: string;
    message: string;
    stage?: string;
    details?: AppError["details"];
  };
}

function send(res: Response, err: AppError): void {
  const body: ErrorBody = {
    error: {
      code: err.code,
      message: err.message,
    },
  };
  if (err.stage) {
    body.error.stage = err.stage;
  }
  if (err.details && err.details.length > 0) {
    body.error.details = err.details;
  }
  res.status(err.status).json(body);
}

export function errorHandler(logger: Logger) {
  return (err: Error, _req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (err instanceof AppError) {
      send(res, err);
      return;
    }

    if (err instanceof multer.MulterError) {
      send(res, validationError(`Invalid upload form: ${err.message}`));
      return;
    }

    logger.error("Unhandled error:", err);
    res.status(500).json({
      error: {
        code: "INTERNAL_ERROR",
        message: "Internal server error",
      },
    });
  };
}
