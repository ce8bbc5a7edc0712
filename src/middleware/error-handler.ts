import type { Request, Response, NextFunction } from "express";
import multer from "multer";
import { AppError, type ErrorDetail } from "../storage/errors.js";

interface ErrorBody {
  error: {
    code: string;
    message: string;
    details?: ErrorDetail[];
  };
}

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  next: NextFunction,
): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof AppError) {
    const body: ErrorBody = {
      error: {
        code: err.code,
        message: err.message,
      },
    };
    if (err.details && err.details.length > 0) {
      body.error.details = err.details;
    }
    res.status(err.status).json(body);
    return;
  }

  if (err instanceof multer.MulterError) {
    res.status(400).json({
      error: {
        code: "INVALID_PAYLOAD",
        message: err.field ? `${err.message} (${err.field})` : err.message,
      },
    });
    return;
  }

  console.error("ERROR:", err);
  res.status(500).json({
    error: {
      code: "INTERNAL_ERROR",
      message: "Internal server error",
    },
  });
}
