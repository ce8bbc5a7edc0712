import { timingSafeEqual } from "node:crypto";
import type { Request, Response, NextFunction } from "express";
import { AppError } from "../storage/errors.js";

function unauthorizedError(msg: string): AppError {
  return new AppError("UNAUTHORIZED", 401, msg);
}

/** Requires `Authorization: Bearer <apiKey>`. */
export function apiKeyMiddleware(apiKey: string) {
  const expected = Buffer.from(apiKey);

  return (req: Request, _res: Response, next: NextFunction) => {
    const header = req.headers.authorization;
    if (!header) {
      return next(unauthorizedError("Missing API key"));
    }

    const parts = header.split(" ");
    if (parts.length !== 2 || parts[0].toLowerCase() !== "bearer") {
      return next(unauthorizedError("Invalid auth header format"));
    }

    const given = Buffer.from(parts[1]);
    if (given.length !== expected.length || !timingSafeEqual(given, expected)) {
      return next(unauthorizedError("Invalid API key"));
    }
    next();
  };
}
