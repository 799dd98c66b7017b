import type { Request, Response, NextFunction } from "express";
import { logger } from "../utils/logger";
import { AppError, errorMessage } from "../types/response/error.response";

export function errorMiddleware(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
) {
  // body-parser errors carry a status as well
  const status =
    err instanceof AppError
      ? err.status
      : typeof err === "object" && err !== null && "status" in err && typeof err.status === "number"
        ? err.status
        : 500;
  logger.error("Unhandled error", err);
  res
    .status(status)
    .json({ success: false, message: errorMessage(err) || "Internal Server Error" });
}

export function notFoundMiddleware(req: Request, res: Response) {
  res
    .status(404)
    .json({ success: false, message: `Route ${req.method} ${req.path} not found` });
}
