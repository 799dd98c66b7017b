import { rateLimit } from "express-rate-limit";
import type { Request, Response, NextFunction } from "express";
import { loadConfig } from "../configs/environment";
import { logger } from "../utils/logger";
import { sendError } from "../utils/response";

const config = loadConfig();

export const rateLimiter = rateLimit({
  windowMs: config.api.rateLimit.windowMs,
  limit: config.api.rateLimit.max,
  standardHeaders: true,
  legacyHeaders: false,
  skip: (req) => req.originalUrl.startsWith("/health"),
  handler: (req, res) => {
    logger.warn(`Rate limit exceeded for ${req.ip ?? "unknown"} on ${req.originalUrl}`);
    sendError(res, "Rate limit exceeded. Please try again later.", 429, "Too Many Requests");
  },
});

/** Performance sessions are posted as JSON. */
export const validateContentType = (
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  if (req.method === "POST" && !req.is("application/json")) {
    sendError(res, "Content-Type must be application/json", 415, "Invalid Content-Type");
    return;
  }
  next();
};
