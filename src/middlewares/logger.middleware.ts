import morgan from "morgan";
import chalk from "chalk";
import type { Request } from "express";
import { loadConfig } from "../configs/environment";
import { logger } from "../utils/logger";

morgan.token("timestamp", () => chalk.gray(new Date().toISOString()));

morgan.token("colored-method", (req) => {
  const method = req.method ?? "";
  switch (method) {
    case "GET":
      return chalk.green(method);
    case "POST":
      return chalk.yellow(method);
    case "PUT":
    case "PATCH":
      return chalk.blue(method);
    case "DELETE":
      return chalk.red(method);
    default:
      return chalk.white(method);
  }
});

morgan.token("colored-status", (_req, res) => {
  const status = res.statusCode;
  if (status >= 500) return chalk.red(status);
  if (status >= 400) return chalk.yellow(status);
  if (status >= 300) return chalk.cyan(status);
  return chalk.green(status);
});

morgan.token("colored-url", (req) => chalk.cyan(req.url ?? ""));

const skipHealthChecks = (req: Request) => req.originalUrl.startsWith("/health");

// Development: coloured lines on stdout
export const detailedColoredLogger = morgan<Request>(
  chalk.gray("[") +
    ":timestamp" +
    chalk.gray("]") +
    chalk.white(" REQUEST: ") +
    ":colored-method " +
    ":colored-url " +
    ":colored-status" +
    chalk.white(" in ") +
    chalk.magenta(":response-time ms") +
    chalk.white(", length=") +
    chalk.cyan(":res[content-length]"),
  { skip: skipHealthChecks }
);

// Elsewhere: plain lines through the application logger
export const structuredLogger = morgan<Request>(
  ":method :url :status :res[content-length] - :response-time ms",
  {
    skip: skipHealthChecks,
    stream: { write: (line: string) => logger.info(line.trim()) },
  }
);

export const requestLogger = () =>
  loadConfig().nodeEnv === "development" ? detailedColoredLogger : structuredLogger;
