import winston from "winston";
import { loadConfig } from "../configs/environment";

const config = loadConfig();

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp(),
  winston.format.splat(),
  winston.format.printf(({ timestamp, level, message, stack }) =>
    stack
      ? `${timestamp} ${level}: ${message}\n${stack}`
      : `${timestamp} ${level}: ${message}`
  )
);

const transports: winston.transport[] = [];

if (config.logging.enableConsole) {
  transports.push(
    new winston.transports.Console({
      format: config.nodeEnv === "production" ? winston.format.json() : consoleFormat,
      silent: config.nodeEnv === "test",
    })
  );
}

if (config.logging.enableFile) {
  transports.push(
    new winston.transports.File({
      filename: config.logging.file,
      format: winston.format.json(),
    })
  );
}

export const logger = winston.createLogger({
  level: config.logging.level,
  format: winston.format.combine(
    winston.format.errors({ stack: true }),
    winston.format.timestamp()
  ),
  transports,
  silent: transports.length === 0,
});
