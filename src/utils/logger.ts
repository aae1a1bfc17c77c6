/**
 * @file src/utils/logger.ts
 * @description Configures and exports a Winston logger with a console transport and,
 *   when `LOG_DIR` is set, daily-rotated combined and error log files.
 * @remarks
 *   Uses timestamped formatting with error stack inclusion. `LOG_SILENT=true`
 *   mutes every transport (the test run sets it).
 */

import fs from "fs";
import { TransformableInfo } from "logform";
import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";
import { resolveLogDirectories } from "../config/paths.js";
import { getOptional, initialiseEnv } from "./env.js";

initialiseEnv();
const { combine, timestamp, printf, colorize, errors, splat } = winston.format;

const level = getOptional("LOG_LEVEL", "info");

/**
 * Custom log format: timestamp, uppercase level, then the message or error stack.
 */
const logFormat = printf((info: TransformableInfo) => {
  const body =
    typeof info.stack === "string" ? info.stack : String(info.message);
  return `[${String(info.timestamp)}] [${info.level.toUpperCase()}]: ${body}`;
});

const commonFormat = combine(
  timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
  errors({ stack: true }),
  splat(),
  logFormat
);

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: combine(colorize({ all: true }), commonFormat),
  }),
];

const logDir = getOptional("LOG_DIR");
if (logDir) {
  const dirs = resolveLogDirectories(logDir);
  for (const dir of [dirs.combined, dirs.error]) {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  // Errors only, kept 14 days
  transports.push(
    new DailyRotateFile({
      level: "error",
      dirname: dirs.error,
      filename: "error-%DATE%.log",
      datePattern: "YYYY-MM-DD",
      zippedArchive: true,
      maxFiles: "14d",
      createSymlink: true,
      symlinkName: "latest.log",
    })
  );

  // Everything at the configured level, kept 30 days
  transports.push(
    new DailyRotateFile({
      level,
      dirname: dirs.combined,
      filename: "combined-%DATE%.log",
      datePattern: "YYYY-MM-DD",
      zippedArchive: true,
      maxFiles: "30d",
      createSymlink: true,
      symlinkName: "latest.log",
    })
  );
}

/**
 * Singleton Winston logger instance used across the library.
 */
const logger = winston.createLogger({
  level,
  format: commonFormat,
  silent: getOptional("LOG_SILENT", "false") === "true",
  transports,
});

export default logger;
