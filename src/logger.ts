import { createLogger, format, transports, type Logger } from "winston";
import path from "node:path";

const isProd = process.env.NODE_ENV === "production";
const isTest = process.env.NODE_ENV === "test";
const level = process.env.LOG_LEVEL ?? (isProd ? "info" : "debug");
const logDir = process.env.LOG_DIR ?? "./logs";

const base = format.combine(
  format.timestamp(),
  format.errors({ stack: true }), // ensure Error.stack is serialized
  format.splat()
);

// Pretty for dev, JSON for prod
const devFmt = format.combine(
  format.colorize({ all: true }),
  format.printf((info) => {
    const { timestamp, level, message, stack, ...meta } = info;
    const metaStr = Object.keys(meta).length
      ? `\n${JSON.stringify(meta, null, 2)}`
      : "";
    return `${String(timestamp)} ${level} ${String(message)}${
      stack ? `\n${String(stack)}` : ""
    }${metaStr}`;
  })
);

const prodFmt = format.json();

// Tests get a silent console only: no files, no process-level handlers.
export const logger: Logger = createLogger({
  level,
  silent: isTest,
  format: isProd ? format.combine(base, prodFmt) : format.combine(base, devFmt),
  transports: isTest
    ? [new transports.Console()]
    : [
        new transports.Console(),
        new transports.File({
          filename: path.join(logDir, "app.log"),
          level: "info",
        }),
        new transports.File({
          filename: path.join(logDir, "error.log"),
          level: "error",
        }),
      ],
  ...(isTest
    ? {}
    : {
        exceptionHandlers: [
          new transports.File({ filename: path.join(logDir, "exceptions.log") }),
        ],
        rejectionHandlers: [
          new transports.File({ filename: path.join(logDir, "rejections.log") }),
        ],
      }),
});
