import {
  createLogger,
  format,
  transports,
  type Logger,
  type LoggerOptions,
} from "winston";

const isProd = process.env.NODE_ENV === "production";
const isTest = process.env.NODE_ENV === "test";
const level = process.env.LOG_LEVEL ?? (isProd ? "info" : "debug");

// Common pre-formatting
const base = format.combine(
  format.timestamp(),
  format.errors({ stack: true }), // ensure Error.stack is serialized
  format.splat() // supports printf-style %s, %j etc.
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

// The shell owns stdout, so console logging goes to stderr and only from warn up.
function buildTransports(): LoggerOptions["transports"] {
  if (isTest) return [new transports.Console({ silent: true })];
  return [
    new transports.Console({
      level: process.env.LOG_LEVEL ?? "warn",
      stderrLevels: [
        "error",
        "warn",
        "info",
        "http",
        "verbose",
        "debug",
        "silly",
      ],
    }),
    new transports.File({ filename: "./logs/app.log", level: "info" }), // all info+
    new transports.File({ filename: "./logs/error.log", level: "error" }), // errors only
  ];
}

export const logger: Logger = createLogger({
  level,
  format: isProd ? format.combine(base, prodFmt) : format.combine(base, devFmt),
  transports: buildTransports(),
  silent: isTest,
});
