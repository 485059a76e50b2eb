// Winston root logger.
// - Development: colorized single-line logs with trailing metadata
// - Production: structured JSON
// - Tests (NODE_ENV=test): silent
import winston, { type Logger } from "winston";

const isProd = process.env["NODE_ENV"] === "production";
const isTest = process.env["NODE_ENV"] === "test";

const devFormat = winston.format.printf(({ timestamp, level, message, ...meta }) => {
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${String(timestamp)} ${level}: ${String(message)}${extra}`;
});

const logger: Logger = winston.createLogger({
  level: process.env["LOG_LEVEL"] ?? "info",
  silent: isTest,
  format: isProd
    ? winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json(),
      )
    : winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp({ format: "HH:mm:ss" }),
        devFormat,
      ),
  transports: [new winston.transports.Console({ stderrLevels: ["error", "warn"] })],
});

/**
 * Child logger tagged with the component it belongs to.
 */
export function createLogger(component: string): Logger {
  return logger.child({ component });
}

export function setLogLevel(level: string): void {
  logger.level = level;
}

export default logger;
