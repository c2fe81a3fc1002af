import { createLogger, Logger, transports, format, config } from "winston";
const { combine, timestamp, splat, printf, label } = format;
import { LOG_LEVEL, shouldLogTimestamps } from "./config";

const shouldLogTimestamp = shouldLogTimestamps();

const addressLogFormat = printf(({ level, message, label, timestamp }) => {
  let formatted = `[${label}] ${level}: ${message}`;
  if (shouldLogTimestamp) {
    formatted = `${timestamp} ${formatted}`;
  }
  return formatted;
});

const customFormatWithTimestamp = combine(
  label({ label: "streetwise" }),
  timestamp(),
  splat(),
  addressLogFormat
);

// Standard output is reserved for parsed results, so every level goes to
// standard error.
export const logger: Logger = createLogger({
  format: customFormatWithTimestamp,
  level: LOG_LEVEL,
  transports: [
    new transports.Console({ stderrLevels: Object.keys(config.npm.levels) }),
  ],
});

export function logStackTrace(logger: Logger, err: unknown): void {
  if (err instanceof Error) {
    logger.error(`${err.stack || err}`);
  } else {
    logger.error(String(err));
  }
}
