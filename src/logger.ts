import pino from "pino";

/**
 * Creates a configured pino logger instance for structured JSON output.
 *
 * - Level label emitted as a string, ISO 8601 timestamps
 * - Level from `LOG_LEVEL`, defaulting to `info`
 * - Writes to stdout unless a destination is given
 *
 * @param level - Optional override for the log level
 * @param destination - Optional stream to write to instead of stdout
 */
export function createLogger(
  level?: string,
  destination?: pino.DestinationStream,
): pino.Logger {
  const options: pino.LoggerOptions = {
    name: "feed-relay",
    level: level ?? process.env["LOG_LEVEL"] ?? "info",
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  return destination ? pino(options, destination) : pino(options);
}
