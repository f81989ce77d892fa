import pino from "pino";

export const SERVICE_NAME = "feed-relay";

/**
 * Creates the relay's pino logger: one JSON object per line on stdout, so
 * cron mail and journald capture it as-is.
 *
 * Every line carries `service` and `pid`, a string `level` label and an ISO
 * `time`. The hostname binding is dropped since the relay runs as a single
 * instance. Level resolution order: explicit argument, `LOG_LEVEL`, `info`.
 *
 * @param level - The config file's `logLevel`, when set
 * @param destination - Alternate sink; tests pass an in-memory stream
 */
export function createLogger(
  level?: string,
  destination?: pino.DestinationStream,
): pino.Logger {
  const options: pino.LoggerOptions = {
    level: level ?? process.env["LOG_LEVEL"] ?? "info",
    base: { service: SERVICE_NAME, pid: process.pid },
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  return destination ? pino(options, destination) : pino(options);
}
