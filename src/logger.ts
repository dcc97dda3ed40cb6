import pino from "pino";

/**
 * Creates the pino logger shared by both entry points.
 *
 * - String level labels instead of numbers
 * - ISO 8601 timestamps
 * - Level from the argument, then `LOG_LEVEL`, then `info`
 * - Writes JSON to the given destination (stderr by default, so stdout stays
 *   free for command output)
 *
 * @param level - Optional override for the log level
 * @param destination - Optional pino destination stream
 */
export function createLogger(
  level?: string,
  destination: pino.DestinationStream = pino.destination(2),
): pino.Logger {
  return pino(
    {
      level: level ?? process.env["LOG_LEVEL"] ?? "info",
      formatters: {
        level(label: string) {
          return { level: label };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination,
  );
}
