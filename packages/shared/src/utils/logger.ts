import pino, { type DestinationStream, type Logger } from "pino";

export type { Logger } from "pino";

export interface LoggerOptions {
  /** Overrides LOG_LEVEL for this logger. */
  level?: string;
  /** Where log lines go. Defaults to stdout. */
  destination?: DestinationStream;
}

/**
 * Create a pino logger for one netpulse component.
 *
 * Every line is JSON with an ISO timestamp, the component `name` and a
 * textual `level` label. The level comes from `options.level`, then the
 * LOG_LEVEL environment variable, then "info".
 *
 *   const logger = createLogger("monitor:scheduler");
 *   logger.info({ targetId }, "Probe dispatched");
 *   logger.error({ err }, "Recorder write failed");
 */
export function createLogger(serviceName: string, options: LoggerOptions = {}): Logger {
  const config = {
    name: serviceName,
    level: options.level ?? process.env["LOG_LEVEL"] ?? "info",
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
  };

  return options.destination ? pino(config, options.destination) : pino(config);
}
