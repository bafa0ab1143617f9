import { pino, type Logger, type DestinationStream, type LevelWithSilent, type LoggerOptions as PinoOptions } from "pino";

export type { Logger };

export interface LoggerOptions {
  level?: LevelWithSilent;
  destination?: DestinationStream;
  /** Human-readable output through pino-pretty, for terminals */
  pretty?: boolean;
}

const LEVELS: readonly LevelWithSilent[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export function isLogLevel(value: string): value is LevelWithSilent {
  return LEVELS.some((level) => level === value);
}

/**
 * Parse a level name (e.g. from an environment variable), falling back to `info`.
 */
export function parseLogLevel(value: string | undefined): LevelWithSilent {
  const normalized = value?.trim().toLowerCase();
  return LEVELS.find((level) => level === normalized) ?? "info";
}

/**
 * Structured JSON logger shared by every component.
 * Level defaults to CONTACTSHARE_LOG_LEVEL, then `info`.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? parseLogLevel(process.env.CONTACTSHARE_LOG_LEVEL);
  const settings: PinoOptions = { name: "contactshare", level };

  if (options.destination) {
    return pino(settings, options.destination);
  }
  if (options.pretty) {
    return pino({
      ...settings,
      transport: {
        target: "pino-pretty",
        options: {
          translateTime: "HH:MM:ss Z",
          ignore: "pid,hostname",
          colorize: true,
        },
      },
    });
  }
  return pino(settings);
}
