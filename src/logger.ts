import { pino, type DestinationStream, type LevelWithSilent, type Logger } from "pino";

export interface LoggerOptions {
  /** Pino log level: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent' */
  level?: LevelWithSilent;
  /** Custom destination stream; stdout when omitted */
  destination?: DestinationStream;
}

/** Creates the process logger. */
export function createLogger(options: LoggerOptions = {}): Logger {
  const pinoOptions = {
    name: "geo-area-analysis",
    level: options.level ?? "info",
  };
  return options.destination
    ? pino(pinoOptions, options.destination)
    : pino(pinoOptions);
}

/** Logger that discards everything; the default for embedded use and tests. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export type { Logger, LevelWithSilent } from "pino";
