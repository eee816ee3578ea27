import type { Logger, LoggingOptions } from "../Types/index.js";

/** Silent for debug/info, forwards warnings and errors to the console. */
export const defaultLogger: Logger = {
  debug: () => {},
  info: () => {},
  log: () => {},
  warn: (message, meta) => {
    // eslint-disable-next-line no-console
    console.warn(message, meta?.detail ?? "");
  },
  error: (message, meta) => {
    // eslint-disable-next-line no-console
    console.error(message, meta?.err ?? meta?.detail ?? "");
  },
};

export interface ResolvedLogging {
  logger: Logger;
  debug: boolean;
  verbose: boolean;
  loggerTag: string;
}

export function getTimeString(): string {
  return new Date().toLocaleTimeString("en-GB", { hour12: false });
}

export function resolveLogging(options: LoggingOptions = {}): ResolvedLogging {
  return {
    logger: options.logger ?? defaultLogger,
    debug: options.debug ?? false,
    verbose: options.verbose ?? false,
    loggerTag: options.loggerTag ?? `ffmpeg_${Date.now()}`,
  };
}

export function formatLogMessage(config: ResolvedLogging, message: string): string {
  return `[${getTimeString()}] [${config.loggerTag}] ${message}`;
}

/** Debug output, only when `debug` or `verbose` is enabled. */
export function debugLog(config: ResolvedLogging, message: string): void {
  if (config.debug || config.verbose) {
    config.logger.debug(formatLogMessage(config, message));
  }
}
