import { createConsola, type LogObject } from 'consola';
import fs from 'fs';
import path from 'path';

/**
 * Central logger module.
 *
 * Provides a singleton logger backed by consola. Before `initLogger()` is called,
 * the logger outputs to console only at info level. `initLogger()` recreates it
 * at the requested level and can additionally append structured NDJSON entries
 * to a log file.
 *
 * Callers prefix messages with a bracketed component tag, e.g. `[matcher]`.
 *
 * @module shared/logger
 */

/** Options accepted by {@link initLogger}. */
export interface LoggerOptions {
  /** Numeric log level (0=fatal … 5=trace). Defaults to 4 (debug) in dev, 3 (info) in production. */
  level?: number;
  /** Append NDJSON entries to this file in addition to console output. */
  logFile?: string;
}

/**
 * Create an NDJSON file reporter that appends structured log entries to disk.
 */
function createFileReporter(logFile: string) {
  return {
    log(logObj: LogObject) {
      const entry = JSON.stringify({
        level: logObj.type,
        time: logObj.date.toISOString(),
        msg: logObj.args.map(String).join(' '),
        tag: logObj.tag || undefined,
      });
      fs.appendFileSync(logFile, entry + '\n');
    },
  };
}

/** Default logger instance (console-only until initLogger is called). */
export let logger = createConsola({
  level: 3, // info
});

/**
 * Initialize the logger with the configured log level and optional file persistence.
 * Call once at startup after config is loaded.
 */
export function initLogger(options?: LoggerOptions): void {
  const level = options?.level ?? (process.env.NODE_ENV === 'production' ? 3 : 4);

  logger = createConsola({ level });

  if (options?.logFile) {
    fs.mkdirSync(path.dirname(options.logFile), { recursive: true });
    logger.addReporter(createFileReporter(options.logFile));
  }
}
