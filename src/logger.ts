import path from 'node:path';
import { fileURLToPath } from 'node:url';
import pino, { type Logger } from 'pino';
import type { LoggingConfig } from './config.js';

export type { Logger };

type CreateLoggerOptions = LoggingConfig & {
  console?: boolean;
};

/** Log file stem for an entry point given as a path or a `file:` URL. */
export function logNameFor(entryPoint: string): string {
  const file = entryPoint.startsWith('file:') ? fileURLToPath(entryPoint) : entryPoint;
  return path.parse(file).name;
}

/**
 * One JSON line per event (`time`, `level`, `msg`) appended to
 * `<logDir>/<entry point>.log`, mirrored to stdout unless `console` is false.
 */
export function createLogger(entryPoint: string, options: CreateLoggerOptions): Logger {
  const file = path.join(options.logDir, `${logNameFor(entryPoint)}.log`);
  const destination = pino.destination({ dest: file, mkdir: true, sync: true });
  const settings: pino.LoggerOptions = {
    level: options.level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (options.console === false) {
    return pino(settings, destination);
  }

  const streamLevel = options.level === 'silent' ? 'fatal' : options.level;
  return pino(
    settings,
    pino.multistream([
      { level: streamLevel, stream: process.stdout },
      { level: streamLevel, stream: destination },
    ])
  );
}
