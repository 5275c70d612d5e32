import fs from 'fs';
import path from 'path';
import pino from 'pino';
import type { Logger, LoggerConfig } from './types.js';

export const DEFAULT_LOG_FILE = 'agentry.log';

function wrap(base: pino.Logger): Logger {
  return {
    debug: (message, data) => base.debug(data ?? {}, message),
    info: (message, data) => base.info(data ?? {}, message),
    warn: (message, data) => base.warn(data ?? {}, message),
    error: (message, data) => base.error(data ?? {}, message)
  };
}

/**
 * JSON-lines logger writing to a file, so the interactive shell's own output
 * stays readable.
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const file = path.resolve(config.file ?? DEFAULT_LOG_FILE);
  fs.mkdirSync(path.dirname(file), { recursive: true });

  const base = pino(
    {
      level: config.level ?? 'info',
      base: { pid: process.pid },
      timestamp: pino.stdTimeFunctions.isoTime
    },
    pino.destination({ dest: file, sync: false })
  );
  return wrap(base);
}

export function childLogger(logger: Logger, bindings: Record<string, unknown>): Logger {
  return {
    debug: (message, data) => logger.debug(message, { ...bindings, ...data }),
    info: (message, data) => logger.info(message, { ...bindings, ...data }),
    warn: (message, data) => logger.warn(message, { ...bindings, ...data }),
    error: (message, data) => logger.error(message, { ...bindings, ...data })
  };
}

export function createNullLogger(): Logger {
  return {
    debug: (_message: string, _data?: Record<string, unknown>) => {},
    info: (_message: string, _data?: Record<string, unknown>) => {},
    warn: (_message: string, _data?: Record<string, unknown>) => {},
    error: (_message: string, _data?: Record<string, unknown>) => {}
  };
}
