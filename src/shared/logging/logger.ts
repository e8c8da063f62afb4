import pino from 'pino';
import pretty from 'pino-pretty';
import type { LogLevel } from '../types/config';
import type { Logger } from '../types/logging';

export interface LoggerOptions {
  level: LogLevel;
  pretty: boolean;
  /**
   * Where JSON lines go when `pretty` is off. Defaults to stdout.
   */
  destination?: pino.DestinationStream;
}

export function createPinoLogger(options: LoggerOptions): pino.Logger {
  const pinoOptions: pino.LoggerOptions = {
    level: options.level,
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
  };

  if (options.pretty) {
    return pino(
      pinoOptions,
      pretty({
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname',
        sync: true,
      }),
    );
  }

  return options.destination
    ? pino(pinoOptions, options.destination)
    : pino(pinoOptions);
}

/**
 * Adapts a pino logger to the levels the uploader logs at.
 */
export function fromPino(logger: pino.Logger): Logger {
  return {
    error: (message) => logger.error(message),
    warning: (message) => logger.warn(message),
    notice: (message) => logger.info(message),
    success: (message) => logger.info(message),
    verbose: (message) => logger.debug(message),
  };
}

export function createLogger(options: LoggerOptions): Logger {
  return fromPino(createPinoLogger(options));
}
