import pino, { type Logger } from 'pino';

export interface LoggerOptions {
  verbose?: boolean;
  /** Pretty-print through pino-pretty (terminal use) */
  pretty?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.verbose ? 'debug' : 'info';

  if (options.pretty === false) {
    return pino({ name: 'animdata', level });
  }

  return pino({
    name: 'animdata',
    level,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
        translateTime: 'HH:MM:ss',
      },
    },
  });
}
