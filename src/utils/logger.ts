import { pino, destination, type Logger, type LoggerOptions } from 'pino';

const isDev = process.env['NODE_ENV'] !== 'production';

const options: LoggerOptions = {
  level: process.env['TASKOPT_LOG_LEVEL'] ?? (isDev ? 'info' : 'warn'),
  base: {
    pid: undefined,
    hostname: undefined,
  },
};

// stdout carries resolved values, so every log line goes to stderr
if (isDev) {
  options.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
      destination: 2,
    },
  };
}

export const logger: Logger = isDev ? pino(options) : pino(options, destination(2));

export function createLogger(module: string): Logger {
  return logger.child({ module });
}
