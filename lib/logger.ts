import pino, { type Logger, type LoggerOptions } from 'pino';

/**
 * Logger settings for an environment: JSON lines in production, pino-pretty
 * everywhere else
 */
export function loggerOptions(env: NodeJS.ProcessEnv = process.env): LoggerOptions {
  const base: LoggerOptions = {
    name: 'netprobe',
    level: env['LOG_LEVEL'] ?? 'info',
  };

  if (env['NODE_ENV'] === 'production') {
    return base;
  }

  return {
    ...base,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname,name',
        messageFormat: '{if component}[{component}] {end}{msg}',
      },
    },
  };
}

export const logger = pino(loggerOptions());

export function componentLogger(component: string): Logger {
  return logger.child({ component });
}
