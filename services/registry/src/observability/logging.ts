import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** The slice of pino the use cases log through; `app.log` satisfies it. */
export type ServiceLogger = Pick<pino.BaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

const REDACT_PATHS = ['req.headers.authorization', 'req.headers.cookie'];

export const loggerOptions = (level: LogLevel = 'info') => ({
  level,
  redact: REDACT_PATHS,
  base: { service: 'registry' }
});

export const createLogger = (level: LogLevel = 'info', destination?: pino.DestinationStream) =>
  destination ? pino(loggerOptions(level), destination) : pino(loggerOptions(level));
