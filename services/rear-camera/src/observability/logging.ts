import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type ServiceLogger = Pick<pino.BaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

export const loggerOptions = (level: LogLevel = 'info') => ({
  level,
  base: { service: 'rear-camera' }
});
