import pino from 'pino';
import type { AppConfig } from '../config';

export type Logger = pino.Logger;

export const createLogger = (config: Pick<AppConfig, 'nodeEnv' | 'logLevel'>): Logger => {
  const transport: pino.TransportSingleOptions | undefined =
    config.nodeEnv === 'development'
      ? {
          target: 'pino-pretty',
          options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' }
        }
      : undefined;

  return pino({
    name: 'schemagraph-api',
    level: config.logLevel,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: label => ({ level: label })
    },
    transport
  });
};
