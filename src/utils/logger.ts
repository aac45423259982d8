import pino, { type LoggerOptions } from 'pino';
import type { Config } from '../config/index.js';

type LoggingSettings = Pick<Config['server'], 'nodeEnv' | 'logLevel'>;

const levelFor = ({ nodeEnv, logLevel }: LoggingSettings): string => (nodeEnv === 'test' ? 'silent' : logLevel);

export const loggerOptions = (settings: LoggingSettings): LoggerOptions => ({
  level: levelFor(settings),
  transport:
    settings.nodeEnv === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

// The transport is fixed at creation, before configuration is loaded.
const runtime = process.env.NODE_ENV;
const nodeEnv: LoggingSettings['nodeEnv'] = runtime === 'production' || runtime === 'test' ? runtime : 'development';

export const logger = pino(loggerOptions({ nodeEnv, logLevel: 'info' }));

/** Applies the configured level; entry points call this once after `loadConfig`. */
export const configureLogger = (settings: LoggingSettings): void => {
  logger.level = levelFor(settings);
};
