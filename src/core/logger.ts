/**
 * Structured Logger (Pino)
 * Layer: Core
 *
 * `createLogger()` builds the pino instance the data source logs through:
 * one JSON object per line, or pino-pretty output when `pretty` is set.
 * Connection secrets never reach a log line: any `password` or
 * `connectionString` field, at the top level or one object deep, is printed
 * as "[Redacted]".
 *
 * Modules depend on the exported `Logger` type, never on the instance, so the
 * adapter and connector receive it through the container and tests can pass
 * a silent one.
 */
import pino from 'pino';

import { config } from './config';

export type Logger = pino.Logger;
export type LogLevel = pino.LevelWithSilent;

export interface LoggerOptions {
  level: LogLevel;
  pretty?: boolean;
}

export const REDACTED_PATHS = ['password', '*.password', 'connectionString', '*.connectionString'];

export function createLogger(options: LoggerOptions, destination?: pino.DestinationStream): Logger {
  const settings: pino.LoggerOptions = {
    name: 'mysql-data-source',
    level: options.level,
    redact: { paths: REDACTED_PATHS, censor: '[Redacted]' },
  };

  // pino rejects a transport combined with an explicit destination
  if (destination) return pino(settings, destination);

  return pino({
    ...settings,
    transport: options.pretty
      ? {
          target: 'pino-pretty',
          options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' },
        }
      : undefined,
  });
}

export const logger = createLogger({ level: config.log.level, pretty: config.isDev });
