/**
 * Root pino logger. JSON lines in production, `pino-pretty` in development.
 *
 * Services take a `Logger` through DI (TOKENS.Logger) rather than importing
 * this module, so tests hand them a silent instance. Every line carries the
 * service name; errors logged under `err` keep their stack and, for
 * AppErrors, their status.
 */
import pino from 'pino';
import { config } from './config';

export const SERVICE_NAME = 'disclosure-ingest';

export const logger = pino({
  name: SERVICE_NAME,
  level: config.log.level,
  serializers: { err: pino.stdSerializers.err },
  transport: config.isDev
    ? {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' },
      }
    : undefined,
});

export type Logger = pino.Logger;
