/**
 * HTTP access log.
 *
 * One pino line per finished request, on the root logger. Liveness polls are
 * not logged: load balancers hit them every few seconds. Status decides the
 * level, so a run rejected by validation shows up as `warn` and a failed run
 * as `error` without grepping messages.
 */
import { logger } from '@core/logger';
import type { LevelWithSilent } from 'pino';
import pinoHttp from 'pino-http';

export const LIVENESS_PATH = '/api/v1/health';

export function levelForStatus(statusCode: number, err?: Error): LevelWithSilent {
  if (err || statusCode >= 500) return 'error';
  if (statusCode >= 400) return 'warn';
  return 'info';
}

export const requestLogger = pinoHttp({
  logger,
  autoLogging: { ignore: (req) => req.url === LIVENESS_PATH },
  customLogLevel: (_req, res, err) => levelForStatus(res.statusCode, err),
  customSuccessMessage: (req, res, responseTime) =>
    `${req.method} ${req.url} ${res.statusCode} in ${Math.round(responseTime)}ms`,
});
