/**
 * Last middleware in the chain. Express 5 forwards rejected async handlers
 * here, so controllers never wrap their awaits.
 *
 * - `AppError`: its status and message go back. Operational errors (bad
 *   input, upstream transport failures) log at warn; a `SchemaError` is not
 *   operational and logs at error, but its message still goes back with 502.
 * - body-parser errors (malformed JSON, body over the limit) carry their own
 *   4xx status and are answered with it.
 * - Anything else is a bug: logged in full, generic 500 to the client.
 */
import { logger } from '@core/logger';
import { AppError, type ErrorResponseBody } from '@shared/errors/AppError';
import type { NextFunction, Request, Response } from 'express';

interface ClientError {
  status: number;
  message: string;
}

/** body-parser marks client-caused errors with `expose` and a 4xx `status`. */
function asClientError(err: Error): ClientError | undefined {
  if (!('status' in err) || typeof err.status !== 'number') return undefined;
  if (err.status < 400 || err.status >= 500) return undefined;
  if (!('expose' in err) || err.expose !== true) return undefined;
  return { status: err.status, message: err.message };
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError) {
    const context = { statusCode: err.statusCode, name: err.name, message: err.message };
    if (err.isOperational) {
      logger.warn(context, 'Request failed');
    } else {
      logger.error(context, 'Request failed on an unexpected upstream response');
    }
    res.status(err.statusCode).json(err.toResponseBody());
    return;
  }

  const clientError = asClientError(err);
  if (clientError) {
    logger.warn({ statusCode: clientError.status, message: clientError.message }, 'Unreadable request body');
    const body: ErrorResponseBody = {
      status: 'error',
      error: 'BadRequestBody',
      message: clientError.message,
    };
    res.status(clientError.status).json(body);
    return;
  }

  logger.error({ err }, 'Unhandled error');
  res.status(500).json({ status: 'error', message: 'Internal server error' });
}
