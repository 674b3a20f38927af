/**
 * Builds the Express app for one cluster worker (and for each Supertest
 * suite). Importing `@core/container` first bootstraps DI before any
 * controller resolves a service.
 *
 * Routes under /api/v1:
 *   GET  /health           liveness, no I/O
 *   GET  /upstream/health  one maintenance check per endpoint
 *   POST /ingest           run an ingestion window
 *
 * `errorHandler` stays last.
 */
import '@core/container';

import { errorHandler } from '@interfaces/http/middleware/errorHandler';
import { requestLogger } from '@interfaces/http/middleware/requestLogger';
import { healthRoutes } from '@interfaces/http/routes/healthRoutes';
import { ingestionRoutes } from '@interfaces/http/routes/ingestionRoutes';
import { upstreamRoutes } from '@interfaces/http/routes/upstreamRoutes';
import compression from 'compression';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';

/** Ingestion bodies are a window and a few filters. */
const JSON_BODY_LIMIT = '16kb';

export function createApp(): express.Express {
  const app = express();

  app.use(requestLogger);
  app.use(helmet(), cors(), compression());
  app.use(express.json({ limit: JSON_BODY_LIMIT }));

  const api = express.Router();
  api.use(healthRoutes);
  api.use('/upstream', upstreamRoutes);
  api.use(ingestionRoutes);
  app.use('/api/v1', api);

  app.use(errorHandler);

  return app;
}
