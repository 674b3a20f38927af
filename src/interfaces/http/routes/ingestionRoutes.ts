/**
 * Ingestion Routes
 * Layer: Interfaces (HTTP)
 *
 *   POST /api/v1/ingest  { "from": "2024-01-01", "to": "2024-02-01", "filters": { ... } }
 *
 * Mounted under `/api/v1` in app.ts. The CLI (npm run ingest) is the usual
 * way to run a monthly ingestion; this endpoint exists for programmatic
 * triggering.
 */
import { IngestionController } from '@interfaces/http/controllers/IngestionController';
import { validate } from '@interfaces/http/middleware/validation';
import { ingestRequestSchema } from '@interfaces/http/schemas/ingestRequest';
import { Router } from 'express';

const router = Router();
const controller = new IngestionController();

router.post('/ingest', validate(ingestRequestSchema), controller.ingest);

export { router as ingestionRoutes };
