/**
 * Upstream Routes
 * Layer: Interfaces (HTTP)
 *
 *   GET /api/v1/upstream/health  →  { status: 'success', data: { endpoints: [{ id, url, format, verdict }] } }
 *
 * Unlike /health this one leaves the process: every call sends one probe
 * request per endpoint.
 */
import { UpstreamController } from '@interfaces/http/controllers/UpstreamController';
import { Router } from 'express';

const router = Router();
const controller = new UpstreamController();

router.get('/health', controller.health);

export { router as upstreamRoutes };
