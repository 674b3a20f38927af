/**
 *   GET /api/v1/health  →  { status, uptime, timestamp, pid, sourceTimezone }
 *
 * Liveness only: no upstream call, no database query. The access log skips
 * this path. `pid` tells which cluster worker answered.
 */
import { config } from '@core/config';
import { Router } from 'express';

const router = Router();

router.get('/health', (_req, res) => {
  res.status(200).json({
    status: 'ok',
    uptime: process.uptime(),
    timestamp: new Date().toISOString(),
    pid: process.pid,
    sourceTimezone: config.upstream.timezone,
  });
});

export { router as healthRoutes };
