/**
 * Health Check Route
 * Layer: Interfaces (HTTP)
 *
 *   GET /api/v1/health  →  { status: 'ok', uptime: 123.4, timestamp: '...' }
 *
 * Any other method gets a negotiated 405 with `Allow: GET`.
 */
import { Router } from 'express';

import { methodNotAllowed } from '../middleware/routing';

const router = Router();

router
  .route('/health')
  .get((_req, res) => {
    res.status(200).json({
      status: 'ok',
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
    });
  })
  .all(methodNotAllowed(['GET']));

export { router as healthRoutes };
