/**
 * Simulated Failure Routes
 * Layer: Interfaces (HTTP)
 *
 * Deliberately failing endpoints for checking the error boundary end to end
 * (status, negotiated representation, detail switch, log entry):
 *
 *   GET /api/v1/errors/unhandled  → plain Error with a cause chain → 500
 *   GET /api/v1/errors/:status    → HttpError for any 4xx/5xx status except
 *                                   405, which needs real allowed methods
 *                                   (see POST /api/v1/health)
 */
import { createHttpError } from '@shared/errors/HttpError';
import { Router } from 'express';
import { z } from 'zod/v4';

import { validate } from '../middleware/validation';

const statusParamsSchema = z.object({
  status: z.coerce
    .number()
    .int()
    .min(400, 'status must be 4xx or 5xx')
    .max(599, 'status must be 4xx or 5xx')
    .refine((status) => status !== 405, 'status 405 is only raised by routes with allowed methods'),
});

const router = Router();

router.get('/errors/unhandled', () => {
  throw new Error('Simulated failure', { cause: new Error('Upstream dependency timed out') });
});

router.get('/errors/:status', validate(statusParamsSchema, 'params'), (req) => {
  throw createHttpError(Number(req.params.status), 'Simulated failure');
});

export { router as errorRoutes };
