/**
 * Express Application Factory
 * Layer: Interfaces (HTTP)
 * Pattern: Factory Function
 *
 * Returns a fresh app per call, so each cluster worker and each integration
 * test gets its own instance.
 *
 * Middleware ordering:
 *   1. helmet()        — security headers.
 *   2. cors()          — with `preflightContinue`, so OPTIONS requests travel
 *                        on to the routes and, failing there, resolve to 200
 *                        at the error boundary instead of being answered here.
 *   3. compression()   — gzips bodies, error pages included.
 *   4. express.json()  — parses JSON request bodies.
 *   5. requestLogger   — logs every request/response with timing.
 *   6. Routes.
 *   7. notFoundHandler — anything unmatched becomes an HttpNotFoundError.
 *   8. ErrorMiddleware — MUST be last; negotiates every error response.
 *
 * Importing the container bootstraps every registration. The ErrorMiddleware
 * is resolved when the app is built, so tests can register replacement
 * settings or sinks beforehand.
 */
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import type { ErrorMiddleware } from '@interfaces/http/middleware/errorHandler';
import { requestLogger } from '@interfaces/http/middleware/requestLogger';
import { notFoundHandler } from '@interfaces/http/middleware/routing';
import { errorRoutes } from '@interfaces/http/routes/errorRoutes';
import { healthRoutes } from '@interfaces/http/routes/healthRoutes';
import compression from 'compression';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';

export function createApp(): express.Express {
  const app = express();

  // Security & compression
  app.use(helmet());
  app.use(cors({ preflightContinue: true }));
  app.use(compression());

  // Body parsing
  app.use(express.json());

  // Request logging
  app.use(requestLogger);

  // Routes
  app.use('/api/v1', healthRoutes);
  app.use('/api/v1', errorRoutes);

  // Unmatched routes, then the error boundary (must be registered last)
  app.use(notFoundHandler);
  app.use(container.resolve<ErrorMiddleware>(TOKENS.ErrorMiddleware).middleware());

  return app;
}
