/**
 * Routing Fallbacks
 * Layer: Interfaces (HTTP)
 *
 * Turn "no route" and "wrong verb" into HTTP-aware errors so they reach the
 * error middleware like any other failure and get negotiated responses.
 */
import { HttpMethodNotAllowedError, HttpNotFoundError } from '@shared/errors/HttpError';
import type { NextFunction, Request, RequestHandler, Response } from 'express';

/** Register after every router; anything reaching it matched no route. */
export function notFoundHandler(req: Request, _res: Response, _next: NextFunction): void {
  throw new HttpNotFoundError(`No route for ${req.method} ${req.originalUrl}`);
}

/**
 * Terminal handler for a route: `router.route(path).get(...).all(methodNotAllowed(['GET']))`.
 */
export function methodNotAllowed(allowedMethods: readonly string[]): RequestHandler {
  return (req, _res, _next) => {
    throw new HttpMethodNotAllowedError(allowedMethods, `Method ${req.method} is not allowed on ${req.originalUrl}`);
  };
}
