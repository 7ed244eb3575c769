/**
 * Request Validation Middleware Factory
 * Layer: Interfaces (HTTP)
 *
 * `validate(schema, source)` returns a middleware that checks one part of the
 * request against a Zod schema before the route handler runs:
 *
 *   router.get('/errors/:status', validate(statusParamsSchema, 'params'), handler);
 *
 * Only the verdict is used; handlers read the already-checked values from
 * the request (Express 5 exposes `req.query` as a getter, so it cannot be
 * replaced with the parsed copy).
 *
 * On failure: throws an HttpBadRequestError, which the error middleware turns
 * into a negotiated 400 response. The route handler is never reached.
 */
import { HttpBadRequestError } from '@shared/errors/HttpError';
import type { NextFunction, Request, Response } from 'express';
import type { z } from 'zod/v4';

export type RequestSource = 'query' | 'body' | 'params';

export function validate<T extends z.ZodType>(schema: T, source: RequestSource) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req[source]);

    if (!result.success) {
      const messages = result.error.issues.map((issue) => issue.message).join('; ');
      throw new HttpBadRequestError(messages);
    }
    next();
  };
}
