/**
 * Express ↔ Error Boundary Adapter
 * Layer: Interfaces (HTTP)
 *
 * The error boundary works on ErrorRequest/ErrorResponse values; these two
 * functions translate at the Express edge in both directions.
 */
import { createErrorRequest, type ErrorRequest } from '@domain/entities/ErrorRequest';
import type { ErrorResponse } from '@domain/entities/ErrorResponse';
import type { Request, Response } from 'express';

export function fromExpressRequest(req: Request): ErrorRequest {
  return createErrorRequest(req.method, req.headers);
}

export function sendErrorResponse(res: Response, response: ErrorResponse): void {
  res.status(response.statusCode);
  for (const [name, value] of Object.entries(response.getHeaders())) {
    res.setHeader(name, value);
  }
  res.send(response.body);
}
