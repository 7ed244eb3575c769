import type { ErrorRequest } from '@domain/entities/ErrorRequest';
import type { ErrorResponse } from '@domain/entities/ErrorResponse';

/**
 * Error Handler Interface
 * Layer: Domain
 *
 * Turns a caught failure into a finished response. ErrorResponseHandler is
 * the default; ErrorMiddleware also accepts plain functions of this shape
 * for specific error classes.
 */
export type ErrorHandlerFunction = (
  request: ErrorRequest,
  response: ErrorResponse,
  error: unknown,
  displayErrorDetails: boolean,
) => ErrorResponse;

export interface IErrorHandler {
  handle: ErrorHandlerFunction;
}
