/**
 * Shared Test Fixtures
 *
 * Errors have their stacks replaced with fixed text so rendered output can be
 * asserted exactly rather than matched loosely.
 */
import { createErrorRequest, type ErrorRequest } from '@domain/entities/ErrorRequest';
import { HttpMethodNotAllowedError, HttpNotFoundError } from '@shared/errors/HttpError';

export function requestFor(method: string, accept?: string): ErrorRequest {
  return createErrorRequest(method, accept === undefined ? {} : { Accept: accept });
}

/** Sets a stack with no frames, as if the error came from nowhere. */
export function withoutTrace<T extends Error>(error: T): T {
  error.stack = `${error.name}: ${error.message}`;
  return error;
}

export function withTrace<T extends Error>(error: T, frame: string): T {
  error.stack = `${error.name}: ${error.message}\n    at ${frame}`;
  return error;
}

export function sampleNotFound(): HttpNotFoundError {
  return withoutTrace(new HttpNotFoundError('Widget 42 does not exist'));
}

export function sampleMethodNotAllowed(): HttpMethodNotAllowedError {
  return withoutTrace(new HttpMethodNotAllowedError(['GET', 'POST'], 'DELETE is not supported'));
}

/** A plain Error with one cause, both with deterministic stacks. */
export function sampleChainedFailure(): Error {
  const cause = withTrace(new Error('connection refused'), 'connect (db.ts:10:5)');
  return withoutTrace(new Error('could not load widgets', { cause }));
}

export const ERROR_LOG_NOTICE_TEXT =
  '\nView in rendered output by enabling the "displayErrorDetails" setting.\n';
