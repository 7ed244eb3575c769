/**
 * Status code for a failure. OPTIONS requests always answer 200 so that
 * preflight-style requests never show up as failures.
 */
import { asHttpError } from '@shared/errors/HttpError';

export function determineStatusCode(method: string, error: unknown): number {
  if (method === 'OPTIONS') {
    return 200;
  }

  return asHttpError(error)?.statusCode ?? 500;
}
