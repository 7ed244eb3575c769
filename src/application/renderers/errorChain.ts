/**
 * Flattens an error and its `cause` chain into the fragments the renderers
 * print when details are enabled.
 */
import { asHttpError } from '@shared/errors/HttpError';

export interface ErrorFragment {
  type: string;
  /** HTTP status for HTTP-aware errors, otherwise the error's own `code` when it has one. */
  code: string | number | undefined;
  message: string;
  trace: string[];
}

/** Guards against self-referencing cause chains. */
const MAX_CHAIN_LENGTH = 16;

export function describeErrorChain(error: Error): ErrorFragment[] {
  const fragments: ErrorFragment[] = [];
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (current instanceof Error && !seen.has(current) && fragments.length < MAX_CHAIN_LENGTH) {
    seen.add(current);
    fragments.push(describeError(current));
    current = current.cause;
  }

  return fragments;
}

function describeError(error: Error): ErrorFragment {
  return {
    type: error.name,
    code: asHttpError(error)?.statusCode ?? readOwnCode(error),
    message: error.message,
    trace: stackFrames(error),
  };
}

function readOwnCode(error: Error): string | number | undefined {
  if (!('code' in error)) {
    return undefined;
  }
  const { code } = error;
  return typeof code === 'string' || typeof code === 'number' ? code : undefined;
}

/** The "at ..." lines of the stack, without the leading "Name: message" header. */
function stackFrames(error: Error): string[] {
  if (!error.stack) {
    return [];
  }
  return error.stack
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.startsWith('at '));
}
