/**
 * HTTP-aware Error Hierarchy
 * Layer: Shared
 *
 * Any value can reach the error boundary, but only two kinds change what it
 * sends back:
 *
 *   1. HttpError: a failure that already knows its HTTP status, plus a
 *      client-safe title and description used by every renderer.
 *   2. HttpMethodNotAllowedError: an HttpError that also carries the methods
 *      the resource does accept, which end up in the `Allow` header.
 *
 * Everything else is an unclassified failure and becomes a 500.
 *
 * Callers never test `instanceof` themselves; they ask `asHttpError(value)`,
 * which returns the HTTP facts or undefined.
 *
 * Why `Object.setPrototypeOf(this, new.target.prototype)`?
 *   When you `extends Error`, the prototype chain can break in some
 *   compilation targets, making `instanceof HttpError` return false. This
 *   line repairs the chain so `asHttpError` always recognises subclasses.
 */

/** What the error boundary needs to know about an HTTP-aware failure. */
export interface HttpErrorInfo {
  statusCode: number;
  title: string;
  description: string;
  /** Present only for the method-not-allowed variant. */
  allowedMethods?: string;
}

export interface HttpErrorOptions {
  title?: string;
  description?: string;
  cause?: unknown;
}

export class HttpError extends Error {
  public readonly statusCode: number;
  public readonly title: string;
  public readonly description: string;

  constructor(message: string, statusCode: number, options: HttpErrorOptions = {}) {
    // Express rejects anything outside 100–999 when the response is written.
    if (!Number.isInteger(statusCode) || statusCode < 100 || statusCode > 599) {
      throw new RangeError(`Invalid HTTP status code: ${statusCode}`);
    }
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.title = options.title ?? `${statusCode} ${message}`;
    this.description = options.description ?? message;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }

  toHttpErrorInfo(): HttpErrorInfo {
    return {
      statusCode: this.statusCode,
      title: this.title,
      description: this.description,
    };
  }
}

export class HttpBadRequestError extends HttpError {
  constructor(message = 'Bad request.', options: HttpErrorOptions = {}) {
    super(message, 400, {
      title: '400 Bad Request',
      description: 'The server cannot or will not process the request due to an apparent client error.',
      ...options,
    });
  }
}

export class HttpUnauthorizedError extends HttpError {
  constructor(message = 'Unauthorized.', options: HttpErrorOptions = {}) {
    super(message, 401, {
      title: '401 Unauthorized',
      description: 'The request requires valid user authentication.',
      ...options,
    });
  }
}

export class HttpForbiddenError extends HttpError {
  constructor(message = 'Forbidden.', options: HttpErrorOptions = {}) {
    super(message, 403, {
      title: '403 Forbidden',
      description: 'You are not permitted to perform the requested operation.',
      ...options,
    });
  }
}

export class HttpNotFoundError extends HttpError {
  constructor(message = 'Not found.', options: HttpErrorOptions = {}) {
    super(message, 404, {
      title: '404 Not Found',
      description: 'The requested resource could not be found. Please verify the URI and try again.',
      ...options,
    });
  }
}

export class HttpMethodNotAllowedError extends HttpError {
  public readonly allowedMethods: readonly string[];

  constructor(allowedMethods: readonly string[], message = 'Method not allowed.', options: HttpErrorOptions = {}) {
    super(message, 405, {
      title: '405 Method Not Allowed',
      description: 'The request method is not supported for the requested resource.',
      ...options,
    });
    this.allowedMethods = [...allowedMethods];
  }

  /** Value for the `Allow` response header. */
  getAllowedMethods(): string {
    return this.allowedMethods.join(', ');
  }

  override toHttpErrorInfo(): HttpErrorInfo {
    return { ...super.toHttpErrorInfo(), allowedMethods: this.getAllowedMethods() };
  }
}

export class HttpInternalServerError extends HttpError {
  constructor(message = 'Internal server error.', options: HttpErrorOptions = {}) {
    super(message, 500, {
      title: '500 Internal Server Error',
      description: 'Unexpected condition encountered preventing server from fulfilling request.',
      ...options,
    });
  }
}

export class HttpNotImplementedError extends HttpError {
  constructor(message = 'Not implemented.', options: HttpErrorOptions = {}) {
    super(message, 501, {
      title: '501 Not Implemented',
      description: 'The server does not support the functionality required to fulfill the request.',
      ...options,
    });
  }
}

/** Builds the most specific HttpError for a status code. */
export function createHttpError(statusCode: number, message?: string): HttpError {
  switch (statusCode) {
    case 400:
      return new HttpBadRequestError(message);
    case 401:
      return new HttpUnauthorizedError(message);
    case 403:
      return new HttpForbiddenError(message);
    case 404:
      return new HttpNotFoundError(message);
    case 500:
      return new HttpInternalServerError(message);
    case 501:
      return new HttpNotImplementedError(message);
    default:
      return new HttpError(message ?? 'Error', statusCode);
  }
}

/** Capability query: the HTTP facts of `error`, or undefined when it carries none. */
export function asHttpError(error: unknown): HttpErrorInfo | undefined {
  return error instanceof HttpError ? error.toHttpErrorInfo() : undefined;
}
