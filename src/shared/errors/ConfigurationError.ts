/**
 * Raised when the embedding application wires the error boundary incorrectly
 * (for example, a forced renderer that does not implement IErrorRenderer).
 *
 * This is never turned into an HTTP response: it escapes the handler so the
 * misconfiguration surfaces where it was made.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}
