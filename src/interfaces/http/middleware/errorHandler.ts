/**
 * Error Middleware — the last link of the Express chain
 * Layer: Interfaces (HTTP)
 *
 * Express recognises an error handler by its four parameters
 * (err, req, res, next) and routes every thrown or rejected failure here.
 * Express 5 forwards rejected promises from async handlers automatically.
 *
 * Handler selection:
 *   1. a handler registered for the error's exact class;
 *   2. otherwise the first registered class the error is an instance of;
 *   3. otherwise the default handler (ErrorResponseHandler unless replaced).
 *
 * If the response has already started streaming there is nothing left to
 * negotiate, so the error goes to Express's own final handler, which closes
 * the connection.
 */
import { TOKENS } from '@core/types';
import { ErrorResponse } from '@domain/entities/ErrorResponse';
import type { ErrorHandlerFunction, IErrorHandler } from '@domain/interfaces/IErrorHandler';
import type { ErrorRequestHandler } from 'express';
import { inject, injectable } from 'tsyringe';

import { fromExpressRequest, sendErrorResponse } from '../expressAdapter';

export interface ErrorMiddlewareSettings {
  displayErrorDetails: boolean;
}

export type ErrorClass = abstract new (...args: never[]) => Error;

interface RegisteredHandler {
  errorType: ErrorClass;
  handler: ErrorHandlerFunction;
}

function toHandlerFunction(handler: IErrorHandler | ErrorHandlerFunction): ErrorHandlerFunction {
  return typeof handler === 'function' ? handler : handler.handle;
}

@injectable()
export class ErrorMiddleware {
  private readonly handlers: RegisteredHandler[] = [];
  private defaultHandler: ErrorHandlerFunction;
  private readonly displayErrorDetails: boolean;

  constructor(
    @inject(TOKENS.DefaultErrorHandler) defaultHandler: IErrorHandler,
    @inject(TOKENS.ErrorMiddlewareSettings) settings: ErrorMiddlewareSettings,
  ) {
    this.defaultHandler = toHandlerFunction(defaultHandler);
    this.displayErrorDetails = settings.displayErrorDetails;
  }

  /** Registers (or replaces) the handler for one error class and its subclasses. */
  setErrorHandler(errorType: ErrorClass, handler: IErrorHandler | ErrorHandlerFunction): this {
    const entry = { errorType, handler: toHandlerFunction(handler) };
    const index = this.handlers.findIndex((registered) => registered.errorType === errorType);
    if (index === -1) {
      this.handlers.push(entry);
    } else {
      this.handlers[index] = entry;
    }
    return this;
  }

  setDefaultErrorHandler(handler: IErrorHandler | ErrorHandlerFunction): this {
    this.defaultHandler = toHandlerFunction(handler);
    return this;
  }

  getDefaultErrorHandler(): ErrorHandlerFunction {
    return this.defaultHandler;
  }

  getErrorHandler(error: unknown): ErrorHandlerFunction {
    if (typeof error === 'object' && error !== null) {
      const exact = this.handlers.find(({ errorType }) => error.constructor === errorType);
      if (exact) {
        return exact.handler;
      }
    }

    const inherited = this.handlers.find(({ errorType }) => error instanceof errorType);
    return inherited?.handler ?? this.defaultHandler;
  }

  middleware(): ErrorRequestHandler {
    return (err, req, res, next) => {
      if (res.headersSent) {
        next(err);
        return;
      }

      const handler = this.getErrorHandler(err);
      const response = handler(fromExpressRequest(req), ErrorResponse.create(), err, this.displayErrorDetails);
      sendErrorResponse(res, response);
    };
  }
}
