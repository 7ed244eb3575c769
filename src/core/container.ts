/**
 * Dependency Injection Container
 * Layer: Core
 *
 * The single place where every dependency is wired. `reflect-metadata` must
 * be imported first so the tsyringe decorators can record constructor
 * parameter metadata.
 *
 * Settings objects are registered with `useValue` from config; classes with
 * `useClass`. Tests override any token with `container.register(...)` before
 * creating the app.
 */
import 'reflect-metadata';

import { ErrorRendererFactory } from '@application/factories/ErrorRendererFactory';
import {
  type ErrorHandlerSettings,
  ErrorResponseHandler,
} from '@application/services/ErrorResponseHandler';
import { PinoErrorLogSink } from '@infrastructure/logging/PinoErrorLogSink';
import {
  ErrorMiddleware,
  type ErrorMiddlewareSettings,
} from '@interfaces/http/middleware/errorHandler';
import { container } from 'tsyringe';

import { config } from './config';
import { logger } from './logger';
import { TOKENS } from './types';

container.register(TOKENS.Logger, { useValue: logger });
container.register<ErrorHandlerSettings>(TOKENS.ErrorHandlerSettings, {
  useValue: {
    logErrors: config.errors.logErrors,
    logErrorDetails: config.errors.logErrorDetails,
    renderer: config.errors.renderer,
  },
});
container.register<ErrorMiddlewareSettings>(TOKENS.ErrorMiddlewareSettings, {
  useValue: { displayErrorDetails: config.errors.displayErrorDetails },
});
container.register(TOKENS.ErrorLogSink, { useClass: PinoErrorLogSink });
container.register(TOKENS.ErrorRendererFactory, { useClass: ErrorRendererFactory });
container.register(TOKENS.DefaultErrorHandler, { useClass: ErrorResponseHandler });
container.register(TOKENS.ErrorMiddleware, { useClass: ErrorMiddleware });

export { container };
