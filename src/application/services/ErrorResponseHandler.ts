/**
 * Error Response Handler — the terminal error boundary
 * Layer: Application
 *
 * Given the request, a baseline response and whatever was thrown, this
 * produces the finished error response. The sequence is fixed:
 *
 *   1. status code        (OPTIONS → 200, HttpError → its code, else 500)
 *   2. content type       (narrow Accept negotiation, see contentNegotiation.ts)
 *   3. renderer           (forced renderer if set, else by content type)
 *   4. diagnostic log     (plain text + operator notice, only if logErrors)
 *   5. body               (renderer output, details only if displayErrorDetails)
 *   6. Allow header       (method-not-allowed errors only)
 *   7. status, Content-Type and body applied to the response
 *
 * Every request-level failure is absorbed into a response. The single
 * exception is ConfigurationError from step 3: a broken forced renderer is a
 * wiring mistake and must escape to whoever wired it.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { ErrorRequest } from '@domain/entities/ErrorRequest';
import type { ErrorResponse } from '@domain/entities/ErrorResponse';
import type { IErrorHandler } from '@domain/interfaces/IErrorHandler';
import type { IErrorLogSink } from '@domain/interfaces/IErrorLogSink';
import { type IErrorRenderer, isErrorRenderer } from '@domain/interfaces/IErrorRenderer';
import { ERROR_LOG_NOTICE, type MediaType, type RendererName } from '@shared/constants';
import { ConfigurationError } from '@shared/errors/ConfigurationError';
import { asHttpError } from '@shared/errors/HttpError';
import { inspect } from 'node:util';
import { inject, injectable } from 'tsyringe';

import { ErrorRendererFactory } from '../factories/ErrorRendererFactory';
import { negotiateContentType } from '../negotiation/contentNegotiation';
import { determineStatusCode } from '../negotiation/statusCode';

export type RendererOverride = IErrorRenderer | RendererName;

export interface ErrorHandlerSettings {
  logErrors: boolean;
  /** Passed to the plain-text renderer when building the log entry. */
  logErrorDetails: boolean;
  renderer?: RendererOverride;
}

export interface ResolvedOutcome {
  statusCode: number;
  contentType: MediaType;
  renderer: IErrorRenderer;
}

@injectable()
export class ErrorResponseHandler implements IErrorHandler {
  private readonly logErrors: boolean;
  private readonly logErrorDetails: boolean;
  private rendererOverride: RendererOverride | undefined;

  constructor(
    @inject(TOKENS.ErrorHandlerSettings) settings: ErrorHandlerSettings,
    @inject(TOKENS.ErrorRendererFactory) private readonly renderers: ErrorRendererFactory,
    @inject(TOKENS.ErrorLogSink) private readonly logSink: IErrorLogSink,
    @inject(TOKENS.Logger) private readonly logger: Logger,
  ) {
    this.logErrors = settings.logErrors;
    this.logErrorDetails = settings.logErrorDetails;
    this.rendererOverride = settings.renderer;
  }

  /** Forces one renderer for every response, bypassing negotiation. */
  setRenderer(renderer: RendererOverride | undefined): void {
    this.rendererOverride = renderer;
  }

  // Arrow field so ErrorMiddleware can register `handler.handle` without binding.
  handle = (
    request: ErrorRequest,
    response: ErrorResponse,
    error: unknown,
    displayErrorDetails: boolean,
  ): ErrorResponse => {
    const failure = toError(error);
    const { statusCode, contentType, renderer } = this.resolve(request, failure);

    if (this.logErrors) {
      this.writeToErrorLog(failure);
    }

    const body = renderer.renderWithBody(failure, displayErrorDetails);

    let result = response;
    const allowedMethods = asHttpError(failure)?.allowedMethods;
    if (allowedMethods !== undefined) {
      result = result.withHeader('Allow', allowedMethods);
    }

    return result.withStatus(statusCode).withHeader('Content-Type', contentType).withBody(body);
  };

  /** Steps 1–3: everything decided before any output is produced. */
  resolve(request: ErrorRequest, error: unknown): ResolvedOutcome {
    const statusCode = this.determineStatusCode(request.method, error);
    const contentType = this.determineContentType(request);
    const renderer = this.determineRenderer(contentType);
    return { statusCode, contentType, renderer };
  }

  determineStatusCode(method: string, error: unknown): number {
    return determineStatusCode(method, error);
  }

  determineContentType(request: ErrorRequest): MediaType {
    return negotiateContentType(request.getHeaderLine('Accept'));
  }

  determineRenderer(contentType: string): IErrorRenderer {
    const override = this.rendererOverride;

    if (override === undefined) {
      return this.renderers.forMediaType(contentType);
    }
    if (typeof override === 'string') {
      return this.renderers.byName(override);
    }
    if (!isErrorRenderer(override)) {
      throw new ConfigurationError(
        `Non compliant error renderer provided (${describeValue(override)}). ` +
          'Renderer must implement the IErrorRenderer interface',
      );
    }
    return override;
  }

  /** Builds the diagnostic entry; exposed separately so its text can be asserted. */
  formatErrorLog(error: Error): string {
    return this.renderers.plainText().render(error, this.logErrorDetails) + ERROR_LOG_NOTICE;
  }

  private writeToErrorLog(error: Error): void {
    const entry = this.formatErrorLog(error);
    try {
      this.logSink.write(entry);
    } catch (err) {
      this.logger.warn({ err }, 'Failed to write diagnostic error log entry');
    }
  }
}

/** Non-Error throwables (strings, plain objects) are wrapped so renderers see one shape. */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : inspect(value));
}

function describeValue(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    return value.constructor?.name || 'Object';
  }
  return typeof value;
}
