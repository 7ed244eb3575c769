/**
 * Base class for the built-in renderers. Subclasses only implement
 * `render()`; the body is the UTF-8 encoding of that string.
 */
import type { IErrorRenderer } from '@domain/interfaces/IErrorRenderer';
import { DEFAULT_ERROR_DESCRIPTION, DEFAULT_ERROR_TITLE } from '@shared/constants';
import { asHttpError } from '@shared/errors/HttpError';

export abstract class AbstractErrorRenderer implements IErrorRenderer {
  abstract render(error: Error, displayErrorDetails: boolean): string;

  renderWithBody(error: Error, displayErrorDetails: boolean): Buffer {
    return Buffer.from(this.render(error, displayErrorDetails), 'utf8');
  }

  protected getErrorTitle(error: Error): string {
    return asHttpError(error)?.title ?? DEFAULT_ERROR_TITLE;
  }

  protected getErrorDescription(error: Error): string {
    return asHttpError(error)?.description ?? DEFAULT_ERROR_DESCRIPTION;
  }
}
