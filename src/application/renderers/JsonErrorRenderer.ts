/**
 * JSON Error Renderer
 * Layer: Application
 *
 *   { "message": "404 Not Found" }
 *
 * With details enabled an `exception` array lists the error and each of its
 * causes, outermost first.
 */
import { AbstractErrorRenderer } from './AbstractErrorRenderer';
import { describeErrorChain, type ErrorFragment } from './errorChain';

interface JsonErrorPayload {
  message: string;
  exception?: ErrorFragment[];
}

export class JsonErrorRenderer extends AbstractErrorRenderer {
  render(error: Error, displayErrorDetails: boolean): string {
    const payload: JsonErrorPayload = { message: this.getErrorTitle(error) };

    if (displayErrorDetails) {
      payload.exception = describeErrorChain(error);
    }

    return JSON.stringify(payload, null, 2);
  }
}
