/**
 * Plain Text Error Renderer
 * Layer: Application
 *
 * Also used for the diagnostic log entry, so its output must stay readable
 * as a single log message.
 */
import { AbstractErrorRenderer } from './AbstractErrorRenderer';
import { describeErrorChain, type ErrorFragment } from './errorChain';

export class PlainTextErrorRenderer extends AbstractErrorRenderer {
  render(error: Error, displayErrorDetails: boolean): string {
    let text = `${this.getErrorTitle(error)}\n`;

    if (displayErrorDetails) {
      text += describeErrorChain(error)
        .map((fragment) => this.formatFragment(fragment))
        .join('\nPrevious Error:\n');
    }

    return text;
  }

  private formatFragment({ type, code, message, trace }: ErrorFragment): string {
    let text = `Type: ${type}\n`;
    if (code !== undefined) {
      text += `Code: ${code}\n`;
    }
    text += `Message: ${message}\n`;
    if (trace.length > 0) {
      text += `Trace:\n${trace.map((frame) => `  ${frame}`).join('\n')}\n`;
    }
    return text;
  }
}
