/**
 * XML Error Renderer
 * Layer: Application
 *
 * Serves both application/xml and text/xml.
 */
import { escapeXml } from '@shared/utils/escape';

import { AbstractErrorRenderer } from './AbstractErrorRenderer';
import { describeErrorChain, type ErrorFragment } from './errorChain';

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>';

export class XmlErrorRenderer extends AbstractErrorRenderer {
  render(error: Error, displayErrorDetails: boolean): string {
    const lines = [XML_DECLARATION, '<error>', `  <message>${escapeXml(this.getErrorTitle(error))}</message>`];

    if (displayErrorDetails) {
      for (const fragment of describeErrorChain(error)) {
        lines.push(...this.formatFragment(fragment));
      }
    }

    lines.push('</error>');
    return lines.join('\n');
  }

  private formatFragment({ type, code, message, trace }: ErrorFragment): string[] {
    const lines = ['  <exception>', `    <type>${escapeXml(type)}</type>`];
    if (code !== undefined) {
      lines.push(`    <code>${escapeXml(code)}</code>`);
    }
    lines.push(`    <message>${escapeXml(message)}</message>`);
    if (trace.length > 0) {
      lines.push(`    <trace>${escapeXml(trace.join('\n'))}</trace>`);
    }
    lines.push('  </exception>');
    return lines;
  }
}
