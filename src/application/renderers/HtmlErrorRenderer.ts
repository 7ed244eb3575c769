/**
 * HTML Error Renderer
 * Layer: Application
 *
 * The fallback representation: anything the client did not explicitly ask
 * for as JSON, XML or plain text gets this page. Every interpolated value
 * is escaped.
 */
import { escapeHtml } from '@shared/utils/escape';

import { AbstractErrorRenderer } from './AbstractErrorRenderer';
import { describeErrorChain, type ErrorFragment } from './errorChain';

const PAGE_STYLE = [
  'body{margin:0;padding:30px;font:12px/1.5 Helvetica,Arial,Verdana,sans-serif}',
  'h1{margin:0;font-size:48px;font-weight:normal;line-height:48px}',
  'strong{display:inline-block;width:65px}',
  'pre{white-space:pre-wrap}',
].join('');

export class HtmlErrorRenderer extends AbstractErrorRenderer {
  render(error: Error, displayErrorDetails: boolean): string {
    const title = escapeHtml(this.getErrorTitle(error));
    const content = displayErrorDetails
      ? this.renderDetails(error)
      : `<p>${escapeHtml(this.getErrorDescription(error))}</p>`;

    return [
      '<!doctype html>',
      '<html lang="en">',
      '<head>',
      '<meta charset="utf-8">',
      '<meta name="viewport" content="width=device-width, initial-scale=1">',
      `<title>${title}</title>`,
      `<style>${PAGE_STYLE}</style>`,
      '</head>',
      '<body>',
      `<h1>${title}</h1>`,
      content,
      '</body>',
      '</html>',
    ].join('\n');
  }

  private renderDetails(error: Error): string {
    const [first, ...previous] = describeErrorChain(error);
    let html = '<p>The application could not run because of the following error:</p>\n<h2>Details</h2>\n';
    if (first) {
      html += this.renderFragment(first);
    }
    for (const fragment of previous) {
      html += '\n<h2>Previous Error</h2>\n' + this.renderFragment(fragment);
    }
    return html;
  }

  private renderFragment({ type, code, message, trace }: ErrorFragment): string {
    const rows = [`<div><strong>Type:</strong> ${escapeHtml(type)}</div>`];
    if (code !== undefined) {
      rows.push(`<div><strong>Code:</strong> ${escapeHtml(code)}</div>`);
    }
    rows.push(`<div><strong>Message:</strong> ${escapeHtml(message)}</div>`);
    if (trace.length > 0) {
      rows.push(`<h2>Trace</h2>\n<pre>${escapeHtml(trace.join('\n'))}</pre>`);
    }
    return rows.join('\n');
  }
}
