/**
 * Error Renderer Factory
 * Layer: Application
 * Pattern: Factory Pattern
 *
 * A closed dispatch table from negotiated media type to renderer:
 *
 *   application/json            → json
 *   application/xml, text/xml   → xml
 *   text/plain                  → plain
 *   text/html or anything else  → html
 *
 * Renderers are stateless, so one instance of each is built up front and
 * shared. `byName()` serves forced renderers chosen by configuration.
 */
import type { IErrorRenderer } from '@domain/interfaces/IErrorRenderer';
import type { RendererName } from '@shared/constants';
import { ConfigurationError } from '@shared/errors/ConfigurationError';
import { injectable } from 'tsyringe';

import { HtmlErrorRenderer } from '../renderers/HtmlErrorRenderer';
import { JsonErrorRenderer } from '../renderers/JsonErrorRenderer';
import { PlainTextErrorRenderer } from '../renderers/PlainTextErrorRenderer';
import { XmlErrorRenderer } from '../renderers/XmlErrorRenderer';

export function rendererNameFor(mediaType: string): RendererName {
  switch (mediaType) {
    case 'application/json':
      return 'json';
    case 'application/xml':
    case 'text/xml':
      return 'xml';
    case 'text/plain':
      return 'plain';
    case 'text/html':
    default:
      return 'html';
  }
}

@injectable()
export class ErrorRendererFactory {
  private readonly renderers: Readonly<Record<RendererName, IErrorRenderer>> = {
    json: new JsonErrorRenderer(),
    xml: new XmlErrorRenderer(),
    plain: new PlainTextErrorRenderer(),
    html: new HtmlErrorRenderer(),
  };

  forMediaType(mediaType: string): IErrorRenderer {
    return this.renderers[rendererNameFor(mediaType)];
  }

  byName(name: RendererName): IErrorRenderer {
    // Names can arrive from untyped callers, so the lookup is checked.
    const renderer: IErrorRenderer | undefined = Object.hasOwn(this.renderers, name)
      ? this.renderers[name]
      : undefined;
    if (renderer === undefined) {
      throw new ConfigurationError(
        `Non compliant error renderer provided (${String(name)}). ` +
          `Renderer must be one of: ${Object.keys(this.renderers).join(', ')}`,
      );
    }
    return renderer;
  }

  /** The renderer used for diagnostic log entries. */
  plainText(): IErrorRenderer {
    return this.renderers.plain;
  }
}
