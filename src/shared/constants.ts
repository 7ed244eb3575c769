/**
 * Media types the error boundary can produce. Order is the tie-break
 * precedence used by content negotiation.
 */
export const SUPPORTED_MEDIA_TYPES = [
  'application/json',
  'application/xml',
  'text/xml',
  'text/html',
  'text/plain',
] as const;

export type MediaType = (typeof SUPPORTED_MEDIA_TYPES)[number];

/** Used whenever negotiation finds nothing better. */
export const DEFAULT_MEDIA_TYPE: MediaType = 'text/html';

/** Names accepted for a forced renderer (ERROR_RENDERER / setRenderer). */
export const RENDERER_NAMES = ['json', 'xml', 'plain', 'html'] as const;

export type RendererName = (typeof RENDERER_NAMES)[number];

export const DEFAULT_ERROR_TITLE = 'Application Error';
export const DEFAULT_ERROR_DESCRIPTION =
  'A website error has occurred. Sorry for the temporary inconvenience.';

/** Appended to every diagnostic log entry. */
export const ERROR_LOG_NOTICE =
  '\nView in rendered output by enabling the "displayErrorDetails" setting.\n';
