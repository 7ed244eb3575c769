/**
 * Error Content Negotiation
 * Layer: Application
 *
 * A deliberately narrow reading of the Accept header, good enough to choose
 * an error representation and nothing more:
 *
 *   - tokens are the raw comma-separated pieces: no trimming, no `q=`
 *     weighting, no wildcards ("text/html, application/json" therefore only
 *     matches text/html, because the second token is " application/json");
 *   - among exact matches, header order wins, except that text/plain yields
 *     to any other match;
 *   - with no exact match, a structured-syntax suffix (`+json`, `+xml`)
 *     maps to application/json or application/xml;
 *   - otherwise text/html.
 */
import { DEFAULT_MEDIA_TYPE, type MediaType, SUPPORTED_MEDIA_TYPES } from '@shared/constants';

const STRUCTURED_SUFFIX = /\+(json|xml)/;

export function isSupportedMediaType(value: string): value is MediaType {
  return SUPPORTED_MEDIA_TYPES.some((mediaType) => mediaType === value);
}

/** Supported media types named in the header, in header order, without repeats. */
export function matchSupportedMediaTypes(acceptHeader: string): MediaType[] {
  const matches = new Set<MediaType>();
  for (const token of acceptHeader.split(',')) {
    if (isSupportedMediaType(token)) {
      matches.add(token);
    }
  }
  return [...matches];
}

export function negotiateContentType(acceptHeader: string): MediaType {
  const [first, second] = matchSupportedMediaTypes(acceptHeader);

  if (first !== undefined) {
    return first === 'text/plain' && second !== undefined ? second : first;
  }

  const suffix = STRUCTURED_SUFFIX.exec(acceptHeader);
  if (suffix) {
    const mediaType = `application/${suffix[1]}`;
    if (isSupportedMediaType(mediaType)) {
      return mediaType;
    }
  }

  return DEFAULT_MEDIA_TYPE;
}
