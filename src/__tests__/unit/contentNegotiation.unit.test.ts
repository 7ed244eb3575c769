/**
 * Unit Tests — Error Content Negotiation
 *
 * The Accept parsing is intentionally naive (no trimming, no q-values, no
 * wildcards). These cases lock that heuristic in place, including the quirks
 * clients may already depend on.
 */
import {
  isSupportedMediaType,
  matchSupportedMediaTypes,
  negotiateContentType,
} from '@application/negotiation/contentNegotiation';
import { determineStatusCode } from '@application/negotiation/statusCode';
import { HttpError, HttpNotFoundError } from '@shared/errors/HttpError';

describe('negotiateContentType()', () => {
  it.each([
    ['application/json', 'application/json'],
    ['application/xml', 'application/xml'],
    ['text/xml', 'text/xml'],
    ['text/html', 'text/html'],
    ['text/plain', 'text/plain'],
  ])('should select %s when it is the only accepted type', (accept, expected) => {
    expect(negotiateContentType(accept)).toBe(expected);
  });

  it('should prefer another supported type over text/plain', () => {
    expect(negotiateContentType('text/plain,application/json')).toBe('application/json');
  });

  it('should keep header order among matches that are not text/plain', () => {
    expect(negotiateContentType('text/xml,application/json')).toBe('text/xml');
    expect(negotiateContentType('application/json,text/xml')).toBe('application/json');
  });

  it('should keep text/plain when it is not the first match', () => {
    expect(negotiateContentType('text/html,text/plain')).toBe('text/html');
  });

  it('should collapse repeated tokens before applying the text/plain rule', () => {
    expect(negotiateContentType('text/plain,text/plain')).toBe('text/plain');
    expect(negotiateContentType('text/plain,text/plain,application/xml')).toBe('application/xml');
  });

  it('should ignore unsupported tokens between matches', () => {
    expect(negotiateContentType('image/png,text/plain,image/gif,text/html')).toBe('text/html');
  });

  it('should map a +json suffix to application/json', () => {
    expect(negotiateContentType('application/vnd.api+json')).toBe('application/json');
  });

  it('should map a +xml suffix to application/xml', () => {
    expect(negotiateContentType('application/atom+xml')).toBe('application/xml');
  });

  it('should use the first suffix in the header', () => {
    expect(negotiateContentType('application/rss+xml,application/ld+json')).toBe('application/xml');
  });

  it('should prefer an exact match over a suffix', () => {
    expect(negotiateContentType('application/vnd.api+json,text/xml')).toBe('text/xml');
  });

  it.each([['*/*'], [''], ['image/png'], ['application/*']])(
    'should default to text/html for %p',
    (accept) => {
      expect(negotiateContentType(accept)).toBe('text/html');
    },
  );

  it('should not trim whitespace around tokens', () => {
    // " application/json" is not a supported token, so only text/plain matches.
    expect(negotiateContentType('text/plain, application/json')).toBe('text/plain');
  });

  it('should not strip parameters from tokens', () => {
    expect(negotiateContentType('application/json;q=0.9')).toBe('text/html');
  });
});

describe('matchSupportedMediaTypes()', () => {
  it('should return matches in header order without repeats', () => {
    expect(matchSupportedMediaTypes('text/html,image/png,application/json,text/html')).toEqual([
      'text/html',
      'application/json',
    ]);
  });
});

describe('isSupportedMediaType()', () => {
  it('should accept only the five supported types', () => {
    expect(isSupportedMediaType('text/xml')).toBe(true);
    expect(isSupportedMediaType('TEXT/XML')).toBe(false);
    expect(isSupportedMediaType('application/yaml')).toBe(false);
  });
});

describe('determineStatusCode()', () => {
  it('should return 200 for OPTIONS regardless of the error', () => {
    expect(determineStatusCode('OPTIONS', new Error('boom'))).toBe(200);
    expect(determineStatusCode('OPTIONS', new HttpNotFoundError())).toBe(200);
  });

  it('should treat the OPTIONS check as case-sensitive', () => {
    expect(determineStatusCode('options', new Error('boom'))).toBe(500);
  });

  it('should return the carried code of HTTP-aware errors', () => {
    expect(determineStatusCode('GET', new HttpNotFoundError())).toBe(404);
    expect(determineStatusCode('POST', new HttpError('Slow down', 429))).toBe(429);
  });

  it('should return 500 for anything else', () => {
    expect(determineStatusCode('GET', new Error('boom'))).toBe(500);
    expect(determineStatusCode('DELETE', 'a thrown string')).toBe(500);
    expect(determineStatusCode('GET', undefined)).toBe(500);
  });
});
