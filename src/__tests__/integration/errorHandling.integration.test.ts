/**
 * Integration Tests — Error Boundary through the Express App
 *
 * Exercises the full middleware chain (helmet, cors, compression, JSON
 * parser, request logger, routes, not-found fallback, error middleware)
 * using Supertest.
 *
 * The diagnostic sink and error settings are swapped in the DI container
 * before the app is built, so the log entries can be asserted without a
 * real logger. The app must be created INSIDE `beforeAll`, AFTER the
 * overrides, because createApp() resolves the middleware at build time.
 */
import { TOKENS } from '@core/types';
import type { ErrorHandlerSettings } from '@application/services/ErrorResponseHandler';
import type { IErrorLogSink } from '@domain/interfaces/IErrorLogSink';
import type { ErrorMiddlewareSettings } from '@interfaces/http/middleware/errorHandler';
import type { Express } from 'express';
import request from 'supertest';
import { container } from 'tsyringe';

import { ERROR_LOG_NOTICE_TEXT } from '../helpers/fixtures';
import { createMockLogSink, type MockErrorLogSink } from '../helpers/mocks';

let app: Express;
let sink: MockErrorLogSink;

beforeAll(async () => {
  await import('@core/container');

  sink = createMockLogSink();
  container.register<IErrorLogSink>(TOKENS.ErrorLogSink, { useValue: sink });
  container.register<ErrorHandlerSettings>(TOKENS.ErrorHandlerSettings, {
    useValue: { logErrors: true, logErrorDetails: false },
  });
  container.register<ErrorMiddlewareSettings>(TOKENS.ErrorMiddlewareSettings, {
    useValue: { displayErrorDetails: false },
  });

  const { createApp } = await import('@interfaces/http/app');
  app = createApp();
});

afterEach(() => {
  jest.clearAllMocks();
});

describe('HTTP-aware errors', () => {
  it('should return the carried status as JSON when JSON is accepted', async () => {
    const res = await request(app).get('/api/v1/errors/404').set('Accept', 'application/json');

    expect(res.status).toBe(404);
    expect(res.headers['content-type']).toBe('application/json');
    expect(res.body).toEqual({ message: '404 Not Found' });
  });

  it('should honour statuses without a dedicated error class', async () => {
    const res = await request(app).get('/api/v1/errors/503').set('Accept', 'text/plain');

    expect(res.status).toBe(503);
    expect(res.text).toBe('503 Simulated failure\n');
  });

  it('should turn validation failures into a negotiated 400', async () => {
    const res = await request(app).get('/api/v1/errors/abc').set('Accept', 'application/xml').buffer(true);

    expect(res.status).toBe(400);
    expect(res.headers['content-type']).toBe('application/xml');
    expect(res.text).toContain('<message>400 Bad Request</message>');
  });
});

describe('status parameter validation', () => {
  it('should refuse 405, which needs allowed methods', async () => {
    const res = await request(app).get('/api/v1/errors/405').set('Accept', 'application/json');

    expect(res.status).toBe(400);
    expect(res.headers.allow).toBeUndefined();
    expect(res.body).toEqual({ message: '400 Bad Request' });
  });
});

describe('unclassified errors', () => {
  it('should return a generic 500 without details', async () => {
    const res = await request(app).get('/api/v1/errors/unhandled').set('Accept', 'text/plain');

    expect(res.status).toBe(500);
    expect(res.headers['content-type']).toBe('text/plain');
    expect(res.text).toBe('Application Error\n');
  });

  it('should default to HTML when nothing supported is accepted', async () => {
    const res = await request(app).get('/api/v1/errors/unhandled').set('Accept', '*/*');

    expect(res.status).toBe(500);
    expect(res.headers['content-type']).toBe('text/html');
    expect(res.text).toContain('<h1>Application Error</h1>');
    expect(res.text).not.toContain('Upstream dependency timed out');
  });
});

describe('routing failures', () => {
  it('should answer unknown routes with a negotiated 404', async () => {
    const res = await request(app).get('/api/v1/nope').set('Accept', 'application/vnd.api+json');

    expect(res.status).toBe(404);
    expect(res.headers['content-type']).toBe('application/json');
    expect(res.body).toEqual({ message: '404 Not Found' });
  });

  it('should answer a wrong method with 405 and an Allow header', async () => {
    const res = await request(app).post('/api/v1/health').set('Accept', 'application/json');

    expect(res.status).toBe(405);
    expect(res.headers.allow).toBe('GET');
    expect(res.body).toEqual({ message: '405 Method Not Allowed' });
  });

  it('should answer OPTIONS with 200 even when the route fails', async () => {
    const res = await request(app).options('/api/v1/health').set('Accept', 'text/plain');

    expect(res.status).toBe(200);
    expect(res.headers.allow).toBe('GET');
    expect(res.text).toBe('405 Method Not Allowed\n');
  });

  it('should answer OPTIONS on unknown routes with 200', async () => {
    const res = await request(app).options('/api/v1/nope');

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toBe('text/html');
  });
});

describe('diagnostic log', () => {
  it('should write one entry per handled error', async () => {
    await request(app).get('/api/v1/errors/404').set('Accept', 'application/json');

    expect(sink.write).toHaveBeenCalledTimes(1);
    expect(sink.write).toHaveBeenCalledWith(`404 Not Found\n${ERROR_LOG_NOTICE_TEXT}`);
  });

  it('should not write for successful requests', async () => {
    const res = await request(app).get('/api/v1/health');

    expect(res.status).toBe(200);
    expect(sink.write).not.toHaveBeenCalled();
  });
});
