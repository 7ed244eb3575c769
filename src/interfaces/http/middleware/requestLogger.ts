/**
 * HTTP Request Logger Middleware
 * Layer: Interfaces (HTTP)
 *
 * Wraps Pino's HTTP plugin to log every request and response (method, URL,
 * status code, response time). Error responses written by the error
 * middleware are logged here too, with their negotiated status.
 */
import { logger } from '@core/logger';
import pinoHttp from 'pino-http';

export const requestLogger = pinoHttp({ logger });
