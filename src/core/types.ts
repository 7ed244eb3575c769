/**
 * Dependency Injection Tokens
 * Layer: Core
 *
 * Every injectable dependency gets a unique Symbol so the tsyringe container
 * knows "when someone asks for X, give them Y". Interfaces and plain settings
 * objects have no runtime presence, so they can only be injected by token.
 */
export const TOKENS = {
  // Infrastructure
  Logger: Symbol.for('Logger'),
  ErrorLogSink: Symbol.for('ErrorLogSink'),

  // Settings
  ErrorHandlerSettings: Symbol.for('ErrorHandlerSettings'),
  ErrorMiddlewareSettings: Symbol.for('ErrorMiddlewareSettings'),

  // Error boundary
  ErrorRendererFactory: Symbol.for('ErrorRendererFactory'),
  DefaultErrorHandler: Symbol.for('DefaultErrorHandler'),
  ErrorMiddleware: Symbol.for('ErrorMiddleware'),
} as const;
