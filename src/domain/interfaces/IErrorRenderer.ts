/**
 * Error Renderer Interface
 * Layer: Domain
 * Pattern: Strategy Pattern
 *
 * One renderer per representation (JSON, XML, plain text, HTML). The handler
 * picks one from the negotiated media type and never needs to know which it
 * got. Renderers are stateless: equal inputs always give identical output.
 */
export interface IErrorRenderer {
  render(error: Error, displayErrorDetails: boolean): string;
  renderWithBody(error: Error, displayErrorDetails: boolean): Buffer;
}

/**
 * Guard for values that reach the handler without static typing (plain JS
 * callers, container registrations).
 */
export function isErrorRenderer(value: unknown): value is IErrorRenderer {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'render' in value &&
    typeof value.render === 'function' &&
    'renderWithBody' in value &&
    typeof value.renderWithBody === 'function'
  );
}
