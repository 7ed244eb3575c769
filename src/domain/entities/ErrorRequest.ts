/**
 * Error Request — the read-only slice of a request the error boundary needs.
 * Layer: Domain
 *
 * Only the method (for the OPTIONS override) and header lines (for Accept
 * negotiation) matter, so the boundary never depends on Express directly.
 */
export interface ErrorRequest {
  readonly method: string;
  /** All values of the named header joined with ", "; empty when absent. */
  getHeaderLine(name: string): string;
}

type HeaderValue = string | readonly string[] | undefined;

/** Builds an ErrorRequest from a method and a header map with any key casing. */
export function createErrorRequest(
  method: string,
  headers: Readonly<Record<string, HeaderValue>> = {},
): ErrorRequest {
  const normalized = new Map<string, string>();
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) {
      continue;
    }
    normalized.set(name.toLowerCase(), typeof value === 'string' ? value : value.join(', '));
  }

  return {
    method,
    getHeaderLine: (name) => normalized.get(name.toLowerCase()) ?? '',
  };
}
