/**
 * Error Response — immutable response value
 * Layer: Domain
 *
 * Each `with*` call returns a new instance; the receiver is never modified.
 * Header names are matched case-insensitively but keep the casing they were
 * last set with, which is what ends up on the wire.
 */
interface HeaderEntry {
  name: string;
  values: readonly string[];
}

export class ErrorResponse {
  private constructor(
    public readonly statusCode: number,
    private readonly headers: ReadonlyMap<string, HeaderEntry>,
    public readonly body: Buffer,
  ) {}

  static create(statusCode = 200): ErrorResponse {
    return new ErrorResponse(statusCode, new Map(), Buffer.alloc(0));
  }

  withStatus(statusCode: number): ErrorResponse {
    return new ErrorResponse(statusCode, this.headers, this.body);
  }

  /** Replaces every value of the header. */
  withHeader(name: string, value: string | readonly string[]): ErrorResponse {
    const headers = new Map(this.headers);
    headers.set(name.toLowerCase(), { name, values: typeof value === 'string' ? [value] : [...value] });
    return new ErrorResponse(this.statusCode, headers, this.body);
  }

  withBody(body: Buffer): ErrorResponse {
    return new ErrorResponse(this.statusCode, this.headers, body);
  }

  hasHeader(name: string): boolean {
    return this.headers.has(name.toLowerCase());
  }

  getHeaderLine(name: string): string {
    return this.headers.get(name.toLowerCase())?.values.join(', ') ?? '';
  }

  /** Header lines keyed by their set casing. */
  getHeaders(): Record<string, string> {
    const lines: Record<string, string> = {};
    for (const { name, values } of this.headers.values()) {
      lines[name] = values.join(', ');
    }
    return lines;
  }

  getBodyText(): string {
    return this.body.toString('utf8');
  }
}
