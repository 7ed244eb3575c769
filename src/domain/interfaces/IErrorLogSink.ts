/**
 * Destination for the diagnostic entry written when `logErrors` is enabled.
 * Layer: Domain
 */
export interface IErrorLogSink {
  write(message: string): void;
}
