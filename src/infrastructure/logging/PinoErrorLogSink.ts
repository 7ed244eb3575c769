/**
 * Pino Error Log Sink
 * Layer: Infrastructure
 *
 * Default destination for diagnostic entries: the shared pino logger at
 * `error` level. The rendered text goes under `diagnostic` so the JSON line
 * stays one object and the multi-line trace survives intact.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { IErrorLogSink } from '@domain/interfaces/IErrorLogSink';
import { inject, injectable } from 'tsyringe';

@injectable()
export class PinoErrorLogSink implements IErrorLogSink {
  constructor(@inject(TOKENS.Logger) private readonly logger: Logger) {}

  write(message: string): void {
    this.logger.error({ diagnostic: message }, 'Unhandled error');
  }
}
