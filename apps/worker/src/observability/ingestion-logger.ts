import type { IngestionLogger } from '@jobsift/ingestion';
import type { Logger } from 'pino';

/**
 * Adapt pino to the pipeline's string logger. Per-stage progress goes to debug; warnings and
 * errors keep their level.
 */
export function createIngestionLogger(logger: Logger, event = 'ingestion_stage'): IngestionLogger {
  return {
    info: (message) => logger.debug({ event }, message),
    warn: (message) => logger.warn({ event }, message),
    error: (message) => logger.error({ event }, message),
  };
}
