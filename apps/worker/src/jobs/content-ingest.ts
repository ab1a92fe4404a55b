import type { Job } from 'bullmq';
import { ingestContent, type ContentIngestionResult } from '@jobsift/ingestion';
import type { RecordStore } from '@jobsift/source-sdk';
import type { Logger } from 'pino';
import { CONTENT_INGEST_QUEUE, fromContentJobData, type ContentIngestJobData } from '../queues.js';
import { createIngestionLogger } from '../observability/ingestion-logger.js';

export interface ContentIngestJobDeps {
  store: RecordStore;
  logger: Logger;
}

export async function handleContentIngestJob(
  job: Job<ContentIngestJobData>,
  deps: ContentIngestJobDeps,
): Promise<ContentIngestionResult> {
  const content = fromContentJobData(job.data);
  const ingestionLogger = createIngestionLogger(
    deps.logger.child({
      queue: CONTENT_INGEST_QUEUE,
      source: content.source,
      traceId: job.data.traceId,
    }),
  );

  const result = await ingestContent(content, {
    store: deps.store,
    logger: ingestionLogger,
    dryRun: job.data.dryRun ?? false,
  });

  if (result.errors.length > 0) {
    throw new Error(`[${CONTENT_INGEST_QUEUE}:${content.source}] ${result.errors.join(' | ')}`);
  }

  return result;
}
