import { Queue } from 'bullmq';
import type { Redis as IORedis } from 'ioredis';
import type { ContentSource, RawContent } from '@jobsift/source-sdk';

export const CONTENT_INGEST_QUEUE = 'content.ingest';
export const RECORD_SWEEP_QUEUE = 'records.sweep';

export type SweepMode = 'duplicates' | 'artifacts';

/**
 * Raw content as it travels through Redis: dates are ISO strings.
 */
export interface ContentIngestJobData {
  source: ContentSource;
  body: string;
  url?: string;
  receivedAt?: string;
  dryRun?: boolean;
  traceId?: string;
}

export interface RecordSweepJobData {
  mode: SweepMode;
  dryRun?: boolean;
  traceId?: string;
}

export interface Queues {
  contentIngestQueue: Queue<ContentIngestJobData>;
  recordSweepQueue: Queue<RecordSweepJobData>;
}

export function createQueues(connection: IORedis): Queues {
  return {
    contentIngestQueue: new Queue<ContentIngestJobData>(CONTENT_INGEST_QUEUE, { connection }),
    recordSweepQueue: new Queue<RecordSweepJobData>(RECORD_SWEEP_QUEUE, { connection }),
  };
}

export async function closeQueues(queues: Queues): Promise<void> {
  await Promise.allSettled([queues.contentIngestQueue.close(), queues.recordSweepQueue.close()]);
}

export function toContentJobData(content: RawContent): ContentIngestJobData {
  return {
    source: content.source,
    body: content.body,
    url: content.url,
    receivedAt: content.receivedAt?.toISOString(),
  };
}

export function fromContentJobData(data: ContentIngestJobData): RawContent {
  return {
    source: data.source,
    body: data.body,
    url: data.url,
    receivedAt: data.receivedAt ? new Date(data.receivedAt) : undefined,
  };
}
