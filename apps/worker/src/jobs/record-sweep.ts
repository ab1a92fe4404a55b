import type { Job } from 'bullmq';
import { sweepArtifacts, sweepDuplicates } from '@jobsift/ingestion';
import type { RecordStore } from '@jobsift/source-sdk';
import type { Logger } from 'pino';
import { RECORD_SWEEP_QUEUE, type RecordSweepJobData, type SweepMode } from '../queues.js';
import { createIngestionLogger } from '../observability/ingestion-logger.js';

export interface RecordSweepJobDeps {
  store: RecordStore;
  logger: Logger;
  /** Used when the job does not say. */
  dryRun: boolean;
}

export interface RecordSweepResult {
  mode: SweepMode;
  found: number;
  removed: number;
  dryRun: boolean;
}

export async function handleRecordSweepJob(
  job: Job<RecordSweepJobData>,
  deps: RecordSweepJobDeps,
): Promise<RecordSweepResult> {
  const { mode } = job.data;
  const dryRun = job.data.dryRun ?? deps.dryRun;
  const logger = createIngestionLogger(
    deps.logger.child({ queue: RECORD_SWEEP_QUEUE, mode, traceId: job.data.traceId }),
    'record_sweep',
  );

  switch (mode) {
    case 'duplicates': {
      const result = await sweepDuplicates(deps.store, { logger, dryRun });
      return { mode, found: result.pairs.length, removed: result.removed.length, dryRun };
    }
    case 'artifacts': {
      const result = await sweepArtifacts(deps.store, { logger, dryRun });
      return { mode, found: result.artifacts.length, removed: result.removed.length, dryRun };
    }
    default:
      throw new Error(`Unknown sweep mode: ${String(mode)}`);
  }
}
