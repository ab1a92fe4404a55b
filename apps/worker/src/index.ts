import type { Job } from 'bullmq';
import { Worker } from 'bullmq';
import { closeDatabase, createDatabase, createRecordStore, type Database } from '@jobsift/db';
import type { Logger } from 'pino';
import { loadEnvFiles, loadWorkerConfig } from './config.js';
import { handleContentIngestJob } from './jobs/content-ingest.js';
import { handleRecordSweepJob } from './jobs/record-sweep.js';
import { runLoggedJob } from './observability/logged-job.js';
import type { TraceableData } from './observability/trace.js';
import {
  CONTENT_INGEST_QUEUE,
  closeQueues,
  createQueues,
  type ContentIngestJobData,
  type Queues,
  RECORD_SWEEP_QUEUE,
  type RecordSweepJobData,
} from './queues.js';
import { closeRedis, createRedisConnection } from './redis.js';
import { scheduleSweeps } from './scheduler.js';
import { createWorkerLogger } from './observability/logger.js';

interface RuntimeState {
  db: Database | null;
  redis: ReturnType<typeof createRedisConnection> | null;
  queues: Queues | null;
  workers: Array<Worker>;
}

const runtimeState: RuntimeState = {
  db: null,
  redis: null,
  queues: null,
  workers: [],
};

async function cleanupRuntimeState(state: RuntimeState): Promise<void> {
  await Promise.allSettled(state.workers.map((worker) => worker.close()));

  if (state.queues) {
    await closeQueues(state.queues);
  }

  if (state.redis) {
    await Promise.allSettled([closeRedis(state.redis)]);
  }

  if (state.db) {
    await Promise.allSettled([closeDatabase(state.db)]);
  }
}

async function run(): Promise<void> {
  loadEnvFiles();
  const logger = createWorkerLogger();
  const config = loadWorkerConfig();

  const db = createDatabase(config.databaseUrl);
  runtimeState.db = db;
  const store = createRecordStore(db);

  const redis = createRedisConnection(config.redisUrl);
  runtimeState.redis = redis;
  const queues = createQueues(redis);
  runtimeState.queues = queues;

  function createLoggedWorker<TData extends TraceableData, TResult>(
    queue: string,
    concurrency: number,
    processor: (job: Job<TData>, jobLogger: Logger) => Promise<TResult>,
    observe: {
      context?: (data: TData) => Record<string, unknown>;
      summary?: (result: TResult) => Record<string, unknown>;
    },
  ): Worker<TData, TResult> {
    return new Worker<TData, TResult>(
      queue,
      (job) => runLoggedJob({ logger, queue, job, ...observe, run: (jobLogger) => processor(job, jobLogger) }),
      { connection: redis, concurrency },
    );
  }

  const ingestWorker = createLoggedWorker(
    CONTENT_INGEST_QUEUE,
    config.concurrency,
    (job: Job<ContentIngestJobData>, jobLogger) => handleContentIngestJob(job, { store, logger: jobLogger }),
    {
      context: (data) => ({ source: data.source, url: data.url }),
      summary: (result) => ({
        extracted: result.stats.extracted,
        validationDropped: result.stats.validationDropped,
        duplicates: result.stats.duplicates,
        inserted: result.stats.inserted,
      }),
    },
  );

  // Sweeps remove records; they never run alongside each other.
  const sweepWorker = createLoggedWorker(
    RECORD_SWEEP_QUEUE,
    1,
    (job: Job<RecordSweepJobData>, jobLogger) =>
      handleRecordSweepJob(job, { store, logger: jobLogger, dryRun: config.sweepDryRun }),
    {
      context: (data) => ({ mode: data.mode }),
      summary: (result) => ({ found: result.found, removed: result.removed, dryRun: result.dryRun }),
    },
  );

  const workers = [ingestWorker, sweepWorker];
  runtimeState.workers.push(...workers);

  for (const worker of workers) {
    worker.on('error', (error) => {
      logger.error(
        {
          event: 'worker_runtime_error',
          queue: worker.name,
          error,
        },
        'Worker runtime error',
      );
    });
  }

  const schedulerResult = await scheduleSweeps(queues, {
    duplicateSweepCron: config.duplicateSweepCron,
    artifactSweepCron: config.artifactSweepCron,
    dryRun: config.sweepDryRun,
  });
  if (schedulerResult.errors.length === 0) {
    logger.info(
      {
        event: 'scheduler_configured',
        scheduled: schedulerResult.scheduled,
        duplicateSweepCron: config.duplicateSweepCron,
        artifactSweepCron: config.artifactSweepCron,
        sweepDryRun: config.sweepDryRun,
      },
      'Scheduler configured',
    );
  } else {
    logger.warn(
      {
        event: 'scheduler_partially_configured',
        scheduled: schedulerResult.scheduled,
        errors: schedulerResult.errors,
      },
      'Scheduler partially configured: sweep scheduling failed',
    );
  }

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      return;
    }

    shuttingDown = true;
    logger.info({ event: 'shutdown_requested', signal }, 'Shutdown requested');

    await cleanupRuntimeState(runtimeState);

    logger.info({ event: 'shutdown_completed', signal }, 'Shutdown completed');

    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  logger.info(
    {
      event: 'worker_started',
      redisUrl: config.redisUrl,
      concurrency: config.concurrency,
    },
    'Worker started',
  );
}

run().catch(async (error) => {
  await cleanupRuntimeState(runtimeState);
  const logger = createWorkerLogger();
  logger.error(
    {
      event: 'worker_fatal_error',
      error,
    },
    'Worker fatal error',
  );
  process.exit(1);
});
