import type { Job } from 'bullmq';
import type { Logger } from 'pino';
import { type TraceableData, withTrace } from './trace.js';

interface SerializedError {
  name?: string;
  message: string;
  stack?: string;
}

function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    message: String(error),
  };
}

function computeWaitMs(timestamp: number): number | undefined {
  if (!Number.isFinite(timestamp) || timestamp <= 0) {
    return undefined;
  }

  return Math.max(0, Date.now() - timestamp);
}

export interface LoggedJobOptions<TData extends TraceableData, TResult> {
  logger: Logger;
  queue: string;
  job: Job<TData>;
  context?: (data: TData) => Record<string, unknown>;
  summary?: (result: TResult) => Record<string, unknown>;
  /** Receives a child logger bound to the job's queue, id and trace id. */
  run: (jobLogger: Logger) => Promise<TResult>;
}

/**
 * Run a queue job between `job_started` and `job_completed` / `job_failed` events.
 * Failures are logged and rethrown so BullMQ can retry.
 */
export async function runLoggedJob<TData extends TraceableData, TResult>({
  logger,
  queue,
  job,
  context,
  summary,
  run,
}: LoggedJobOptions<TData, TResult>): Promise<TResult> {
  const traceId = withTrace(job);
  const jobId = String(job.id ?? 'unknown');
  const attempt = job.attemptsMade + 1;
  const startedAt = Date.now();
  const common = {
    queue,
    jobName: job.name,
    jobId,
    attempt,
    traceId,
    ...(context ? context(job.data) : {}),
  };

  logger.info({ event: 'job_started', ...common, waitMs: computeWaitMs(job.timestamp) }, 'Job started');

  try {
    const result = await run(logger.child({ queue, jobId, traceId }));
    logger.info(
      {
        event: 'job_completed',
        ...common,
        durationMs: Date.now() - startedAt,
        ...(summary ? summary(result) : {}),
      },
      'Job completed',
    );
    return result;
  } catch (error) {
    logger.error(
      {
        event: 'job_failed',
        ...common,
        durationMs: Date.now() - startedAt,
        error: serializeError(error),
      },
      'Job failed',
    );
    throw error;
  }
}
