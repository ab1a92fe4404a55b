import { randomUUID } from 'node:crypto';
import type { Job } from 'bullmq';

export interface TraceableData {
  traceId?: string;
}

export function ensureTraceId(traceId?: string): string {
  if (traceId && traceId.trim().length > 0) {
    return traceId;
  }

  return randomUUID();
}

/**
 * Give the job a trace id if the producer did not, and return it.
 */
export function withTrace<TData extends TraceableData>(job: Job<TData>): string {
  const traceId = ensureTraceId(job.data.traceId);
  job.data.traceId = traceId;
  return traceId;
}
