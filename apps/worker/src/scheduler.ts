import type { Queues, SweepMode } from './queues.js';

const SWEEP_ATTEMPTS = 3;
const SWEEP_BACKOFF_MS = 5000;

export interface SchedulerOptions {
  duplicateSweepCron: string;
  artifactSweepCron: string;
  dryRun?: boolean;
}

export interface SchedulerResult {
  scheduled: SweepMode[];
  errors: Array<{ mode: SweepMode; error: string }>;
}

async function scheduleSweep(queues: Queues, mode: SweepMode, pattern: string, dryRun: boolean): Promise<void> {
  const jobId = `records-sweep-${mode}`;

  await queues.recordSweepQueue.add(
    jobId,
    {
      mode,
      dryRun,
    },
    {
      jobId,
      repeat: {
        pattern,
      },
      attempts: SWEEP_ATTEMPTS,
      backoff: {
        type: 'exponential',
        delay: SWEEP_BACKOFF_MS,
      },
      removeOnComplete: true,
      removeOnFail: 1000,
    },
  );
}

/**
 * Register the repeatable cleanup sweeps. A sweep that cannot be scheduled is reported; the
 * other is still registered.
 */
export async function scheduleSweeps(queues: Queues, options: SchedulerOptions): Promise<SchedulerResult> {
  const sweeps: Array<[SweepMode, string]> = [
    ['duplicates', options.duplicateSweepCron],
    ['artifacts', options.artifactSweepCron],
  ];
  const result: SchedulerResult = { scheduled: [], errors: [] };

  for (const [mode, pattern] of sweeps) {
    if (!pattern.trim()) {
      result.errors.push({ mode, error: `Sweep ${mode} has no schedule configured` });
      continue;
    }

    try {
      await scheduleSweep(queues, mode, pattern, options.dryRun ?? false);
      result.scheduled.push(mode);
    } catch (error) {
      result.errors.push({ mode, error: error instanceof Error ? error.message : String(error) });
    }
  }

  return result;
}
