import { existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { config } from 'dotenv';

const DEFAULT_REDIS_URL = 'redis://localhost:6379';
const DEFAULT_DUPLICATE_SWEEP_CRON = '30 3 * * *';
const DEFAULT_ARTIFACT_SWEEP_CRON = '45 3 * * *';

export interface WorkerConfig {
  databaseUrl: string;
  redisUrl: string;
  concurrency: number;
  duplicateSweepCron: string;
  artifactSweepCron: string;
  sweepDryRun: boolean;
}

/**
 * Load `.env` then `.env.local` from the repository root; the latter overrides.
 */
export function loadEnvFiles(repoRoot = resolve(dirname(fileURLToPath(import.meta.url)), '../../../')): void {
  const envPath = resolve(repoRoot, '.env');
  const envLocalPath = resolve(repoRoot, '.env.local');

  if (existsSync(envPath)) {
    config({ path: envPath });
  }

  if (existsSync(envLocalPath)) {
    config({ path: envLocalPath, override: true });
  }
}

export function readRequiredEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`${name} environment variable is required`);
  }

  return value;
}

export function readIntEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) {
    return fallback;
  }

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }

  return Math.floor(parsed);
}

export function readBoolEnv(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (!raw) {
    return fallback;
  }

  const normalized = raw.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on') {
    return true;
  }

  if (normalized === '0' || normalized === 'false' || normalized === 'no' || normalized === 'off') {
    return false;
  }

  return fallback;
}

function readStringEnv(name: string, fallback: string): string {
  return process.env[name]?.trim() || fallback;
}

export function loadWorkerConfig(): WorkerConfig {
  return {
    databaseUrl: readRequiredEnv('DATABASE_URL'),
    redisUrl: readStringEnv('REDIS_URL', DEFAULT_REDIS_URL),
    concurrency: readIntEnv('INGEST_CONCURRENCY', 1),
    duplicateSweepCron: readStringEnv('DUPLICATE_SWEEP_CRON', DEFAULT_DUPLICATE_SWEEP_CRON),
    artifactSweepCron: readStringEnv('ARTIFACT_SWEEP_CRON', DEFAULT_ARTIFACT_SWEEP_CRON),
    sweepDryRun: readBoolEnv('SWEEP_DRY_RUN', false),
  };
}
