import type { ContentSource, RecordStore, ValidatedParsedJob } from '@jobsift/source-sdk';
import type { DuplicateRule } from './dedup.js';

/**
 * Outcome for a single candidate after the duplicate check.
 */
export type CandidateOutcome =
  | { action: 'insert'; job: ValidatedParsedJob; id: string }
  | { action: 'skip'; job: ValidatedParsedJob; duplicateOf: string; rule: DuplicateRule }
  | { action: 'dry-run'; job: ValidatedParsedJob };

/**
 * Per-stage counts for observability.
 */
export interface StageStats {
  extracted: number;
  validated: number;
  validationDropped: number;
  duplicates: number;
  inserted: number;
}

/**
 * Result of ingesting one raw content item.
 */
export interface ContentIngestionResult {
  source: ContentSource;
  stats: StageStats;
  outcomes: CandidateOutcome[];
  errors: string[];
  durationMs: number;
}

/**
 * Result of ingesting everything one provider returned.
 */
export interface ProviderIngestionResult {
  providerId: string;
  providerName: string;
  items: number;
  stats: StageStats;
  errors: string[];
  durationMs: number;
}

/**
 * Result of ingesting all providers.
 */
export interface IngestionResult {
  providers: ProviderIngestionResult[];
  totalInserted: number;
  totalErrors: number;
  durationMs: number;
}

export interface IngestContentOptions {
  store: RecordStore;
  logger?: IngestionLogger;
  /** Run extraction and duplicate checks without writing. */
  dryRun?: boolean;
}

export interface IngestOptions extends IngestContentOptions {
  /** Base pause between providers, jittered by ±20%. */
  delayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface SweepOptions {
  logger?: IngestionLogger;
  dryRun?: boolean;
}

/**
 * Minimal logger interface, defaults to console.
 */
export interface IngestionLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}
