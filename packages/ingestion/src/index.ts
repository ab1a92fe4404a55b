// Pipeline
export { ingest, ingestContent } from './pipeline.js';

// Cleanup
export { sweepDuplicates, sweepArtifacts } from './cleanup.js';
export type { DuplicateSweepResult, ArtifactSweepResult } from './cleanup.js';

// Dedup
export { FUZZY_TITLE_THRESHOLD, normalizeTitle, matchDuplicate, findDuplicate, findDuplicates } from './dedup.js';
export type { DuplicateRule, DuplicateCandidate, DuplicateMatch, DuplicatePair } from './dedup.js';
export { jaro, jaroWinkler } from './similarity.js';
export { addJitter, sleep, JITTER_RATIO } from './pacing.js';

// Types
export type {
  CandidateOutcome,
  StageStats,
  ContentIngestionResult,
  ProviderIngestionResult,
  IngestionResult,
  IngestContentOptions,
  IngestOptions,
  SweepOptions,
  IngestionLogger,
} from './types.js';
