import { isStoredArtifactTitle } from '@jobsift/extraction';
import type { ExistingRecordView, RecordStore } from '@jobsift/source-sdk';
import { findDuplicates } from './dedup.js';
import type { DuplicatePair } from './dedup.js';
import { defaultLogger } from './logger.js';
import type { SweepOptions } from './types.js';

export interface DuplicateSweepResult {
  pairs: DuplicatePair[];
  removed: string[];
  dryRun: boolean;
}

export interface ArtifactSweepResult {
  artifacts: ExistingRecordView[];
  removed: string[];
  dryRun: boolean;
}

/**
 * Remove every stored record that duplicates an older one.
 */
export async function sweepDuplicates(store: RecordStore, options: SweepOptions = {}): Promise<DuplicateSweepResult> {
  const { logger = defaultLogger, dryRun = false } = options;
  const pairs = findDuplicates(await store.listAll());
  const removed: string[] = [];

  for (const pair of pairs) {
    logger.info(`[sweep:duplicates] ${pair.reason}`);
    if (dryRun) continue;

    await store.remove(pair.duplicateId);
    removed.push(pair.duplicateId);
  }

  logger.info(`[sweep:duplicates] ${pairs.length} duplicates found, ${removed.length} removed`);
  return { pairs, removed, dryRun };
}

/**
 * Remove stored records whose titles are call-to-action link text.
 */
export async function sweepArtifacts(store: RecordStore, options: SweepOptions = {}): Promise<ArtifactSweepResult> {
  const { logger = defaultLogger, dryRun = false } = options;
  const artifacts = (await store.listAll()).filter((record) => isStoredArtifactTitle(record.title));
  const removed: string[] = [];

  for (const record of artifacts) {
    logger.info(`[sweep:artifacts] Job #${record.id} ('${record.title}')`);
    if (dryRun) continue;

    await store.remove(record.id);
    removed.push(record.id);
  }

  logger.info(`[sweep:artifacts] ${artifacts.length} artifacts found, ${removed.length} removed`);
  return { artifacts, removed, dryRun };
}
