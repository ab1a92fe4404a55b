import { extract } from '@jobsift/extraction';
import type {
  ContentProvider,
  ExistingRecordView,
  RawContent,
  RecordLookup,
  ValidatedParsedJob,
} from '@jobsift/source-sdk';
import { validateParsedJobs } from '@jobsift/source-sdk';
import { matchDuplicate } from './dedup.js';
import { defaultLogger } from './logger.js';
import { addJitter, sleep as defaultSleep } from './pacing.js';
import type {
  CandidateOutcome,
  ContentIngestionResult,
  IngestContentOptions,
  IngestionResult,
  IngestOptions,
  ProviderIngestionResult,
  StageStats,
} from './types.js';

function emptyStats(): StageStats {
  return { extracted: 0, validated: 0, validationDropped: 0, duplicates: 0, inserted: 0 };
}

function addStats(total: StageStats, stats: StageStats): void {
  total.extracted += stats.extracted;
  total.validated += stats.validated;
  total.validationDropped += stats.validationDropped;
  total.duplicates += stats.duplicates;
  total.inserted += stats.inserted;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Records a candidate could duplicate: the one stored under its URL plus everything from the
 * same employer.
 */
async function gatherCorpus(lookup: RecordLookup, job: ValidatedParsedJob): Promise<ExistingRecordView[]> {
  const corpus: ExistingRecordView[] = [];

  if (job.url) {
    const byUrl = await lookup.findByUrl(job.url);
    if (byUrl) corpus.push(byUrl);
  }

  if (job.employer) {
    for (const record of await lookup.listByEmployer(job.employer)) {
      if (!corpus.some((existing) => existing.id === record.id)) {
        corpus.push(record);
      }
    }
  }

  return corpus;
}

const admissionTails = new WeakMap<RecordLookup, Promise<unknown>>();

/**
 * Run `task` after every admission already queued against the same store, so a lookup never
 * races an insert it should have seen. The stored tail never rejects; failures reach the caller
 * through the returned promise.
 */
function serializeAdmission<T>(store: RecordLookup, task: () => Promise<T>): Promise<T> {
  const tail = admissionTails.get(store) ?? Promise.resolve();
  const run = tail.then(task);
  admissionTails.set(
    store,
    run.then(
      () => undefined,
      () => undefined,
    ),
  );
  return run;
}

/**
 * Dedup one validated candidate against the store and insert it unless it is a duplicate.
 */
async function admit(job: ValidatedParsedJob, options: IngestContentOptions): Promise<CandidateOutcome> {
  const { store, dryRun = false } = options;
  const match = matchDuplicate(job, await gatherCorpus(store, job));
  if (match) {
    return { action: 'skip', job, duplicateOf: match.id, rule: match.rule };
  }

  if (dryRun) {
    return { action: 'dry-run', job };
  }

  return { action: 'insert', job, id: await store.insert(job) };
}

/**
 * Ingest one raw content item.
 * Stages: extract → validate → dedup → store
 *
 * Candidates are admitted one at a time per store, across concurrent calls too, so a later
 * candidate sees the records inserted for earlier ones. A candidate that fails to store is reported and the rest still
 * run.
 */
export async function ingestContent(content: RawContent, options: IngestContentOptions): Promise<ContentIngestionResult> {
  const { store, logger = defaultLogger, dryRun = false } = options;
  const tag = `[ingest:${content.source}]`;
  const start = performance.now();
  const stats = emptyStats();
  const outcomes: CandidateOutcome[] = [];
  const errors: string[] = [];

  try {
    // 1. Extract
    const candidates = extract(content);
    stats.extracted = candidates.length;
    if (candidates.length === 0) {
      logger.info(`${tag} No postings found`);
      return { source: content.source, stats, outcomes, errors, durationMs: performance.now() - start };
    }

    // 2. Validate
    const valid = validateParsedJobs(candidates, {
      onInvalid: (issues) => {
        stats.validationDropped++;
        logger.warn(`${tag} Dropped invalid posting: ${issues.map((issue) => issue.message).join('; ')}`);
      },
    });
    stats.validated = valid.length;

    // 3. Dedup + 4. Store
    for (const job of valid) {
      let outcome: CandidateOutcome;
      try {
        outcome = await serializeAdmission(store, () => admit(job, options));
      } catch (err) {
        const message = errorMessage(err);
        errors.push(message);
        logger.error(`${tag} Error: ${message}`);
        continue;
      }

      outcomes.push(outcome);
      if (outcome.action === 'skip') {
        stats.duplicates++;
        logger.info(`${tag} Skipped '${job.title}': ${outcome.rule} duplicate of #${outcome.duplicateOf}`);
      } else if (outcome.action === 'insert') {
        stats.inserted++;
      }
    }

    logger.info(
      `${tag} ${stats.extracted} extracted, ${stats.duplicates} duplicates, ${stats.inserted} inserted${dryRun ? ' (dry run)' : ''}`,
    );
  } catch (err) {
    const message = errorMessage(err);
    errors.push(message);
    logger.error(`${tag} Error: ${message}`);
  }

  return { source: content.source, stats, outcomes, errors, durationMs: performance.now() - start };
}

async function ingestProvider(provider: ContentProvider, options: IngestOptions): Promise<ProviderIngestionResult> {
  const { logger = defaultLogger } = options;
  const { id, name } = provider.manifest;
  const start = performance.now();
  const stats = emptyStats();
  const errors: string[] = [];
  let items = 0;

  try {
    logger.info(`[ingest:${id}] Fetching content from ${name}...`);
    const contents = await provider.fetch();
    items = contents.length;
    logger.info(`[ingest:${id}] Received ${items} items`);

    for (const content of contents) {
      const result = await ingestContent(content, options);
      addStats(stats, result.stats);
      errors.push(...result.errors);
    }
  } catch (err) {
    const message = errorMessage(err);
    errors.push(message);
    logger.error(`[ingest:${id}] Error: ${message}`);
  }

  return { providerId: id, providerName: name, items, stats, errors, durationMs: performance.now() - start };
}

/**
 * Run the pipeline for an array of providers.
 * Providers are processed sequentially with a jittered pause between them to avoid rate-limiting.
 */
export async function ingest(providers: ContentProvider[], options: IngestOptions): Promise<IngestionResult> {
  const { logger = defaultLogger, delayMs = 0, sleep = defaultSleep } = options;
  const start = performance.now();
  const results: ProviderIngestionResult[] = [];

  for (const [index, provider] of providers.entries()) {
    if (index > 0 && delayMs > 0) {
      await sleep(addJitter(delayMs));
    }

    results.push(await ingestProvider(provider, options));
  }

  const totalInserted = results.reduce((sum, r) => sum + r.stats.inserted, 0);
  const totalErrors = results.reduce((sum, r) => sum + r.errors.length, 0);

  logger.info(`[ingest] Done. ${totalInserted} total jobs stored across ${providers.length} providers.`);

  if (totalErrors > 0) {
    const failedIds = results.filter((r) => r.errors.length > 0).map((r) => r.providerId);
    logger.error(`[ingest] ${totalErrors} error(s) from: ${failedIds.join(', ')}`);
  }

  return { providers: results, totalInserted, totalErrors, durationMs: performance.now() - start };
}
