import { resolve } from 'node:path';
import { closeDatabase, createDatabase, createRecordStore } from '@jobsift/db';
import { ingest } from '@jobsift/ingestion';
import { loadEnvFiles, readIntEnv, readRequiredEnv } from '../apps/worker/src/config.js';
import { createDirectoryProviders } from '../apps/worker/src/providers/directory.js';
import { createIngestionLogger } from '../apps/worker/src/observability/ingestion-logger.js';
import { createWorkerLogger } from '../apps/worker/src/observability/logger.js';

const DEFAULT_INGEST_DIR = './inbox';
const DEFAULT_DELAY_MS = 2000;

async function main(): Promise<number> {
  loadEnvFiles();
  const logger = createWorkerLogger('jobsift-ingest');
  const root = resolve(process.env.INGEST_DIR ?? DEFAULT_INGEST_DIR);
  const dryRun = process.argv.includes('--dry-run');

  const providers = await createDirectoryProviders(root);
  if (providers.length === 0) {
    logger.warn({ event: 'ingest_empty', root }, 'No source directories found');
    return 0;
  }

  const db = createDatabase(readRequiredEnv('DATABASE_URL'));
  try {
    const result = await ingest(providers, {
      store: createRecordStore(db),
      logger: createIngestionLogger(logger, 'ingest_run'),
      dryRun,
      delayMs: readIntEnv('INGEST_DELAY_MS', DEFAULT_DELAY_MS),
    });

    logger.info(
      {
        event: 'ingest_completed',
        root,
        dryRun,
        providers: result.providers.map((p) => ({ id: p.providerId, items: p.items, ...p.stats })),
        totalInserted: result.totalInserted,
        totalErrors: result.totalErrors,
        durationMs: Math.round(result.durationMs),
      },
      'Ingest completed',
    );

    return result.totalErrors > 0 ? 1 : 0;
  } finally {
    await closeDatabase(db);
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error) => {
    createWorkerLogger('jobsift-ingest').error({ event: 'ingest_fatal_error', error }, 'Ingest fatal error');
    process.exit(1);
  });
