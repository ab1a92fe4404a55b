import { resolve } from 'node:path';
import { createDirectoryProviders } from '../../apps/worker/src/providers/directory.js';
import { closeRedis, createRedisConnection } from '../../apps/worker/src/redis.js';
import { closeQueues, createQueues, toContentJobData } from '../../apps/worker/src/queues.js';

async function main(): Promise<void> {
  const root = resolve(process.argv[2] ?? process.env.INGEST_DIR ?? './inbox');
  const redisUrl = process.env.REDIS_URL ?? 'redis://localhost:6379';

  const redis = createRedisConnection(redisUrl);
  const queues = createQueues(redis);

  try {
    for (const provider of await createDirectoryProviders(root)) {
      const contents = await provider.fetch();
      for (const [index, content] of contents.entries()) {
        const traceId = `manual-${provider.manifest.id}-${index}-${Date.now()}`;

        await queues.contentIngestQueue.add(
          'content-ingest',
          { ...toContentJobData(content), traceId },
          {
            jobId: traceId,
            attempts: 3,
            backoff: {
              type: 'exponential',
              delay: 5000,
            },
            removeOnComplete: true,
            removeOnFail: 1000,
          },
        );
      }

      console.log(`queued ${contents.length} content.ingest jobs from ${provider.manifest.name}`);
    }
  } finally {
    await closeQueues(queues);
    await closeRedis(redis);
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
