import { Redis as IORedis } from 'ioredis';

/**
 * BullMQ workers block on Redis commands, so per-request retries stay disabled.
 */
export function createRedisConnection(redisUrl: string): IORedis {
  return new IORedis(redisUrl, {
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
  });
}

/**
 * QUIT if the connection ever came up, otherwise drop it.
 */
export async function closeRedis(redis: IORedis): Promise<void> {
  if (redis.status === 'ready' || redis.status === 'connect') {
    await redis.quit();
    return;
  }

  redis.disconnect();
}
