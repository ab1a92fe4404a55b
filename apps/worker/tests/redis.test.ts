import type { Redis as IORedis } from 'ioredis';
import { describe, expect, it, vi } from 'vitest';
import { closeRedis } from '../src/redis.js';
import { stub } from './test-helpers.js';

describe('closeRedis', () => {
  it('quits a ready connection', async () => {
    const redis = stub<IORedis>({ status: 'ready', quit: vi.fn().mockResolvedValue('OK'), disconnect: vi.fn() });

    await closeRedis(redis);

    expect(vi.mocked(redis.quit)).toHaveBeenCalledTimes(1);
    expect(vi.mocked(redis.disconnect)).not.toHaveBeenCalled();
  });

  it('disconnects a connection that is still reconnecting', async () => {
    const redis = stub<IORedis>({ status: 'reconnecting', quit: vi.fn(), disconnect: vi.fn() });

    await closeRedis(redis);

    expect(vi.mocked(redis.quit)).not.toHaveBeenCalled();
    expect(vi.mocked(redis.disconnect)).toHaveBeenCalledTimes(1);
  });
});
