import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createDirectoryProvider, createDirectoryProviders } from '../../src/providers/directory.js';

describe('directory providers', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'jobsift-inbox-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('reads content files in name order and skips other files', async () => {
    await mkdir(join(root, 'scrape'));
    await writeFile(join(root, 'scrape', 'b.txt'), 'Second posting');
    await writeFile(join(root, 'scrape', 'a.html'), '<!-- url: https://example.com/jobs/7 -->\n<p>First</p>');
    await writeFile(join(root, 'scrape', 'notes.md'), 'ignored');

    const provider = createDirectoryProvider(root, 'scrape');
    const contents = await provider.fetch();

    expect(provider.manifest).toEqual({ id: 'dir-scrape', name: join(root, 'scrape'), source: 'scrape' });
    expect(contents).toHaveLength(2);
    expect(contents[0]).toMatchObject({
      source: 'scrape',
      body: '<!-- url: https://example.com/jobs/7 -->\n<p>First</p>',
      url: 'https://example.com/jobs/7',
    });
    expect(contents[0]?.receivedAt).toBeInstanceOf(Date);
    expect(contents[1]).toMatchObject({ source: 'scrape', body: 'Second posting', url: undefined });
  });

  it('returns nothing for a missing directory', async () => {
    await expect(createDirectoryProvider(root, 'indeed').fetch()).resolves.toEqual([]);
  });

  it('creates providers only for source directories that exist', async () => {
    await mkdir(join(root, 'linkedin'));
    await mkdir(join(root, 'email-generic'));
    await mkdir(join(root, 'unknown'));

    const providers = await createDirectoryProviders(root);

    expect(providers.map((provider) => provider.manifest.id)).toEqual(['dir-linkedin', 'dir-email-generic']);
  });
});
