import { readdir, readFile, stat } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { CONTENT_SOURCES, defineProvider } from '@jobsift/source-sdk';
import type { ContentProvider, ContentSource, RawContent } from '@jobsift/source-sdk';

const CONTENT_EXTENSIONS = new Set(['.html', '.htm', '.txt']);
const URL_COMMENT = /^\s*<!--\s*url:\s*(\S+)\s*-->/i;

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * One saved page or email body. A leading `<!-- url: ... -->` comment gives the page URL.
 */
async function readContentFile(path: string, source: ContentSource): Promise<RawContent> {
  const [body, info] = await Promise.all([readFile(path, 'utf8'), stat(path)]);
  const url = URL_COMMENT.exec(body)?.[1];

  return { source, body, url, receivedAt: info.mtime };
}

/**
 * Provider over `<root>/<source>/*.{html,htm,txt}`, files in name order.
 */
export function createDirectoryProvider(root: string, source: ContentSource): ContentProvider {
  const dir = join(root, source);

  return defineProvider({
    manifest: { id: `dir-${source}`, name: dir, source },
    async fetch() {
      if (!(await isDirectory(dir))) {
        return [];
      }

      const names = (await readdir(dir))
        .filter((name) => CONTENT_EXTENSIONS.has(extname(name).toLowerCase()))
        .sort();

      const contents: RawContent[] = [];
      for (const name of names) {
        contents.push(await readContentFile(join(dir, name), source));
      }

      return contents;
    },
  });
}

/**
 * One provider per source directory present under `root`.
 */
export async function createDirectoryProviders(root: string): Promise<ContentProvider[]> {
  const providers: ContentProvider[] = [];
  for (const source of CONTENT_SOURCES) {
    if (await isDirectory(join(root, source))) {
      providers.push(createDirectoryProvider(root, source));
    }
  }

  return providers;
}
