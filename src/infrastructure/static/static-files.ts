import { readdir, readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import type { StaticFileLoader } from '../../domain/index.js';

export const DEFAULT_STATIC_DIR = resolve(process.cwd(), 'public', 'dev-console');

/**
 * Loader for the dashboard files: every regular file directly inside
 * `dir`, keyed by file name. Read errors reject; the console treats that
 * as fatal.
 */
export function staticFileLoader(dir: string = DEFAULT_STATIC_DIR): StaticFileLoader {
  return async () => {
    const entries = await readdir(dir, { withFileTypes: true });
    const files = new Map<string, string>();

    for (const entry of entries) {
      if (!entry.isFile()) continue;
      files.set(entry.name, await readFile(join(dir, entry.name), 'utf-8'));
    }

    return files;
  };
}
