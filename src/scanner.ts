import { readdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';

const IGNORED_NAMES = new Set(['Thumbs.db', 'desktop.ini']);

function isIgnored(name: string): boolean {
  return name.startsWith('.') || IGNORED_NAMES.has(name) || name.endsWith('.tmp');
}

async function walk(dir: string, files: string[], onFile?: (path: string) => void): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });

  for (const entry of entries) {
    if (isIgnored(entry.name)) {
      continue;
    }

    const fullPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      await walk(fullPath, files, onFile);
      continue;
    }

    if (entry.isFile()) {
      files.push(fullPath);
      onFile?.(fullPath);
    }
  }
}

/**
 * Every file under `root` as an absolute path, sorted. Hidden entries and
 * leftover temp files are skipped.
 */
export async function scanExtractionRoot(root: string, onFile?: (path: string) => void): Promise<string[]> {
  const files: string[] = [];
  await walk(resolve(root), files, onFile);

  return files.sort();
}
