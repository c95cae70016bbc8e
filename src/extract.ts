import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve, relative, isAbsolute, sep, posix } from 'node:path';
import type { Archive } from './archive.js';
import type { Entry } from './entry.js';
import { UnsafePathError } from './errors.js';

export interface ExtractOptions {
  outputDir: string;
  /** Recreate the entry's directory hierarchy under outputDir instead of using only its base name. */
  fullPath?: boolean;
}

/**
 * Where an entry lands on disk. Names that would escape `outputDir` are
 * refused.
 */
export function targetPath(name: string, opts: ExtractOptions): string {
  const relPath = name.replace(/\\/g, '/');
  const root = resolve(opts.outputDir);
  const target = resolve(root, opts.fullPath ? relPath : posix.basename(relPath));

  const rel = relative(root, target);
  if (rel === '' || rel === '..' || rel.startsWith('..' + sep) || isAbsolute(rel)) {
    throw new UnsafePathError(name, opts.outputDir);
  }
  return target;
}

/**
 * Extract one entry, creating parent directories as needed.
 * Returns the path written.
 */
export async function extractEntry(archive: Archive, name: string, opts: ExtractOptions): Promise<string> {
  const entry = archive.entry(name);
  const target = targetPath(entry.name, opts);
  const data = await archive.read(entry.name);

  await mkdir(dirname(target), { recursive: true });
  await writeFile(target, data);
  return target;
}

export type ProgressCallback = (done: number, total: number, entry: Entry) => void;

/**
 * Extract every entry with its full path, in directory order.
 */
export async function extractAll(archive: Archive, outputDir: string, onProgress?: ProgressCallback): Promise<string[]> {
  const entries = archive.list();
  const written: string[] = [];
  for (const entry of entries) {
    written.push(await extractEntry(archive, entry.name, { outputDir, fullPath: true }));
    onProgress?.(written.length, entries.length, entry);
  }
  return written;
}
