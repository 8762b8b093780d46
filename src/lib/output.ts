import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

import { WriteError, describeError } from '../api/base';
import type { CompiledDataset } from './compile';
import { logWarn } from './log';

export function serializeDataset(entries: CompiledDataset): string {
  const rows = entries.map(entry => ({ neoInfo: entry.neoInfo, orbitalData: entry.orbitalData }));
  return `${JSON.stringify(rows, null, 2)}\n`;
}

/**
 * Replaces `path` with the serialized dataset. The document is written to a
 * sibling temp file first and renamed into place, so the destination only
 * ever holds a previous complete file or the new one.
 */
export async function writeDataset(path: string, entries: CompiledDataset): Promise<void> {
  const dir = dirname(path);
  const tmpPath = join(dir, `.${basename(path)}.${process.pid}.tmp`);
  try {
    await mkdir(dir, { recursive: true });
    await writeFile(tmpPath, serializeDataset(entries), 'utf8');
    await rename(tmpPath, path);
  } catch (error) {
    await rm(tmpPath, { force: true }).catch(cleanupError => {
      logWarn('output_tmp_cleanup_failed', { path: tmpPath, error: describeError(cleanupError) });
    });
    throw new WriteError(path, error);
  }
}
