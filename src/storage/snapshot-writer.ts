import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { PersistenceFailedError, errorMessage } from '../lib/errors.js';
import type { RawPayload } from '../extract/raw-payload.js';

export const SNAPSHOT_PREFIX = 'products_';

export interface SnapshotWriterOptions {
  rawDir: string;
  now?: () => Date;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time, one-second granularity: YYYYMMDD_HHMMSS.
 */
export function formatSnapshotTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function snapshotFileName(date: Date): string {
  return `${SNAPSHOT_PREFIX}${formatSnapshotTimestamp(date)}.json`;
}

/**
 * Persist the raw payload exactly as received, pretty-printed UTF-8 with
 * non-ASCII characters kept as is. Returns the snapshot path.
 *
 * Two writes in the same second share a name and the later one replaces
 * the earlier file.
 */
export async function writeSnapshot(payload: RawPayload, options: SnapshotWriterOptions): Promise<string> {
  const now = options.now ?? (() => new Date());
  const path = join(options.rawDir, snapshotFileName(now()));

  try {
    await mkdir(options.rawDir, { recursive: true });
    await writeFile(path, JSON.stringify(payload, null, 2), 'utf8');
  } catch (err) {
    throw new PersistenceFailedError(`Snapshot could not be written to ${path}: ${errorMessage(err)}`, path, {
      cause: err,
    });
  }

  return path;
}
