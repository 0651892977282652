import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { PersistenceFailedError, errorMessage } from '../lib/errors.js';
import type { CuratedTable } from '../transform/normalizer.js';
import { toCsv, toNdjson } from './csv.js';
import type { CuratedSink, LoadOutcome } from './types.js';

export const CURATED_CSV = 'products.csv';
export const CURATED_NDJSON = 'products.ndjson';

/**
 * Writes products.csv and products.ndjson under the curated directory,
 * replacing the previous run's files.
 */
export function createFileSink(curatedDir: string): CuratedSink {
  async function write(name: string, contents: string): Promise<string> {
    const path = join(curatedDir, name);
    try {
      await writeFile(path, contents, 'utf8');
    } catch (err) {
      throw new PersistenceFailedError(`Curated file could not be written to ${path}: ${errorMessage(err)}`, path, {
        cause: err,
      });
    }
    return path;
  }

  return {
    name: 'files',
    async load(table: CuratedTable): Promise<LoadOutcome> {
      try {
        await mkdir(curatedDir, { recursive: true });
      } catch (err) {
        throw new PersistenceFailedError(
          `Curated directory ${curatedDir} could not be created: ${errorMessage(err)}`,
          curatedDir,
          { cause: err },
        );
      }

      const csvPath = await write(CURATED_CSV, toCsv(table));
      const ndjsonPath = await write(CURATED_NDJSON, toNdjson(table));

      return {
        sink: 'files',
        target: curatedDir,
        rowsWritten: table.rows.length,
        rowsSkipped: 0,
        artifacts: [csvPath, ndjsonPath],
      };
    },
  };
}
