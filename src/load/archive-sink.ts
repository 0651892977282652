import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import type { Logger } from '../lib/logger.js';
import { buildCuratedObjectKey, buildRawObjectKey } from '../storage/r2-client.js';
import type { CuratedTable } from '../transform/normalizer.js';
import { toCsv } from './csv.js';
import { CURATED_CSV } from './file-sink.js';
import type { CuratedSink, LoadContext, LoadOutcome } from './types.js';

export type ObjectUploader = (objectKey: string, body: Buffer | string, contentType: string) => Promise<void>;

/**
 * Copies the run's raw snapshot and curated CSV to the archive bucket.
 */
export function createArchiveSink(upload: ObjectUploader, bucket: string, logger: Logger): CuratedSink {
  return {
    name: 'archive',
    async load(table: CuratedTable, context: LoadContext): Promise<LoadOutcome> {
      const rawKey = buildRawObjectKey(basename(context.snapshotPath));
      const curatedKey = buildCuratedObjectKey(context.startedAt, CURATED_CSV);

      const snapshot = await readFile(context.snapshotPath);
      await upload(rawKey, snapshot, 'application/json; charset=utf-8');
      await upload(curatedKey, toCsv(table), 'text/csv; charset=utf-8');

      logger.debug({ bucket, rawKey, curatedKey }, 'Run artifacts archived');

      return {
        sink: 'archive',
        target: bucket,
        rowsWritten: table.rows.length,
        rowsSkipped: 0,
        artifacts: [rawKey, curatedKey],
      };
    },
  };
}
