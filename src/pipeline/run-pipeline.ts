import type { SourceOrigin, SourceResolver } from '../extract/source-resolver.js';
import type { Logger } from '../lib/logger.js';
import type { CuratedSink, LoadOutcome } from '../load/types.js';
import { writeSnapshot } from '../storage/snapshot-writer.js';
import { normalizeSnapshot } from '../transform/normalizer.js';

export interface PipelineDeps {
  runId: string;
  resolver: SourceResolver;
  rawDir: string;
  sinks: readonly CuratedSink[];
  logger: Logger;
  now?: () => Date;
}

export interface PipelineResult {
  runId: string;
  startedAt: Date;
  completedAt: Date;
  origin: SourceOrigin;
  snapshotPath: string;
  recordsReceived: number;
  recordsCurated: number;
  loads: LoadOutcome[];
}

/**
 * Extract → snapshot → normalize → load, strictly in sequence. Each stage
 * consumes only the previous stage's output. Any error propagates unchanged.
 */
export async function runPipeline(deps: PipelineDeps): Promise<PipelineResult> {
  const { runId, resolver, rawDir, sinks, logger } = deps;
  const now = deps.now ?? (() => new Date());
  const startedAt = now();

  // 1. Extract
  const { origin, records } = await resolver.resolve();
  const snapshotPath = await writeSnapshot(records, { rawDir, now });
  logger.info({ snapshotPath, origin, records: records.length }, 'Extracted raw data');

  // 2. Transform
  const table = await normalizeSnapshot(snapshotPath);
  logger.info(
    { records: table.rows.length, duplicatesDropped: records.length - table.rows.length },
    'Transformed records',
  );

  // 3. Load
  const loads: LoadOutcome[] = [];
  for (const sink of sinks) {
    const outcome = await sink.load(table, { snapshotPath, startedAt });
    loads.push(outcome);
    logger.info(
      { sink: outcome.sink, target: outcome.target, rows: outcome.rowsWritten, skipped: outcome.rowsSkipped },
      'Saved curated data',
    );
  }

  return {
    runId,
    startedAt,
    completedAt: now(),
    origin,
    snapshotPath,
    recordsReceived: records.length,
    recordsCurated: table.rows.length,
    loads,
  };
}
