import type { RunEntry } from '../pipeline/run-history.js';
import type { Database } from './connection.js';
import { pipelineRuns, type NewPipelineRun } from './schema/pipeline-runs.js';

export function toPipelineRunRow(entry: RunEntry): NewPipelineRun {
  return {
    runId: entry.runId,
    startedAt: entry.startedAt,
    completedAt: entry.completedAt,
    status: entry.status,
    sourceOrigin: entry.result?.origin ?? null,
    snapshotPath: entry.result?.snapshotPath ?? null,
    recordsReceived: entry.result?.recordsReceived ?? null,
    recordsCurated: entry.result?.recordsCurated ?? null,
    errorName: entry.error?.name ?? null,
    errorMessage: entry.error?.message ?? null,
    loads: entry.result?.loads ?? null,
  };
}

export async function recordPipelineRun(db: Database, entry: RunEntry): Promise<void> {
  await db.insert(pipelineRuns).values(toPipelineRunRow(entry));
}
