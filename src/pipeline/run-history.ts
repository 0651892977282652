import type { Logger } from '../lib/logger.js';
import type { PipelineResult } from './run-pipeline.js';

export type RunStatus = 'completed' | 'failed';

export interface RunEntry {
  runId: string;
  status: RunStatus;
  startedAt: Date;
  completedAt: Date;
  result: PipelineResult | null;
  error: { name: string; message: string } | null;
}

/**
 * Most recent runs, newest last. Bounded so a long-lived worker does not grow.
 */
export class RunHistory {
  private readonly entries: RunEntry[] = [];

  constructor(private readonly limit: number = 20) {}

  record(entry: RunEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.limit) {
      this.entries.splice(0, this.entries.length - this.limit);
    }
  }

  latest(): RunEntry | null {
    return this.entries.at(-1) ?? null;
  }

  recent(): readonly RunEntry[] {
    return this.entries;
  }
}

export interface ExecuteRunOptions {
  runId: string;
  history: RunHistory;
  logger: Logger;
  /** Extra persistence, e.g. the pipeline_runs table. Failures are logged only. */
  persist?: (entry: RunEntry) => Promise<void>;
  now?: () => Date;
}

/**
 * Run the pipeline once and turn the outcome into a history entry. A failed
 * run is recorded and logged, never rethrown.
 */
export async function executeRun(
  run: () => Promise<PipelineResult>,
  options: ExecuteRunOptions,
): Promise<RunEntry> {
  const { runId, history, logger } = options;
  const now = options.now ?? (() => new Date());
  const startedAt = now();

  let entry: RunEntry;
  try {
    const result = await run();
    entry = {
      runId,
      status: 'completed',
      startedAt: result.startedAt,
      completedAt: result.completedAt,
      result,
      error: null,
    };
    logger.info(
      { origin: result.origin, records: result.recordsCurated, snapshotPath: result.snapshotPath },
      'Pipeline completed successfully',
    );
  } catch (err) {
    const error =
      err instanceof Error ? { name: err.name, message: err.message } : { name: 'Error', message: String(err) };
    entry = { runId, status: 'failed', startedAt, completedAt: now(), result: null, error };
    logger.error({ err }, `Pipeline failed: ${error.name}`);
  }

  history.record(entry);

  if (options.persist) {
    try {
      await options.persist(entry);
    } catch (persistErr) {
      logger.warn({ err: persistErr }, 'Failed to record pipeline run');
    }
  }

  return entry;
}
