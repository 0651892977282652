import type { CuratedTable } from '../transform/normalizer.js';

export interface LoadContext {
  snapshotPath: string;
  startedAt: Date;
}

export interface LoadOutcome {
  sink: string;
  /** Where the rows went: a directory, a table name or a bucket. */
  target: string;
  rowsWritten: number;
  rowsSkipped: number;
  artifacts: string[];
}

/**
 * A destination for the curated table. Sinks run in order after
 * normalization; a thrown error fails the run.
 */
export interface CuratedSink {
  readonly name: string;
  load(table: CuratedTable, context: LoadContext): Promise<LoadOutcome>;
}
