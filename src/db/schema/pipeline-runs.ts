import {
  pgTable,
  varchar,
  integer,
  bigserial,
  text,
  timestamp,
  uuid,
  jsonb,
  index,
} from 'drizzle-orm/pg-core';

// ─── Pipeline Runs ───────────────────────────────────────────────────────────

export const pipelineRuns = pgTable(
  'pipeline_runs',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    runId: uuid('run_id').notNull().unique(),
    startedAt: timestamp('started_at', { withTimezone: true }).notNull(),
    completedAt: timestamp('completed_at', { withTimezone: true }).notNull(),
    status: varchar('status').notNull(), // 'completed', 'failed'
    sourceOrigin: varchar('source_origin'), // 'live', 'fallback', 'forced_fallback'
    snapshotPath: text('snapshot_path'),

    recordsReceived: integer('records_received'),
    recordsCurated: integer('records_curated'),

    errorName: varchar('error_name'),
    errorMessage: text('error_message'),

    // Per-sink outcomes: [{ sink, target, rowsWritten, rowsSkipped, artifacts }]
    loads: jsonb('loads'),
  },
  (table) => [index('idx_pipeline_runs_started').on(table.startedAt)],
);

export type PipelineRun = typeof pipelineRuns.$inferSelect;
export type NewPipelineRun = typeof pipelineRuns.$inferInsert;
