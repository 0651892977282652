import 'dotenv/config';
import { randomUUID } from 'node:crypto';
import { getR2Settings, loadEnv, resolveSourceMode } from './config/env.js';
import { createLogger, createRunLogger } from './lib/logger.js';
import { createDb, closeDb } from './db/connection.js';
import { recordPipelineRun } from './db/run-store.js';
import { createSourceResolver } from './extract/source-resolver.js';
import { createFileSink } from './load/file-sink.js';
import { createPostgresSink } from './load/postgres-sink.js';
import { createArchiveSink } from './load/archive-sink.js';
import type { CuratedSink } from './load/types.js';
import { runPipeline } from './pipeline/run-pipeline.js';
import { RunHistory, executeRun, type RunEntry } from './pipeline/run-history.js';
import { createR2Client, uploadToR2 } from './storage/r2-client.js';
import { startHealthServer, stopHealthServer } from './health/server.js';
import { createScheduler } from './scheduler/index.js';

async function main() {
  // 1. Load and validate environment
  const env = loadEnv();

  // 2. Initialize logger
  const logger = createLogger();
  const sourceMode = resolveSourceMode(env);
  logger.info({ sourceMode, cadenceSeconds: env.PIPELINE_CADENCE_SECONDS }, 'Product catalog ETL starting');

  // 3. Optional load targets
  const db = env.DATABASE_URL ? createDb(env.DATABASE_URL, env.DATABASE_POOL_SIZE) : null;
  const r2 = getR2Settings(env);

  const sinks: CuratedSink[] = [createFileSink(env.CURATED_DATA_DIR)];
  if (db) {
    sinks.push(createPostgresSink(db, logger));
  }
  if (r2) {
    const s3 = createR2Client(r2);
    const upload = (objectKey: string, body: Buffer | string, contentType: string) =>
      uploadToR2(s3, r2.bucketName, objectKey, body, contentType);
    sinks.push(createArchiveSink(upload, r2.bucketName, logger));
  }

  const resolver = createSourceResolver({
    mode: sourceMode,
    fallbackPath: env.FALLBACK_PAYLOAD_PATH,
    logger,
    request: { url: env.PRODUCTS_API_URL, timeoutMs: env.PRODUCTS_API_TIMEOUT_MS },
  });

  const history = new RunHistory();
  const runOnce = (): Promise<RunEntry> => {
    const runId = randomUUID();
    const runLogger = createRunLogger(logger, runId);
    return executeRun(() => runPipeline({ runId, resolver, rawDir: env.RAW_DATA_DIR, sinks, logger: runLogger }), {
      runId,
      history,
      logger: runLogger,
      persist: db ? (entry) => recordPipelineRun(db, entry) : undefined,
    });
  };

  // 4a. One-shot run
  if (env.PIPELINE_CADENCE_SECONDS === 0) {
    const entry = await runOnce();
    await closeDb();
    process.exitCode = entry.status === 'completed' ? 0 : 1;
    return;
  }

  // 4b. Scheduled worker with health endpoints
  const cadenceMs = env.PIPELINE_CADENCE_SECONDS * 1000;
  await startHealthServer(env.WORKER_HEALTH_PORT, { history, cadenceMs });
  logger.info({ port: env.WORKER_HEALTH_PORT }, 'Health check server started');

  const scheduler = createScheduler({ runOnce, cadenceMs, logger });
  scheduler.start();
  logger.info('Pipeline scheduler started');

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutdown signal received');

    try {
      await scheduler.stop();
      logger.info('Scheduler stopped');

      await stopHealthServer();
      logger.info('Health server stopped');

      await closeDb();

      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled rejection');
  });

  await scheduler.done();
}

main().catch((err) => {
  console.error('Fatal startup error:', err);
  process.exit(1);
});
