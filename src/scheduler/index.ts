import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger } from '../lib/logger.js';
import type { RunEntry } from '../pipeline/run-history.js';

export interface SchedulerOptions {
  runOnce: () => Promise<RunEntry>;
  cadenceMs: number;
  logger: Logger;
}

export interface Scheduler {
  start(): void;
  stop(): Promise<void>;
  /** Resolves when the loop has exited. */
  done(): Promise<void>;
}

/**
 * Run the pipeline repeatedly. Non-overlapping: waits the cadence AFTER each
 * run completes before starting the next one.
 */
export function createScheduler(options: SchedulerOptions): Scheduler {
  const { runOnce, cadenceMs, logger } = options;

  let isRunning = false;
  let loop: Promise<void> = Promise.resolve();
  let abort = new AbortController();

  async function waitCadence(): Promise<void> {
    try {
      await sleep(cadenceMs, undefined, { signal: abort.signal });
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') return;
      throw err;
    }
  }

  async function runLoop(): Promise<void> {
    while (isRunning) {
      const entry = await runOnce();
      logger.info({ status: entry.status, completedAt: entry.completedAt.toISOString() }, 'Pipeline cycle finished');

      if (isRunning) {
        logger.debug({ cadenceMs }, 'Waiting before next pipeline cycle');
        await waitCadence();
      }
    }
  }

  return {
    start() {
      if (isRunning) return;
      isRunning = true;
      abort = new AbortController();
      loop = runLoop();
    },

    async stop() {
      isRunning = false;
      abort.abort();
      await loop;
    },

    done() {
      return loop;
    },
  };
}
