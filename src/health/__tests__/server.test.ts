import { describe, it, expect, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildHealthServer } from '../server.js';
import { RunHistory, type RunEntry } from '../../pipeline/run-history.js';

const cadenceMs = 60_000;
const clock = new Date('2024-03-01T12:00:00Z');

function entryAt(status: RunEntry['status'], completedAt: Date): RunEntry {
  return {
    runId: 'run-7',
    status,
    startedAt: completedAt,
    completedAt,
    result:
      status === 'completed'
        ? {
            runId: 'run-7',
            startedAt: completedAt,
            completedAt,
            origin: 'live',
            snapshotPath: 'data/raw/products_20240301_115900.json',
            recordsReceived: 20,
            recordsCurated: 20,
            loads: [],
          }
        : null,
    error: status === 'failed' ? { name: 'ExtractionFailedError', message: 'No product data available' } : null,
  };
}

describe('health server', () => {
  let server: FastifyInstance;

  afterEach(async () => {
    await server.close();
  });

  function build(history: RunHistory) {
    server = buildHealthServer({ history, cadenceMs, now: () => clock });
    return server;
  }

  it('reports starting before the first run', async () => {
    const response = await build(new RunHistory()).inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'starting', timestamp: '2024-03-01T12:00:00.000Z', lastRun: null });
  });

  it('reports healthy after a recent successful run', async () => {
    const history = new RunHistory();
    history.record(entryAt('completed', new Date('2024-03-01T11:59:00Z')));

    const response = await build(history).inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      status: 'healthy',
      timestamp: '2024-03-01T12:00:00.000Z',
      stale: false,
      lastRun: {
        runId: 'run-7',
        status: 'completed',
        startedAt: '2024-03-01T11:59:00.000Z',
        completedAt: '2024-03-01T11:59:00.000Z',
        origin: 'live',
        recordsCurated: 20,
        error: null,
      },
    });
  });

  it('reports degraded after a failed run', async () => {
    const history = new RunHistory();
    history.record(entryAt('failed', new Date('2024-03-01T11:59:30Z')));

    const response = await build(history).inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toMatchObject({
      status: 'degraded',
      stale: false,
      lastRun: { status: 'failed', origin: null, error: { name: 'ExtractionFailedError' } },
    });
  });

  it('reports degraded when the last success is older than two cadences', async () => {
    const history = new RunHistory();
    history.record(entryAt('completed', new Date('2024-03-01T11:57:59Z')));

    const response = await build(history).inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toMatchObject({ status: 'degraded', stale: true });
  });

  it('answers the liveness probe', async () => {
    const response = await build(new RunHistory()).inject({ method: 'GET', url: '/live' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'alive' });
  });
});
