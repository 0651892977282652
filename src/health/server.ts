import Fastify, { type FastifyInstance, type FastifyRequest, type FastifyReply } from 'fastify';
import type { RunEntry, RunHistory } from '../pipeline/run-history.js';

let _server: FastifyInstance | null = null;

export interface HealthServerOptions {
  history: RunHistory;
  cadenceMs: number;
  now?: () => Date;
}

type HealthStatus = 'starting' | 'healthy' | 'degraded';

function describeRun(entry: RunEntry) {
  return {
    runId: entry.runId,
    status: entry.status,
    startedAt: entry.startedAt.toISOString(),
    completedAt: entry.completedAt.toISOString(),
    origin: entry.result?.origin ?? null,
    recordsCurated: entry.result?.recordsCurated ?? null,
    error: entry.error,
  };
}

/**
 * Healthy while the last run succeeded within 2x the cadence.
 */
export function buildHealthServer(options: HealthServerOptions): FastifyInstance {
  const { history, cadenceMs } = options;
  const now = options.now ?? (() => new Date());
  const staleAfterMs = 2 * cadenceMs;

  const server = Fastify({ logger: false });

  server.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    const latest = history.latest();
    const timestamp = now();

    if (!latest) {
      // No runs yet: don't fail the probe during the first run
      return reply.code(200).send({ status: 'starting', timestamp: timestamp.toISOString(), lastRun: null });
    }

    const isStale = timestamp.getTime() - latest.completedAt.getTime() > staleAfterMs;
    const status: HealthStatus = latest.status === 'completed' && !isStale ? 'healthy' : 'degraded';

    return reply.code(status === 'healthy' ? 200 : 503).send({
      status,
      timestamp: timestamp.toISOString(),
      stale: isStale,
      lastRun: describeRun(latest),
    });
  });

  // Simple liveness probe
  server.get('/live', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.code(200).send({ status: 'alive' });
  });

  return server;
}

export async function startHealthServer(port: number, options: HealthServerOptions): Promise<void> {
  _server = buildHealthServer(options);
  await _server.listen({ port, host: '0.0.0.0' });
}

export async function stopHealthServer(): Promise<void> {
  if (_server) {
    await _server.close();
    _server = null;
  }
}
