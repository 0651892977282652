import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import pino from 'pino';
import { createSourceResolver } from '../source-resolver.js';
import {
  ProductsApiError,
  ProductsTransportError,
  type ProductsPageResult,
} from '../../api/products-client.js';
import type { RawPayload } from '../raw-payload.js';
import { ExtractionFailedError, FallbackUnavailableError } from '../../lib/errors.js';

const logger = pino({ level: 'silent' });

function livePage(records: RawPayload): ProductsPageResult {
  return { records, responseBytes: 128, responseTimeMs: 42 };
}

const seedRecords = [
  { id: 1, title: 'Seed Mug', price: 9.5, category: 'home', rating: { rate: 4.1, count: 10 } },
  { id: 2, title: 'Seed Scarf', price: '12.00', category: 'clothing', rating: { rate: 3.2, count: 4 } },
  { id: 3, title: 'Crème Tin', price: null, category: 'home', rating: { rate: 5, count: 1 } },
];

describe('createSourceResolver', () => {
  let dir: string;
  let fallbackPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'source-resolver-'));
    fallbackPath = path.join(dir, 'products_seed.json');
    fs.writeFileSync(fallbackPath, JSON.stringify(seedRecords, null, 2), 'utf8');
  });

  describe('forced fallback mode', () => {
    it('returns the fallback records unmodified without a live call', async () => {
      const fetchLive = vi.fn(async () => livePage([{ id: 99 }]));
      const resolver = createSourceResolver({ mode: 'fallback', fallbackPath, logger, fetchLive });

      const result = await resolver.resolve();

      expect(fetchLive).not.toHaveBeenCalled();
      expect(result.origin).toBe('forced_fallback');
      expect(result.records).toHaveLength(3);
      expect(result.records).toEqual(seedRecords);
    });

    it('fails with FallbackUnavailableError when the file is missing', async () => {
      const resolver = createSourceResolver({
        mode: 'fallback',
        fallbackPath: path.join(dir, 'missing.json'),
        logger,
        fetchLive: vi.fn(async () => livePage([])),
      });

      await expect(resolver.resolve()).rejects.toBeInstanceOf(FallbackUnavailableError);
    });

    it('fails with FallbackUnavailableError when the file is not a record array', async () => {
      fs.writeFileSync(fallbackPath, '{"id": 1}', 'utf8');
      const resolver = createSourceResolver({ mode: 'fallback', fallbackPath, logger, fetchLive: vi.fn(async () => livePage([])) });

      await expect(resolver.resolve()).rejects.toThrow(
        `Fallback payload at ${fallbackPath} is unusable: expected an array of records`,
      );
    });
  });

  describe('live mode', () => {
    it('returns the live records on success', async () => {
      const live = [{ id: 7, title: 'Live Lamp' }];
      const resolver = createSourceResolver({ mode: 'live', fallbackPath, logger, fetchLive: async () => livePage(live) });

      const result = await resolver.resolve();

      expect(result).toEqual({ origin: 'live', records: live });
    });

    it('logs response size and latency on a live success', async () => {
      const info = vi.spyOn(logger, 'info');
      const resolver = createSourceResolver({
        mode: 'live',
        fallbackPath,
        logger,
        fetchLive: async () => livePage([{ id: 7 }, { id: 8 }]),
      });

      await resolver.resolve();

      expect(info).toHaveBeenCalledWith(
        { records: 2, responseBytes: 128, responseTimeMs: 42 },
        'Live product fetch succeeded',
      );
      info.mockRestore();
    });

    it('falls back to the static payload on a non-2xx response', async () => {
      const resolver = createSourceResolver({
        mode: 'live',
        fallbackPath,
        logger,
        fetchLive: async () => {
          throw new ProductsApiError('Product API error: 403 Forbidden', 403);
        },
      });

      const result = await resolver.resolve();

      expect(result.origin).toBe('fallback');
      expect(result.records).toEqual(seedRecords);
    });

    it('falls back on a transport failure', async () => {
      const resolver = createSourceResolver({
        mode: 'live',
        fallbackPath,
        logger,
        fetchLive: async () => {
          throw new ProductsTransportError('Product API request failed: timed out after 30000ms');
        },
      });

      const result = await resolver.resolve();

      expect(result.origin).toBe('fallback');
      expect(result.records).toHaveLength(3);
    });

    it('fails with ExtractionFailedError when the fallback also fails', async () => {
      const liveError = new ProductsApiError('Product API error: 500 Internal Server Error', 500);
      const resolver = createSourceResolver({
        mode: 'live',
        fallbackPath: path.join(dir, 'missing.json'),
        logger,
        fetchLive: async () => {
          throw liveError;
        },
      });

      const error = await resolver.resolve().catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ExtractionFailedError);
      if (!(error instanceof ExtractionFailedError)) return;
      expect(error.liveError).toBe(liveError);
      expect(error.fallbackError).toBeInstanceOf(FallbackUnavailableError);
      expect(error.message).toMatch(/^No product data available: live fetch failed \(Product API error: 500/);
    });

    it('logs which branch was taken', async () => {
      const warn = vi.spyOn(logger, 'warn');
      const resolver = createSourceResolver({
        mode: 'live',
        fallbackPath,
        logger,
        fetchLive: async () => {
          throw new ProductsApiError('Product API error: 429 Too Many Requests', 429);
        },
      });

      await resolver.resolve();

      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn.mock.calls[0][1]).toBe(
        'Live product fetch failed (Product API error: 429 Too Many Requests), falling back to static snapshot',
      );
      warn.mockRestore();
    });
  });
});
