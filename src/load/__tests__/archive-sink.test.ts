import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import pino from 'pino';
import { createArchiveSink } from '../archive-sink.js';
import { normalizeRecords } from '../../transform/normalizer.js';
import { buildCuratedObjectKey, buildRawObjectKey } from '../../storage/r2-client.js';

describe('object keys', () => {
  it('keeps the snapshot file name under raw/', () => {
    expect(buildRawObjectKey('products_20240101_120000.json')).toBe('raw/products_20240101_120000.json');
  });

  it('groups curated exports by UTC day', () => {
    expect(buildCuratedObjectKey(new Date('2024-03-09T23:30:00Z'), 'products.csv')).toBe(
      'curated/2024-03-09/products.csv',
    );
  });
});

describe('createArchiveSink', () => {
  let snapshotPath: string;

  beforeEach(() => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'archive-sink-'));
    snapshotPath = path.join(dir, 'products_20240309_120000.json');
    fs.writeFileSync(snapshotPath, '[{"id": 1}]', 'utf8');
  });

  it('uploads the raw snapshot and the curated CSV', async () => {
    const upload = vi.fn(async (_key: string, _body: Buffer | string, _contentType: string) => {});
    const sink = createArchiveSink(upload, 'test-bucket', pino({ level: 'silent' }));
    const table = normalizeRecords([{ id: 1 }]);

    const outcome = await sink.load(table, { snapshotPath, startedAt: new Date('2024-03-09T12:00:00Z') });

    expect(upload).toHaveBeenCalledTimes(2);
    const [rawCall, curatedCall] = upload.mock.calls;
    expect(rawCall[0]).toBe('raw/products_20240309_120000.json');
    expect(rawCall[1].toString()).toBe('[{"id": 1}]');
    expect(rawCall[2]).toBe('application/json; charset=utf-8');
    expect(curatedCall).toEqual([
      'curated/2024-03-09/products.csv',
      'id,title,price,category,rating_rate,rating_count,price_with_vat\n1,,,,,,\n',
      'text/csv; charset=utf-8',
    ]);
    expect(outcome.artifacts).toEqual(['raw/products_20240309_120000.json', 'curated/2024-03-09/products.csv']);
    expect(outcome.target).toBe('test-bucket');
  });
});
