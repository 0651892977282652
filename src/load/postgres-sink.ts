import { sql } from 'drizzle-orm';
import type { Database } from '../db/connection.js';
import { products, type NewProduct } from '../db/schema/products.js';
import type { Logger } from '../lib/logger.js';
import type { CuratedTable, ProductRecord } from '../transform/normalizer.js';
import type { CuratedSink, LoadContext, LoadOutcome } from './types.js';

const UPSERT_BATCH_SIZE = 500;

/**
 * Map a curated row to a products row. Rows without an integer id have no
 * primary key and are skipped (null).
 */
export function toProductRow(record: ProductRecord, context: LoadContext): NewProduct | null {
  if (typeof record.id !== 'number' || !Number.isInteger(record.id)) return null;

  return {
    id: record.id,
    title: record.title,
    price: record.price?.toString() ?? null,
    category: record.category,
    ratingRate: record.rating_rate?.toString() ?? null,
    ratingCount: record.rating_count?.toString() ?? null,
    priceWithVat: record.price_with_vat?.toString() ?? null,
    extras: record.extras.size > 0 ? Object.fromEntries(record.extras) : null,
    snapshotPath: context.snapshotPath,
    loadedAt: context.startedAt,
  };
}

/**
 * Upsert curated rows into `products`, keyed on id.
 */
export function createPostgresSink(db: Database, logger: Logger): CuratedSink {
  return {
    name: 'postgres',
    async load(table: CuratedTable, context: LoadContext): Promise<LoadOutcome> {
      const rows: NewProduct[] = [];
      let skipped = 0;
      for (const record of table.rows) {
        const row = toProductRow(record, context);
        if (row) {
          rows.push(row);
        } else {
          skipped++;
        }
      }

      if (skipped > 0) {
        logger.warn({ skipped }, 'Skipped curated rows without an integer id');
      }

      for (let i = 0; i < rows.length; i += UPSERT_BATCH_SIZE) {
        const chunk = rows.slice(i, i + UPSERT_BATCH_SIZE);
        await db
          .insert(products)
          .values(chunk)
          .onConflictDoUpdate({
            target: products.id,
            set: {
              title: sql`excluded.title`,
              price: sql`excluded.price`,
              category: sql`excluded.category`,
              ratingRate: sql`excluded.rating_rate`,
              ratingCount: sql`excluded.rating_count`,
              priceWithVat: sql`excluded.price_with_vat`,
              extras: sql`excluded.extras`,
              snapshotPath: sql`excluded.snapshot_path`,
              loadedAt: sql`excluded.loaded_at`,
            },
          });
        logger.debug({ count: chunk.length }, 'Products batch upserted');
      }

      return {
        sink: 'postgres',
        target: 'products',
        rowsWritten: rows.length,
        rowsSkipped: skipped,
        artifacts: [],
      };
    },
  };
}
