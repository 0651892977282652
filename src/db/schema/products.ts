import {
  pgTable,
  bigint,
  varchar,
  numeric,
  text,
  timestamp,
  jsonb,
  index,
} from 'drizzle-orm/pg-core';

// ─── Curated Products ────────────────────────────────────────────────────────

export const products = pgTable(
  'products',
  {
    id: bigint('id', { mode: 'number' }).primaryKey(),
    title: text('title'),
    price: numeric('price'),
    category: varchar('category'),
    ratingRate: numeric('rating_rate'),
    ratingCount: numeric('rating_count'),
    priceWithVat: numeric('price_with_vat'),

    // Flattened source columns outside the fixed schema (description, image, ...)
    extras: jsonb('extras'),

    snapshotPath: text('snapshot_path'),
    loadedAt: timestamp('loaded_at', { withTimezone: true }).notNull(),
  },
  (table) => [index('idx_products_category').on(table.category)],
);

export type Product = typeof products.$inferSelect;
export type NewProduct = typeof products.$inferInsert;
