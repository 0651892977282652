import { defineConfig } from 'drizzle-kit';

export default defineConfig({
  schema: ['./src/db/schema/products.ts', './src/db/schema/pipeline-runs.ts'],
  out: './drizzle',
  dialect: 'postgresql',
  dbCredentials: {
    url: process.env.DATABASE_URL ?? '',
  },
  verbose: true,
  strict: true,
});
