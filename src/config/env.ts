import { z } from 'zod';

export const SOURCE_MODES = ['live', 'fallback'] as const;
export type SourceMode = (typeof SOURCE_MODES)[number];

// Empty strings in .env files mean "not set"
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value : undefined));

const envSchema = z.object({
  // Product source
  PRODUCTS_API_URL: z.string().url().default('https://fakestoreapi.com/products'),
  PRODUCTS_API_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  SOURCE_MODE: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.enum(SOURCE_MODES).optional(),
  ),
  GITHUB_ACTIONS: optionalString,
  FALLBACK_PAYLOAD_PATH: z.string().min(1).default('sample_data/products_seed.json'),

  // Output areas
  RAW_DATA_DIR: z.string().min(1).default('data/raw'),
  CURATED_DATA_DIR: z.string().min(1).default('data/curated'),

  // PostgreSQL (optional load target)
  DATABASE_URL: optionalString,
  DATABASE_POOL_SIZE: z.coerce.number().int().positive().default(5),

  // Cloudflare R2 (optional archive target)
  R2_ACCOUNT_ID: optionalString,
  R2_ACCESS_KEY_ID: optionalString,
  R2_SECRET_ACCESS_KEY: optionalString,
  R2_BUCKET_NAME: z.string().min(1).default('catalog-etl'),
  R2_ENDPOINT: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.string().url().optional(),
  ),

  // Worker Configuration
  // 0 runs the pipeline once and exits
  PIPELINE_CADENCE_SECONDS: z.coerce.number().int().nonnegative().default(0),
  WORKER_HEALTH_PORT: z.coerce.number().int().positive().default(3001),
  WORKER_LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  // Node
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

export interface R2Settings {
  endpoint: string;
  accessKeyId: string;
  secretAccessKey: string;
  bucketName: string;
}

let _env: Env | null = null;

/**
 * Validate an environment map without touching the cached copy.
 * Throws one error listing every invalid variable.
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const formatted = result.error.flatten().fieldErrors;
    const messages = Object.entries(formatted)
      .map(([key, errors]) => `  ${key}: ${errors?.join(', ')}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${messages}`);
  }

  return result.data;
}

export function loadEnv(): Env {
  if (_env) return _env;
  _env = parseEnv(process.env);
  return _env;
}

export function getEnv(): Env {
  if (!_env) {
    throw new Error('Environment not loaded. Call loadEnv() first.');
  }
  return _env;
}

/**
 * An explicit SOURCE_MODE wins. Otherwise GitHub Actions runners get the
 * committed fallback, since the product API rejects them.
 */
export function resolveSourceMode(env: Pick<Env, 'SOURCE_MODE' | 'GITHUB_ACTIONS'>): SourceMode {
  if (env.SOURCE_MODE) return env.SOURCE_MODE;
  return env.GITHUB_ACTIONS === 'true' ? 'fallback' : 'live';
}

/**
 * R2 archiving is on only when every credential is present. The endpoint
 * falls back to the account's default R2 host.
 */
export function getR2Settings(env: Env): R2Settings | null {
  const { R2_ACCOUNT_ID, R2_ACCESS_KEY_ID, R2_SECRET_ACCESS_KEY, R2_BUCKET_NAME } = env;
  const endpoint =
    env.R2_ENDPOINT ?? (R2_ACCOUNT_ID ? `https://${R2_ACCOUNT_ID}.r2.cloudflarestorage.com` : undefined);
  if (!endpoint || !R2_ACCESS_KEY_ID || !R2_SECRET_ACCESS_KEY) {
    return null;
  }
  return {
    endpoint,
    accessKeyId: R2_ACCESS_KEY_ID,
    secretAccessKey: R2_SECRET_ACCESS_KEY,
    bucketName: R2_BUCKET_NAME,
  };
}
