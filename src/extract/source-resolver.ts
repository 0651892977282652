import type { SourceMode } from '../config/env.js';
import { ExtractionFailedError, errorMessage } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import { fetchProducts, type FetchProductsOptions, type ProductsPageResult } from '../api/products-client.js';
import { loadFallbackPayload } from './fallback-loader.js';
import type { RawPayload } from './raw-payload.js';

export type SourceOrigin = 'live' | 'fallback' | 'forced_fallback';

export interface ResolvedPayload {
  origin: SourceOrigin;
  records: RawPayload;
}

export interface SourceResolverOptions {
  mode: SourceMode;
  fallbackPath: string;
  logger: Logger;
  /** Live fetch; defaults to the product API client. */
  fetchLive?: () => Promise<ProductsPageResult>;
  /** Passed to the default live fetch. */
  request?: FetchProductsOptions;
}

export interface SourceResolver {
  resolve(): Promise<ResolvedPayload>;
}

type ResolverState =
  | { phase: 'live' }
  | { phase: 'falling_back'; forced: boolean; liveError: unknown }
  | { phase: 'done'; result: ResolvedPayload };

type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

async function settle<T>(promise: Promise<T>): Promise<Settled<T>> {
  try {
    return { ok: true, value: await promise };
  } catch (error) {
    return { ok: false, error };
  }
}

/**
 * Decide between the live product API and the committed fallback payload.
 *
 * Transitions:
 *   live         → done (live success) | falling_back (any live failure)
 *   falling_back → done (fallback loaded) | throw
 *
 * Forced-fallback mode starts in falling_back and rethrows the
 * FallbackUnavailableError as is. After a live failure, a fallback failure
 * becomes ExtractionFailedError carrying both causes.
 */
export function createSourceResolver(options: SourceResolverOptions): SourceResolver {
  const { mode, fallbackPath, logger } = options;
  const fetchLive = options.fetchLive ?? (() => fetchProducts(options.request));

  async function step(state: ResolverState): Promise<ResolverState> {
    switch (state.phase) {
      case 'live': {
        const attempt = await settle(fetchLive());
        if (attempt.ok) {
          const { records, responseBytes, responseTimeMs } = attempt.value;
          logger.info({ records: records.length, responseBytes, responseTimeMs }, 'Live product fetch succeeded');
          return { phase: 'done', result: { origin: 'live', records } };
        }
        logger.warn(
          { err: attempt.error, fallbackPath },
          `Live product fetch failed (${errorMessage(attempt.error)}), falling back to static snapshot`,
        );
        return { phase: 'falling_back', forced: false, liveError: attempt.error };
      }

      case 'falling_back': {
        const attempt = await settle(loadFallbackPayload(fallbackPath));
        if (attempt.ok) {
          if (state.forced) {
            logger.info({ records: attempt.value.length, fallbackPath }, 'Forced fallback mode, using static snapshot directly');
          } else {
            logger.info({ records: attempt.value.length, fallbackPath }, 'Static snapshot loaded after live failure');
          }
          return {
            phase: 'done',
            result: { origin: state.forced ? 'forced_fallback' : 'fallback', records: attempt.value },
          };
        }
        if (state.forced) {
          throw attempt.error;
        }
        throw new ExtractionFailedError(
          `No product data available: live fetch failed (${errorMessage(state.liveError)}) ` +
            `and fallback failed (${errorMessage(attempt.error)})`,
          state.liveError,
          attempt.error,
        );
      }

      case 'done':
        return state;
    }
  }

  return {
    async resolve(): Promise<ResolvedPayload> {
      let state: ResolverState =
        mode === 'fallback' ? { phase: 'falling_back', forced: true, liveError: null } : { phase: 'live' };

      while (state.phase !== 'done') {
        state = await step(state);
      }
      return state.result;
    },
  };
}
