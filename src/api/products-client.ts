import { validatePayload, type RawPayload } from '../extract/raw-payload.js';

export const DEFAULT_PRODUCTS_URL = 'https://fakestoreapi.com/products';
export const DEFAULT_TIMEOUT_MS = 30_000;

// The endpoint rejects default client identifiers, so present as a desktop browser.
export const BROWSER_HEADERS: Readonly<Record<string, string>> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) ' +
    'AppleWebKit/537.36 (KHTML, like Gecko) ' +
    'Chrome/120.0.0.0 Safari/537.36',
  Accept: 'application/json',
};

export interface ProductsPageResult {
  records: RawPayload;
  responseBytes: number;
  responseTimeMs: number;
}

export interface FetchProductsOptions {
  url?: string;
  timeoutMs?: number;
}

// ─── Error Classes ───────────────────────────────────────────────────────────

/**
 * The server answered, but not with a usable product listing.
 */
export class ProductsApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly responseBody?: string,
  ) {
    super(message);
    this.name = 'ProductsApiError';
  }
}

/**
 * No answer at all: timeout, refused connection, DNS failure.
 */
export class ProductsTransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProductsTransportError';
  }
}

// ─── Fetching ────────────────────────────────────────────────────────────────

/**
 * GET the product listing and decode it as an array of records.
 * Throws ProductsApiError or ProductsTransportError; never retries.
 */
export async function fetchProducts(options: FetchProductsOptions = {}): Promise<ProductsPageResult> {
  const url = options.url ?? DEFAULT_PRODUCTS_URL;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const startTime = Date.now();

  let response: Response;
  try {
    response = await fetch(url, {
      headers: { ...BROWSER_HEADERS },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err) {
    const reason =
      err instanceof Error && err.name === 'TimeoutError'
        ? `timed out after ${timeoutMs}ms`
        : err instanceof Error
          ? err.message
          : String(err);
    throw new ProductsTransportError(`Product API request failed: ${reason}`, { cause: err });
  }

  if (!response.ok) {
    const body = await response.text().catch(() => undefined);
    throw new ProductsApiError(
      `Product API error: ${response.status} ${response.statusText}`,
      response.status,
      body,
    );
  }

  let rawBody: string;
  try {
    rawBody = await response.text();
  } catch (err) {
    throw new ProductsTransportError(
      `Product API response could not be read: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(rawBody);
  } catch {
    throw new ProductsApiError('Product API returned a body that is not JSON', response.status, rawBody);
  }

  const decoded = validatePayload(parsed);
  if (!decoded.ok) {
    throw new ProductsApiError(`Product API returned an unexpected shape: ${decoded.reason}`, response.status);
  }

  return {
    records: decoded.payload,
    responseBytes: new TextEncoder().encode(rawBody).length,
    responseTimeMs: Date.now() - startTime,
  };
}
