import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  BROWSER_HEADERS,
  ProductsApiError,
  ProductsTransportError,
  fetchProducts,
} from '../products-client.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(typeof body === 'string' ? body : JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

describe('fetchProducts', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns the decoded records on 200', async () => {
    const records = [{ id: 1, title: 'Mug', rating: { rate: 4, count: 2 } }];
    const fetchMock = vi.fn(async () => jsonResponse(records));
    vi.stubGlobal('fetch', fetchMock);

    const result = await fetchProducts({ url: 'https://api.example.test/products' });

    expect(result.records).toEqual(records);
    expect(result.responseBytes).toBe(JSON.stringify(records).length);
  });

  it('sends browser-identifying headers and a timeout signal', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse([]));
    vi.stubGlobal('fetch', fetchMock);

    await fetchProducts({ url: 'https://api.example.test/products', timeoutMs: 1000 });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.example.test/products');
    expect(init?.headers).toEqual(BROWSER_HEADERS);
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it('throws ProductsApiError with the status on non-2xx', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('Forbidden', { status: 403, statusText: 'Forbidden' })));

    const error = await fetchProducts().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProductsApiError);
    expect(error).toMatchObject({ statusCode: 403, responseBody: 'Forbidden' });
  });

  it('rejects a body that is not an array of records', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ products: [] })));

    await expect(fetchProducts()).rejects.toThrow(
      'Product API returned an unexpected shape: expected an array of records',
    );
  });

  it('rejects a body that is not JSON', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('<html>blocked</html>', { status: 200 })));

    await expect(fetchProducts()).rejects.toBeInstanceOf(ProductsApiError);
  });

  it('wraps connection failures in ProductsTransportError', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      }),
    );

    await expect(fetchProducts()).rejects.toThrow(
      new ProductsTransportError('Product API request failed: fetch failed'),
    );
  });

  it('reports timeouts', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new DOMException('The operation was aborted due to timeout', 'TimeoutError');
      }),
    );

    await expect(fetchProducts({ timeoutMs: 250 })).rejects.toThrow('Product API request failed: timed out after 250ms');
  });
});
