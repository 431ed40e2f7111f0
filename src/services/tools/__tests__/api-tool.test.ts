import { describe, it, expect, vi, afterEach } from 'vitest';
import { ToolExecutor } from '../executor.js';
import type { ApiToolDescriptor } from '../types.js';

const executor = new ToolExecutor({
  databaseUrl: 'sqlite::memory:',
  functionToolsEnabled: false,
  functionTimeoutMs: 1000,
  functionMemoryMb: 32,
});

const weather: ApiToolDescriptor = {
  name: 'weather',
  description: 'Weather lookup',
  kind: 'api',
  parameterSchema: { type: 'object', properties: { city: { type: 'string' } } },
  config: { url: 'https://weather.test/api', method: 'GET', headers: { 'X-Key': 'config-key' }, timeoutSeconds: 5 },
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

describe('API Tool', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should send GET parameters as a query string', async () => {
    const fetchMock = vi.fn(async (_url: URL | string, _init?: RequestInit) => jsonResponse({ temp: 21 }));
    vi.stubGlobal('fetch', fetchMock);

    const response = await executor.execute(weather, { city: 'Oslo', days: 2 });

    expect(response).toMatchObject({
      success: true,
      result: { statusCode: 200, data: { temp: 21 }, headers: { 'content-type': 'application/json' } },
    });
    const [url, init] = fetchMock.mock.calls[0];
    expect(String(url)).toBe('https://weather.test/api?city=Oslo&days=2');
    expect(init).toMatchObject({ method: 'GET', body: undefined });
  });

  it('should let call-time headers override configured ones', async () => {
    const fetchMock = vi.fn(async (_url: URL | string, _init?: RequestInit) => jsonResponse({}));
    vi.stubGlobal('fetch', fetchMock);

    await executor.execute(weather, { city: 'Oslo' }, { headers: { 'X-Key': 'call-key', 'X-Trace': '1' } });

    const [, init] = fetchMock.mock.calls[0];
    expect(init).toMatchObject({ headers: { 'X-Key': 'call-key', 'X-Trace': '1' } });
  });

  it('should send a JSON body for POST, preferring parameters.data', async () => {
    const fetchMock = vi.fn(async (_url: URL | string, _init?: RequestInit) => jsonResponse({ id: 7 }, 201));
    vi.stubGlobal('fetch', fetchMock);

    const response = await executor.execute(
      { ...weather, config: { url: 'https://orders.test/orders', method: 'POST' } },
      { data: { item: 'valve', qty: 2 }, ignored: true },
    );

    expect(response).toMatchObject({ success: true, result: { statusCode: 201, data: { id: 7 } } });
    const [, init] = fetchMock.mock.calls[0];
    expect(init).toMatchObject({
      method: 'POST',
      body: '{"item":"valve","qty":2}',
      headers: { 'Content-Type': 'application/json' },
    });
  });

  it('should fall back to raw text when the body is not JSON', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('plain words', { status: 200 })));

    const response = await executor.execute(weather, {});

    expect(response).toMatchObject({ success: true, result: { data: 'plain words' } });
  });

  it('should report non-2xx responses as failures', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('boom', { status: 500 })));

    const response = await executor.execute(weather, {});

    expect(response).toMatchObject({ success: false, errorMessage: 'API call failed: HTTP 500: boom' });
  });

  it('should report timeouts', async () => {
    const timeout = Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
    vi.stubGlobal('fetch', vi.fn(async () => Promise.reject(timeout)));

    const response = await executor.execute(weather, {});

    expect(response).toMatchObject({ success: false, errorMessage: 'API call timed out after 5s' });
  });

  it('should report network failures', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => Promise.reject(new TypeError('fetch failed'))));

    const response = await executor.execute(weather, {});

    expect(response).toMatchObject({ success: false, errorMessage: 'API call failed: fetch failed' });
  });

  it('should require a URL', async () => {
    const response = await executor.execute({ ...weather, config: {} }, {});

    expect(response).toMatchObject({ success: false, errorMessage: 'URL is required for API calls' });
  });
});
