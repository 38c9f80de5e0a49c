import { beforeEach, describe, expect, it, vi } from 'vitest';
import { AuthenticationError, ConfigurationError } from '../errors';
import { TokenCache, TokenManager } from '../token-manager';

vi.mock('../../../lib/logging/server', () => ({
  logServerEvent: vi.fn(async () => undefined),
}));

const credentials = {
  apiKey: 'test-key',
  apiSecret: 'test-secret',
  tokenUrl: 'https://auth.example.test/oauth2/token.php',
};

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });

const queueFetch = (...responses: Array<Response | Error>) =>
  vi.fn(async (_input: string, _init?: RequestInit): Promise<Response> => {
    const next = responses.shift();
    if (!next) {
      throw new Error('unexpected fetch');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  });

const rejection = async <T extends Error>(
  promise: Promise<unknown>,
  type: new (...args: never[]) => T
): Promise<T> => {
  try {
    await promise;
  } catch (error) {
    if (error instanceof type) {
      return error;
    }
    throw error;
  }
  throw new Error('expected the promise to reject');
};

describe('TokenManager', () => {
  let now: number;
  const clock = () => now;

  beforeEach(() => {
    now = 1000;
  });

  it('rejects missing credentials without touching the network or the cache', async () => {
    const cache = new TokenCache();
    cache.store('previous-token', 5000);
    const fetchMock = queueFetch();

    for (const missing of ['apiKey', 'apiSecret', 'tokenUrl'] as const) {
      const manager = new TokenManager({ ...credentials, [missing]: '' }, { cache, clock, fetch: fetchMock });
      await expect(manager.getToken()).rejects.toBeInstanceOf(ConfigurationError);
    }

    expect(fetchMock).not.toHaveBeenCalled();
    expect(cache.token).toBe('previous-token');
    expect(cache.expiresAt).toBe(5000);
  });

  it('posts a client-credentials grant to the token URL', async () => {
    const fetchMock = queueFetch(jsonResponse({ access_token: 'tok-1', expires_in: 3600 }));
    const manager = new TokenManager(credentials, { clock, fetch: fetchMock });

    await manager.getToken();

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://auth.example.test/oauth2/token.php');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('grant_type=client_credentials&client_id=test-key&client_secret=test-secret');
  });

  it('serves the cached token until it expires', async () => {
    const fetchMock = queueFetch(jsonResponse({ access_token: 'tok-1', expires_in: 3600 }));
    const manager = new TokenManager(credentials, { clock, fetch: fetchMock });

    expect(await manager.getToken()).toBe('tok-1');
    now = 2000;
    expect(await manager.getToken()).toBe('tok-1');

    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('stores the expiry as fetch time plus lifetime minus the safety margin', async () => {
    const fetchMock = queueFetch(jsonResponse({ access_token: 'tok-1', expires_in: 3600 }));
    const manager = new TokenManager(credentials, { clock, fetch: fetchMock });

    await manager.getToken();

    expect(manager.cache.expiresAt).toBe(1000 + 3600 - 60);
  });

  it('defaults the lifetime to one hour and accepts numeric strings', async () => {
    const fetchMock = queueFetch(
      jsonResponse({ access_token: 'tok-1' }),
      jsonResponse({ access_token: 'tok-2', expires_in: '300' })
    );
    const manager = new TokenManager(credentials, { clock, fetch: fetchMock });

    await manager.getToken();
    expect(manager.cache.expiresAt).toBe(4540);

    now = 4540;
    expect(await manager.getToken()).toBe('tok-2');
    expect(manager.cache.expiresAt).toBe(4540 + 300 - 60);
  });

  it('fetches exactly one new token once the cached one has expired', async () => {
    const fetchMock = queueFetch(
      jsonResponse({ access_token: 'tok-1', expires_in: 120 }),
      jsonResponse({ access_token: 'tok-2', expires_in: 120 })
    );
    const manager = new TokenManager(credentials, { clock, fetch: fetchMock });

    expect(await manager.getToken()).toBe('tok-1');
    now = 1059;
    expect(await manager.getToken()).toBe('tok-1');
    now = 1060;
    expect(await manager.getToken()).toBe('tok-2');
    expect(await manager.getToken()).toBe('tok-2');

    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('shares one exchange between concurrent cache misses', async () => {
    const fetchMock = queueFetch(jsonResponse({ access_token: 'tok-1', expires_in: 3600 }));
    const manager = new TokenManager(credentials, { clock, fetch: fetchMock });

    const tokens = await Promise.all([manager.getToken(), manager.getToken(), manager.getToken()]);

    expect(tokens).toEqual(['tok-1', 'tok-1', 'tok-1']);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('leaves the cache empty when the response has no access token', async () => {
    const cache = new TokenCache();
    cache.store('stale-token', 900);
    const fetchMock = queueFetch(jsonResponse({ token_type: 'Bearer', expires_in: 3600 }));
    const manager = new TokenManager(credentials, { cache, clock, fetch: fetchMock });

    await expect(manager.getToken()).rejects.toThrow(
      new AuthenticationError('Failed to retrieve access token from response')
    );
    expect(cache.token).toBeNull();
    expect(cache.expiresAt).toBe(0);
  });

  it('clears the cache and chains the cause when the endpoint rejects the credentials', async () => {
    const cache = new TokenCache();
    cache.store('stale-token', 900);
    const fetchMock = queueFetch(new Response('invalid_client', { status: 401 }));
    const manager = new TokenManager(credentials, { cache, clock, fetch: fetchMock });

    const error = await rejection(manager.getToken(), AuthenticationError);

    expect(error.kind).toBe('authentication');
    expect(error.message).toBe('Failed to fetch access token: Token endpoint responded 401 invalid_client');
    expect(error.cause).toBeInstanceOf(Error);
    expect(cache.token).toBeNull();
    expect(cache.expiresAt).toBe(0);
  });

  it('reports transport failures with their underlying cause', async () => {
    const transportError = new TypeError('fetch failed', {
      cause: new Error('connect ECONNREFUSED 127.0.0.1:443'),
    });
    const manager = new TokenManager(credentials, { clock, fetch: queueFetch(transportError) });

    const error = await rejection(manager.getToken(), AuthenticationError);

    expect(error.message).toBe('Failed to fetch access token: fetch failed: connect ECONNREFUSED 127.0.0.1:443');
    expect(error.cause).toBe(transportError);
  });

  it('treats a malformed body as an authentication failure', async () => {
    const fetchMock = queueFetch(new Response('<html>maintenance</html>', { status: 200 }));
    const manager = new TokenManager(credentials, { clock, fetch: fetchMock });

    await expect(manager.getToken()).rejects.toThrow(/^Failed to fetch access token: Token response is not valid JSON/);
    expect(manager.cache.token).toBeNull();
  });

  it('fetches again on the next call after a failure', async () => {
    const fetchMock = queueFetch(
      new Response('temporarily unavailable', { status: 503 }),
      jsonResponse({ access_token: 'tok-2', expires_in: 3600 })
    );
    const manager = new TokenManager(credentials, { clock, fetch: fetchMock });

    await expect(manager.getToken()).rejects.toBeInstanceOf(AuthenticationError);
    expect(await manager.getToken()).toBe('tok-2');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});
