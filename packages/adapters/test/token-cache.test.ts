import { describe, expect, it, vi } from 'vitest';
import { TokenCache, type FetchedToken } from '../src/awdpay/token-cache.js';

describe('TokenCache', () => {
  it('refreshes once for concurrent callers', async () => {
    const cache = new TokenCache();
    let release: (token: FetchedToken) => void = () => undefined;
    const fetchToken = vi.fn(
      () =>
        new Promise<FetchedToken>((resolve) => {
          release = resolve;
        })
    );

    const first = cache.getOrRefresh(fetchToken);
    const second = cache.getOrRefresh(fetchToken);
    release({ accessToken: 'tok-1', expiresInSeconds: 300 });

    await expect(Promise.all([first, second])).resolves.toEqual(['tok-1', 'tok-1']);
    expect(fetchToken).toHaveBeenCalledTimes(1);
  });

  it('refreshes the margin before the token expires', async () => {
    let now = 0;
    const cache = new TokenCache({ marginSeconds: 60, now: () => now });
    let issued = 0;
    const fetchToken = vi.fn(async (): Promise<FetchedToken> => {
      issued += 1;
      return { accessToken: `tok-${issued}`, expiresInSeconds: 300 };
    });

    await expect(cache.getOrRefresh(fetchToken)).resolves.toBe('tok-1');

    now = 239_000;
    await expect(cache.getOrRefresh(fetchToken)).resolves.toBe('tok-1');

    now = 240_000;
    await expect(cache.getOrRefresh(fetchToken)).resolves.toBe('tok-2');
  });

  it('lets a failed refresh be retried by the next caller', async () => {
    const cache = new TokenCache();
    const fetchToken = vi
      .fn<() => Promise<FetchedToken>>()
      .mockRejectedValueOnce(new Error('keycloak down'))
      .mockResolvedValueOnce({ accessToken: 'tok-2', expiresInSeconds: 300 });

    await expect(cache.getOrRefresh(fetchToken)).rejects.toThrow('keycloak down');
    await expect(cache.getOrRefresh(fetchToken)).resolves.toBe('tok-2');
  });
});
