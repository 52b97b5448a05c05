export interface FetchedToken {
  accessToken: string;
  expiresInSeconds: number;
}

export interface TokenCacheOptions {
  /** Refresh this many seconds before the token actually expires (default 60). */
  marginSeconds?: number;
  now?: () => number;
}

/**
 * Process-wide access token holder. Concurrent callers that find the token
 * stale share a single in-flight refresh.
 */
export class TokenCache {
  private token: string | null = null;
  private expiresAt = 0;
  private inFlight: Promise<string> | null = null;
  private readonly marginSeconds: number;
  private readonly now: () => number;

  constructor(options: TokenCacheOptions = {}) {
    this.marginSeconds = options.marginSeconds ?? 60;
    this.now = options.now ?? Date.now;
  }

  peek(): string | null {
    return this.token !== null && this.now() < this.expiresAt ? this.token : null;
  }

  async getOrRefresh(fetchToken: () => Promise<FetchedToken>): Promise<string> {
    const current = this.peek();
    if (current !== null) {
      return current;
    }

    if (!this.inFlight) {
      this.inFlight = this.refresh(fetchToken).finally(() => {
        this.inFlight = null;
      });
    }

    return this.inFlight;
  }

  invalidate(): void {
    this.token = null;
    this.expiresAt = 0;
  }

  private async refresh(fetchToken: () => Promise<FetchedToken>): Promise<string> {
    const fetched = await fetchToken();
    const lifetimeSeconds = Math.max(fetched.expiresInSeconds - this.marginSeconds, 0);
    this.token = fetched.accessToken;
    this.expiresAt = this.now() + lifetimeSeconds * 1000;
    return fetched.accessToken;
  }
}
