export interface CredentialProvider {
  /** Returns a bearer token valid for at least the next request. */
  getBearerToken(): Promise<string>;
}

export interface AccessToken {
  token: string;
  expiresAtMs: number;
}

export interface RefreshingTokenSourceOptions {
  /** Refresh this long before the cached token expires. */
  refreshSkewMs?: number | undefined;
  now?: (() => number) | undefined;
}

/**
 * Caches the token returned by `refresh` until it is within `refreshSkewMs` of expiry.
 * Concurrent callers share one in-flight refresh.
 */
export class RefreshingTokenSource implements CredentialProvider {
  private readonly refreshSkewMs: number;
  private readonly now: () => number;
  private current: AccessToken | undefined;
  private inflight: Promise<AccessToken> | undefined;

  public constructor(
    private readonly refresh: () => Promise<AccessToken>,
    options: RefreshingTokenSourceOptions = {},
  ) {
    this.refreshSkewMs = Math.max(0, options.refreshSkewMs ?? 60_000);
    this.now = options.now ?? Date.now;
  }

  public async getBearerToken(): Promise<string> {
    const cached = this.current;
    if (cached && cached.expiresAtMs - this.refreshSkewMs > this.now()) return cached.token;
    const next = await this.refreshOnce();
    return next.token;
  }

  /** Drops the cached token, e.g. after the server rejected it. */
  public invalidate(): void {
    this.current = undefined;
  }

  private async refreshOnce(): Promise<AccessToken> {
    if (!this.inflight) {
      this.inflight = this.refresh()
        .then((token) => {
          if (!token.token) throw new Error('Token refresh returned an empty token');
          this.current = token;
          return token;
        })
        .finally(() => {
          this.inflight = undefined;
        });
    }
    return await this.inflight;
  }
}

/** A provider for a fixed token, for tests and short-lived tools. */
export const staticCredentials = (token: string): CredentialProvider => ({
  getBearerToken: async () => token,
});
