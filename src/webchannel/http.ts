import { hostMatchesSuffix } from '../config/config-env.js';
import { DEFAULT_USER_AGENT } from '../config/defaults.js';
import { log } from '../util/logger.js';
import type { CredentialProvider } from './auth.js';
import { CookieJar } from './cookies.js';
import { NetworkError, RequestTimeoutError, UntrustedHostError } from './errors.js';

export type QueryParams = Record<string, string | number | boolean | null | undefined>;

export interface RequestOptions {
  params?: QueryParams | undefined;
  headers?: Record<string, string> | undefined;
  body?: string | URLSearchParams | undefined;
  signal?: AbortSignal | undefined;
}

export interface HttpSessionOptions {
  credentials: CredentialProvider;
  trustedDomainSuffix: string;
  userAgent?: string | undefined;
  /** Longest wait for response headers; the body is read under the caller's signal. */
  requestTimeoutMs?: number | undefined;
  fetchImpl?: typeof fetch | undefined;
}

export const buildUrl = (url: string | URL, params?: QueryParams): URL => {
  const out = new URL(url);
  for (const [key, value] of Object.entries(params ?? {})) {
    if (value === undefined || value === null) continue;
    out.searchParams.set(key, String(value));
  }
  return out;
};

/**
 * Authenticated HTTP access to the backend. Credentials and cookies only ever go to hosts under
 * `trustedDomainSuffix`; the check runs before the token is requested.
 */
export class HttpSession {
  public readonly cookies = new CookieJar();
  private readonly logger = log.child({ component: 'http' });
  private readonly credentials: CredentialProvider;
  private readonly trustedDomainSuffix: string;
  private readonly userAgent: string;
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  public constructor(options: HttpSessionOptions) {
    this.credentials = options.credentials;
    this.trustedDomainSuffix = options.trustedDomainSuffix;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.requestTimeoutMs = Math.max(1, options.requestTimeoutMs ?? 30_000);
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * Issues one request and returns the response with its body unread. The request is aborted
   * when no headers arrive within `requestTimeoutMs`.
   *
   * @throws UntrustedHostError before any credential is touched, for hosts outside the suffix.
   * @throws NetworkError when no response arrives (unless `opts.signal` aborted the request).
   */
  public async fetchRaw(
    method: string,
    url: string | URL,
    opts: RequestOptions = {},
  ): Promise<Response> {
    const target = buildUrl(url, opts.params);
    if (!hostMatchesSuffix(target.hostname, this.trustedDomainSuffix)) {
      throw new UntrustedHostError(target.hostname, this.trustedDomainSuffix);
    }

    const token = await this.credentials.getBearerToken();
    const headers = new Headers(opts.headers);
    headers.set('Authorization', `Bearer ${token}`);
    headers.set('Connection', 'Keep-Alive');
    if (!headers.has('User-Agent')) headers.set('User-Agent', this.userAgent);
    const cookie = this.cookies.header();
    if (cookie) headers.set('Cookie', cookie);

    const timeout = new AbortController();
    const timer = setTimeout(() => timeout.abort(), this.requestTimeoutMs);
    const signal = opts.signal ? AbortSignal.any([opts.signal, timeout.signal]) : timeout.signal;

    let res: Response;
    try {
      res = await this.fetchImpl(target, {
        method,
        headers,
        ...(opts.body !== undefined ? { body: opts.body } : {}),
        signal,
      });
    } catch (err) {
      if (opts.signal?.aborted) throw err;
      if (timeout.signal.aborted) {
        this.logger.info('request.timeout', {
          method,
          path: target.pathname,
          timeoutMs: this.requestTimeoutMs,
        });
        throw new RequestTimeoutError(this.requestTimeoutMs, { cause: err });
      }
      const msg = err instanceof Error ? err.message : String(err);
      throw new NetworkError(`Request connection error: ${msg}`, { cause: err });
    } finally {
      clearTimeout(timer);
    }
    this.cookies.storeResponseCookies(res.headers);
    return res;
  }
}
