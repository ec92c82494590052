/**
 * Minimal cookie jar for a single backend origin. Attributes (path, expiry, domain) are ignored:
 * every request goes to the same trusted host and the server rotates cookies on registration.
 */
export class CookieJar {
  private readonly cookies = new Map<string, string>();

  public get size(): number {
    return this.cookies.size;
  }

  public get(name: string): string | undefined {
    return this.cookies.get(name);
  }

  public set(name: string, value: string): void {
    this.cookies.set(name, unquote(value));
  }

  public delete(name: string): void {
    this.cookies.delete(name);
  }

  public clear(): void {
    this.cookies.clear();
  }

  /** Stores the `name=value` pair of one `Set-Cookie` line; returns the name, null if malformed. */
  public setFromHeader(line: string): string | null {
    const pair = line.split(';', 1)[0] ?? '';
    const eq = pair.indexOf('=');
    if (eq <= 0) return null;
    const name = pair.slice(0, eq).trim();
    if (!name) return null;
    this.set(name, pair.slice(eq + 1).trim());
    return name;
  }

  public storeResponseCookies(headers: Headers): void {
    for (const line of headers.getSetCookie()) this.setFromHeader(line);
  }

  /** `Cookie` request header value, or undefined when the jar is empty. */
  public header(): string | undefined {
    if (this.cookies.size === 0) return undefined;
    return [...this.cookies].map(([name, value]) => `${name}=${value}`).join('; ');
  }
}

const unquote = (value: string): string =>
  value.length >= 2 && value.startsWith('"') && value.endsWith('"') ? value.slice(1, -1) : value;
