export class BridgeError extends Error {
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BridgeError';
  }
}

/** Transient I/O failure; the same session may still be usable. */
export class NetworkError extends BridgeError {
  public readonly status: number | undefined;

  public constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'NetworkError';
    this.status = options?.status;
  }
}

/** No response headers arrived in time. */
export class RequestTimeoutError extends NetworkError {
  public constructor(timeoutMs: number, options?: { cause?: unknown }) {
    super(`Request timed out after ${timeoutMs} ms`, options);
    this.name = 'RequestTimeoutError';
  }
}

/** The server no longer knows the session id; a fresh registration is required. */
export class SessionInvalidError extends BridgeError {
  public constructor(message = 'SID became invalid') {
    super(message);
    this.name = 'SessionInvalidError';
  }
}

/** The listen cycle outlived its maximum age; the caller restarts from scratch. */
export class LifetimeExpiredError extends BridgeError {
  public constructor(maxAgeMs: number) {
    super(`Channel lifetime of ${maxAgeMs}ms expired`);
    this.name = 'LifetimeExpiredError';
  }
}

export class ProtocolDecodeError extends BridgeError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProtocolDecodeError';
  }
}

export class RegistrationFailedError extends BridgeError {
  public constructor(message: string) {
    super(message);
    this.name = 'RegistrationFailedError';
  }
}

export class UntrustedHostError extends BridgeError {
  public readonly host: string;

  public constructor(host: string, trustedSuffix: string) {
    super(`Refusing to send credentials to "${host}" (expected a host ending in ${trustedSuffix})`);
    this.name = 'UntrustedHostError';
    this.host = host;
  }
}

export class UnexpectedStatusError extends BridgeError {
  public readonly status: number;
  public readonly reason: string;
  public readonly errorCode: string | null;
  public readonly errorDescription: string | null;
  public readonly body: unknown;

  public constructor(request: string, status: number, reason: string, body: unknown) {
    let parsed: unknown = body;
    if (typeof body === 'string') {
      try {
        parsed = JSON.parse(body) as unknown;
      } catch (_err) {
        parsed = body;
      }
    }
    let errorCode: string | null = null;
    let errorDescription: string | null = null;
    let message = `${request} failed with HTTP ${status} ${reason}`.trimEnd();
    if (parsed && typeof parsed === 'object' && 'error' in parsed) {
      errorCode = String(parsed.error ?? '');
      errorDescription =
        'error_description' in parsed ? String(parsed.error_description ?? '') : '';
      message += `: ${errorCode}: ${errorDescription}`;
    }
    super(message);
    this.name = 'UnexpectedStatusError';
    this.status = status;
    this.reason = reason;
    this.errorCode = errorCode;
    this.errorDescription = errorDescription;
    this.body = parsed;
  }
}

export const isAbortError = (err: unknown): boolean =>
  err instanceof Error && err.name === 'AbortError';
