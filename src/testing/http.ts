export type StreamPart = string | Uint8Array;

export interface StreamingResponseInit {
  status?: number | undefined;
  statusText?: string | undefined;
  headers?: Record<string, string> | Array<[string, string]> | undefined;
  /**
   * What happens after the last part: `close` ends the body, `error` fails the next read with
   * `error`, `hang` keeps the body open until `signal` aborts.
   */
  end?: 'close' | 'error' | 'hang' | undefined;
  error?: Error | undefined;
  signal?: AbortSignal | undefined;
  /** Called right before part `index` is handed to the reader. */
  onRead?: ((index: number) => void) | undefined;
}

const abortReason = (signal: AbortSignal): Error => {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) return reason;
  const err = new Error('This operation was aborted');
  err.name = 'AbortError';
  return err;
};

/** A `Response` whose body is delivered one part per read. */
export const streamingResponse = (
  parts: readonly StreamPart[],
  init: StreamingResponseInit = {},
): Response => {
  const encoder = new TextEncoder();
  const end = init.end ?? 'close';
  let index = 0;

  // highWaterMark 0: nothing is pulled until the consumer reads.
  const body = new ReadableStream<Uint8Array>(
    {
      pull: async (controller) => {
        const part = parts[index];
        if (part !== undefined) {
          init.onRead?.(index);
          index += 1;
          controller.enqueue(typeof part === 'string' ? encoder.encode(part) : part);
          return;
        }
        if (end === 'close') {
          controller.close();
          return;
        }
        if (end === 'error') {
          controller.error(init.error ?? new Error('terminated'));
          return;
        }
        const signal = init.signal;
        if (!signal) return await new Promise<void>(() => {});
        if (signal.aborted) {
          controller.error(abortReason(signal));
          return;
        }
        await new Promise<void>((resolve) => {
          signal.addEventListener(
            'abort',
            () => {
              controller.error(abortReason(signal));
              resolve();
            },
            { once: true },
          );
        });
      },
    },
    { highWaterMark: 0 },
  );

  return new Response(body, {
    status: init.status ?? 200,
    statusText: init.statusText ?? 'OK',
    ...(init.headers ? { headers: init.headers } : {}),
  });
};

/** A response that never arrives; rejects once the request's signal aborts. */
export const hangUntilAborted = (signal: AbortSignal | undefined): Promise<Response> =>
  new Promise<Response>((_resolve, reject) => {
    if (!signal) return;
    if (signal.aborted) {
      reject(abortReason(signal));
      return;
    }
    signal.addEventListener('abort', () => reject(abortReason(signal)), { once: true });
  });

export interface RecordedRequest {
  method: string;
  url: URL;
  headers: Headers;
  body: string | undefined;
  signal: AbortSignal | undefined;
}

export type FetchHandler = (req: RecordedRequest) => Response | Promise<Response>;

export interface ScriptedFetch {
  fetchImpl: typeof fetch;
  calls: RecordedRequest[];
  /** Calls whose method and last path segment match, e.g. `callsTo('POST', 'register')`. */
  callsTo: (method: string, path: string) => RecordedRequest[];
}

const requestUrl = (input: string | URL | Request): URL => {
  if (typeof input === 'string') return new URL(input);
  if (input instanceof URL) return input;
  return new URL(input.url);
};

const requestBody = (body: RequestInit['body']): string | undefined => {
  if (typeof body === 'string') return body;
  if (body instanceof URLSearchParams) return body.toString();
  return undefined;
};

const matches = (req: RecordedRequest, method: string, path: string): boolean =>
  req.method === method && req.url.pathname.endsWith(`/${path}`);

/**
 * A fetch stand-in answering from `routes`, keyed `"<METHOD> <last path segment>"`. A list of
 * handlers is consumed in order; once it runs out the request fails like a refused connection.
 */
export const scriptedFetch = (
  routes: Record<string, FetchHandler | FetchHandler[]>,
): ScriptedFetch => {
  const calls: RecordedRequest[] = [];
  const queues = new Map<string, FetchHandler | FetchHandler[]>(Object.entries(routes));

  const fetchImpl: typeof fetch = async (input, init) => {
    const req: RecordedRequest = {
      method: (init?.method ?? 'GET').toUpperCase(),
      url: requestUrl(input),
      headers: new Headers(init?.headers),
      body: requestBody(init?.body),
      signal: init?.signal ?? undefined,
    };
    calls.push(req);
    if (req.signal?.aborted) throw abortReason(req.signal);

    for (const [key, route] of queues) {
      const [method = '', path = ''] = key.split(' ');
      if (!matches(req, method, path)) continue;
      const handler = Array.isArray(route) ? route.shift() : route;
      if (!handler) break;
      return await handler(req);
    }
    throw new TypeError(`fetch failed: no scripted response for ${req.method} ${req.url.pathname}`);
  };

  return {
    fetchImpl,
    calls,
    callsTo: (method, path) => calls.filter((req) => matches(req, method, path)),
  };
};
