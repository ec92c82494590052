import { z } from 'zod';

import { assertNever } from '../util/assert-never.js';
import { errorFields, log } from '../util/logger.js';
import { ChunkParser } from './chunkParser.js';
import {
  BridgeError,
  LifetimeExpiredError,
  ProtocolDecodeError,
  RequestTimeoutError,
  UnexpectedStatusError,
} from './errors.js';
import { EventHub } from './events.js';
import type { HttpSession, QueryParams } from './http.js';
import { registerChannel, type RegistrationResult } from './registrar.js';
import { abortableSleep, channelBackoffMs, type Sleep } from './reliability.js';
import { INITIAL_PING_REQUEST } from './streamEvents.js';

export const PROTOCOL_VERSION = 8;
export const CLIENT_VERSION = 22;
export const UNKNOWN_SID_MARKER = 'Unknown SID';
export const INITIAL_RESPONSE_HEADER = 'X-HTTP-Initial-Response';
// The server heartbeats every 15-30s; two missed heartbeats mean the connection is gone.
export const DEFAULT_PUSH_TIMEOUT_MS = 60_000;
export const DEFAULT_MAX_READ_BYTES = 1024 * 1024;

/** Result of one long-poll request, switched on by the retry loop. */
export type LongPollOutcome =
  | { kind: 'clean' }
  | { kind: 'session_invalid'; reason: string }
  | { kind: 'network_error'; message: string; status?: number | undefined }
  | { kind: 'protocol_error'; message: string };

/** Why a long-poll request ended; `clean exit` is the server closing a healthy poll. */
export type LongPollEndReason =
  | 'sid invalid'
  | `http ${number}`
  | 'timeout'
  | 'sid expiry'
  | 'connection error'
  | 'protocol error'
  | 'clean exit';

export interface ChannelStats {
  longPollStarts: number;
  longPollEnds: Partial<Record<LongPollEndReason, number>>;
  receivedChunkBytes: number;
}

export type ChannelPhase = 'idle' | 'registering' | 'polling' | 'backoff' | 'stopped';

export interface ChannelState {
  phase: ChannelPhase;
  sid: string | null;
  csessionid: string | null;
  lastAckId: number;
  sendOffset: number;
  requestId: number;
  connected: boolean;
}

export interface PendingRequestHandle {
  requestId: number;
  offset: number;
  /** Settles when the server answered; rejects on transport failure or a non-200 status. */
  done: Promise<void>;
}

export interface ChannelOptions {
  http: HttpSession;
  channelUrl: string;
  maxRetries: number;
  retryBackoffBase: number;
  pushTimeoutMs?: number | undefined;
  maxReadBytes?: number | undefined;
  sleep?: Sleep | undefined;
  /** Monotonic clock in ms. */
  now?: (() => number) | undefined;
}

type ReadChunk = { done: true } | { done: false; value: Uint8Array };

class ReadTimeoutError extends Error {
  public constructor() {
    super('Request timed out');
    this.name = 'ReadTimeoutError';
  }
}

// [[0, ["c", "<sid>", "", 8, 12]]]
const SidAnnouncementSchema = z
  .array(
    z
      .tuple([z.unknown(), z.tuple([z.string(), z.string().min(1)]).rest(z.unknown())])
      .rest(z.unknown()),
  )
  .min(1);

const ContainerSchema = z.array(z.tuple([z.number().int().nonnegative(), z.unknown()]));

export const parseSidAnnouncement = (raw: string): string => {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ProtocolDecodeError('Malformed initial response', { cause: err });
  }
  const res = SidAnnouncementSchema.safeParse(json);
  const sid = res.success ? res.data[0]?.[1][1] : undefined;
  if (!sid) throw new ProtocolDecodeError('Initial response does not announce a SID');
  return sid;
};

const parseContainer = (chunk: string): Array<[number, unknown]> => {
  let json: unknown;
  try {
    json = JSON.parse(chunk);
  } catch (err) {
    throw new ProtocolDecodeError('Chunk is not valid JSON', { cause: err });
  }
  const res = ContainerSchema.safeParse(json);
  if (!res.success) throw new ProtocolDecodeError(`Unexpected chunk shape: ${res.error.message}`);
  return res.data;
};

const messageOf = (err: unknown): string => (err instanceof Error ? err.message : String(err));

/**
 * BrowserChannel client: a backward channel read through repeated long-poll requests and a
 * forward channel of form-encoded POSTs.
 */
export class Channel {
  public readonly onConnect = new EventHub('Channel.onConnect');
  public readonly onReconnect = new EventHub('Channel.onReconnect');
  public readonly onDisconnect = new EventHub('Channel.onDisconnect');
  public readonly onReceiveArray = new EventHub<[unknown]>('Channel.onReceiveArray');

  private readonly logger = log.child({ component: 'channel' });
  private readonly http: HttpSession;
  private readonly channelUrl: string;
  private readonly maxRetries: number;
  private readonly retryBackoffBase: number;
  private readonly pushTimeoutMs: number;
  private readonly maxReadBytes: number;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private readonly parser = new ChunkParser();

  private phase: ChannelPhase = 'idle';
  private sid: string | null = null;
  private csessionid: string | null = null;
  private aid = 0;
  private ofs = 0;
  private rid = 0;
  private connected = false;
  private connectFired = false;
  private longPollStarts = 0;
  private longPollEnds: Partial<Record<LongPollEndReason, number>> = {};
  private receivedChunkBytes = 0;

  public constructor(options: ChannelOptions) {
    this.http = options.http;
    this.channelUrl = options.channelUrl;
    this.maxRetries = Math.max(0, Math.floor(options.maxRetries));
    this.retryBackoffBase = options.retryBackoffBase;
    this.pushTimeoutMs = Math.max(1, options.pushTimeoutMs ?? DEFAULT_PUSH_TIMEOUT_MS);
    this.maxReadBytes = Math.max(1, options.maxReadBytes ?? DEFAULT_MAX_READ_BYTES);
    this.sleep = options.sleep ?? abortableSleep;
    this.now = options.now ?? (() => performance.now());
  }

  public get isConnected(): boolean {
    return this.connected;
  }

  public get state(): ChannelState {
    return {
      phase: this.phase,
      sid: this.sid,
      csessionid: this.csessionid,
      lastAckId: this.aid,
      sendOffset: this.ofs,
      requestId: this.rid,
      connected: this.connected,
    };
  }

  /** Counters since construction; a copy, so callers can diff snapshots. */
  public get stats(): ChannelStats {
    return {
      longPollStarts: this.longPollStarts,
      longPollEnds: { ...this.longPollEnds },
      receivedChunkBytes: this.receivedChunkBytes,
    };
  }

  /**
   * Registers and keeps long-polling until retries run out (resolves) or `signal` aborts
   * (resolves without further attempts).
   *
   * @throws LifetimeExpiredError once the loop has run longer than `maxAgeMs`; the caller
   * restarts from a fresh registration.
   */
  public async listen(maxAgeMs: number, signal?: AbortSignal): Promise<void> {
    let retries = 0;
    let skipBackoff = false;
    let needsRegistration = true;
    const start = this.now();

    try {
      while (retries <= this.maxRetries) {
        signal?.throwIfAborted();
        if (this.now() - start > maxAgeMs) throw new LifetimeExpiredError(maxAgeMs);

        if (retries > 0 && !skipBackoff) {
          const delayMs = channelBackoffMs(retries, this.retryBackoffBase);
          this.phase = 'backoff';
          this.logger.info('backoff', { retries, delayMs });
          await this.sleep(delayMs, signal);
        }
        skipBackoff = false;

        if (needsRegistration) {
          const registration = await this.register(signal);
          if (registration.kind !== 'ok') {
            retries += 1;
            this.logger.warn('register.failed', {
              kind: registration.kind,
              errMsg: registration.message,
              retries,
            });
            await this.markDisconnected();
            continue;
          }
          needsRegistration = false;
        }

        // Partial frames from a failed attempt must not leak into the next one.
        this.parser.reset();
        this.phase = 'polling';
        const outcome = await this.longPollRequest(signal);

        switch (outcome.kind) {
          case 'clean':
            // Server-initiated close (roughly hourly); not a failure.
            retries = 0;
            continue;
          case 'session_invalid':
            this.logger.info('longpoll.session_invalid', { reason: outcome.reason });
            needsRegistration = true;
            skipBackoff = true;
            break;
          case 'network_error':
            this.logger.warn('longpoll.failed', {
              errMsg: outcome.message,
              status: outcome.status,
            });
            break;
          case 'protocol_error':
            this.logger.warn('longpoll.protocol_error', { errMsg: outcome.message });
            break;
          default:
            assertNever(outcome);
        }

        retries += 1;
        this.logger.info('longpoll.retry', { retries });
        await this.markDisconnected();
      }
      this.logger.error('longpoll.retries_exhausted', { maxRetries: this.maxRetries });
    } catch (err) {
      if (signal?.aborted) {
        this.logger.info('listen.cancelled');
        return;
      }
      throw err;
    } finally {
      this.phase = 'stopped';
    }
  }

  /**
   * Posts `payload` on the forward channel. The request id and offset are taken synchronously,
   * so concurrent callers never share an offset. Callers must handle `done`.
   */
  public enqueueOutbound(payload: unknown, signal?: AbortSignal): PendingRequestHandle {
    if (this.sid === null) throw new BridgeError('Channel has no session to send on');

    const requestId = this.rid;
    this.rid += 1;
    const offset = this.ofs;
    this.ofs += 1;

    const params: QueryParams = {
      VER: PROTOCOL_VERSION,
      RID: requestId,
      t: 1,
      SID: this.sid,
      AID: this.aid,
      CI: 0,
      csessionid: this.csessionid,
    };
    const data = Buffer.from(JSON.stringify(payload), 'utf8').toString('base64');
    const form = new URLSearchParams({
      count: '1',
      ofs: String(offset),
      req0___data__: JSON.stringify({ data }),
    });

    return { requestId, offset, done: this.postForward(params, form, signal) };
  }

  public async sendStreamEvent(payload: unknown, signal?: AbortSignal): Promise<void> {
    await this.enqueueOutbound(payload, signal).done;
  }

  private async postForward(
    params: QueryParams,
    form: URLSearchParams,
    signal: AbortSignal | undefined,
  ): Promise<void> {
    const res = await this.http.fetchRaw('POST', new URL('events_encoded', this.channelUrl), {
      params,
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: form,
      signal,
    });
    const text = await res.text();
    if (res.status !== 200) {
      throw new UnexpectedStatusError('POST events_encoded', res.status, res.statusText, text);
    }
  }

  private async register(signal: AbortSignal | undefined): Promise<RegistrationResult> {
    this.phase = 'registering';
    this.sid = null;
    this.aid = 0;
    this.ofs = 0;
    const result = await registerChannel(this.http, this.channelUrl, signal);
    this.csessionid = result.kind === 'ok' ? result.csessionid : null;
    return result;
  }

  private async markDisconnected(): Promise<void> {
    if (!this.connected) return;
    this.connected = false;
    await this.onDisconnect.fire();
  }

  private async longPollRequest(signal: AbortSignal | undefined): Promise<LongPollOutcome> {
    const params: QueryParams = {
      VER: PROTOCOL_VERSION,
      CVER: CLIENT_VERSION,
      AID: this.aid,
      t: 1,
      ...(this.sid === null
        ? { $req: 'count=0', RID: '0', SID: 'null', TYPE: 'init' }
        : { CI: 0, RID: 'rpc', SID: this.sid, TYPE: 'xmlhttp' }),
    };
    this.rid += 1;
    this.longPollStarts += 1;

    // Aborted on every exit so the underlying connection is released.
    const controller = new AbortController();
    const onAbort = (): void => controller.abort(signal?.reason);
    signal?.addEventListener('abort', onAbort, { once: true });
    try {
      return await this.runLongPoll(params, controller.signal, signal);
    } finally {
      signal?.removeEventListener('abort', onAbort);
      controller.abort();
    }
  }

  private async runLongPoll(
    params: QueryParams,
    requestSignal: AbortSignal,
    signal: AbortSignal | undefined,
  ): Promise<LongPollOutcome> {
    this.logger.debug('longpoll.open', { type: params.TYPE });
    let res: Response;
    try {
      res = await this.http.fetchRaw('GET', new URL('events_encoded', this.channelUrl), {
        params,
        signal: requestSignal,
      });
    } catch (err) {
      if (signal?.aborted) throw err;
      this.countEnd(err instanceof RequestTimeoutError ? 'timeout' : 'connection error');
      return { kind: 'network_error', message: messageOf(err) };
    }

    if (res.status !== 200) {
      const text = await res.text().catch(() => '');
      const unknownSid =
        res.statusText === UNKNOWN_SID_MARKER || text.includes(UNKNOWN_SID_MARKER);
      if (res.status === 400 && unknownSid) {
        this.countEnd('sid invalid');
        return { kind: 'session_invalid', reason: 'SID became invalid' };
      }
      this.countEnd(`http ${res.status}`);
      return {
        kind: 'network_error',
        message: `Request returned unexpected status: ${res.status}: ${res.statusText}`,
        status: res.status,
      };
    }

    const initialResponse = res.headers.get(INITIAL_RESPONSE_HEADER);
    if (initialResponse) {
      let sid: string;
      try {
        sid = parseSidAnnouncement(initialResponse);
      } catch (err) {
        this.countEnd('protocol error');
        return { kind: 'protocol_error', message: messageOf(err) };
      }
      if (sid !== this.sid) {
        this.sid = sid;
        this.aid = 0;
        this.ofs = 0;
        this.logger.info('ping.send');
        try {
          await this.sendStreamEvent(INITIAL_PING_REQUEST, signal);
        } catch (err) {
          if (signal?.aborted) throw err;
          this.logger.warn('ping.failed', errorFields(err));
          this.countEnd('connection error');
          return { kind: 'network_error', message: messageOf(err) };
        }
      }
    }

    const body = res.body;
    if (!body) {
      this.countEnd('clean exit');
      return { kind: 'clean' };
    }
    const reader = body.getReader();

    while (true) {
      let read: ReadChunk;
      try {
        read = await this.readWithTimeout(() => reader.read());
      } catch (err) {
        if (signal?.aborted) throw err;
        if (err instanceof ReadTimeoutError) {
          this.countEnd('timeout');
          return { kind: 'network_error', message: err.message };
        }
        // A transfer error mid-body is how the server signals an expiring SID.
        this.logger.debug('longpoll.payload_error', errorFields(err));
        this.countEnd('sid expiry');
        return { kind: 'session_invalid', reason: 'SID is about to expire' };
      }
      if (read.done) {
        this.countEnd('clean exit');
        return { kind: 'clean' };
      }

      for (let pos = 0; pos < read.value.length; pos += this.maxReadBytes) {
        const failure = await this.onPushData(read.value.subarray(pos, pos + this.maxReadBytes));
        if (failure) {
          this.countEnd('protocol error');
          return failure;
        }
      }
    }
  }

  private countEnd(reason: LongPollEndReason): void {
    this.longPollEnds[reason] = (this.longPollEnds[reason] ?? 0) + 1;
  }

  private async readWithTimeout(read: () => Promise<ReadChunk>): Promise<ReadChunk> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => reject(new ReadTimeoutError()), this.pushTimeoutMs);
    });
    try {
      return await Promise.race([read(), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async onPushData(data: Uint8Array): Promise<LongPollOutcome | null> {
    this.logger.debug('push.data', { bytes: data.length });
    this.receivedChunkBytes += data.length;
    try {
      for (const chunk of this.parser.getChunks(data)) {
        // Connected once the first chunk arrives.
        if (!this.connected) {
          this.connected = true;
          if (this.connectFired) {
            await this.onReconnect.fire();
          } else {
            this.connectFired = true;
            await this.onConnect.fire();
          }
        }

        for (const [arrayId, dataArray] of parseContainer(chunk)) {
          await this.onReceiveArray.fire(dataArray);
          this.aid = arrayId;
        }
      }
    } catch (err) {
      if (err instanceof ProtocolDecodeError) {
        return { kind: 'protocol_error', message: err.message };
      }
      throw err;
    }
    return null;
  }
}
