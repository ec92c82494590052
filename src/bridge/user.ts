import { asUserId, type ConversationId, type UserId } from '../types/ids.js';
import { errorFields, type Logger, log } from '../util/logger.js';
import type { Client } from '../webchannel/client.js';
import { BridgeError, isAbortError, LifetimeExpiredError } from '../webchannel/errors.js';
import { abortableSleep, type Sleep } from '../webchannel/reliability.js';
import {
  type BackendEvent,
  formatConversationId,
  parseConversationId,
} from '../webchannel/streamEvents.js';
import type { BridgeState, StatusNotifier } from './ports.js';
import type { PortalRegistry } from './registry.js';

/** The parts of {@link Client} a bridge user drives. */
export type BridgeClient = Pick<
  Client,
  'onConnect' | 'onReconnect' | 'onDisconnect' | 'onStreamEvent' | 'connect' | 'disconnect'
>;

export interface BridgeUserOptions {
  userId: string;
  client: BridgeClient;
  registry: PortalRegistry;
  notifier: StatusNotifier;
  maxAgeMs: number;
  restartDelayMs: number;
  disableBridgeNotices: boolean;
  unimportantBridgeNotices: boolean;
  sleep?: Sleep | undefined;
}

interface NoticeOptions {
  important?: boolean;
  state?: BridgeState;
  error?: string;
}

export const DISCONNECTED_ERROR = 'googlechat-disconnected';

/**
 * Supervises one user's backend connection: restarts it when its lifetime runs out, reports
 * connection changes to the user, and routes stream events to the conversation's portal.
 */
export class BridgeUser {
  public readonly userId: UserId;
  private readonly logger: Logger;
  private connectedFlag = false;
  private intentionalStop = false;
  private stopController: AbortController | undefined;
  private loop: Promise<void> | undefined;

  public constructor(private readonly options: BridgeUserOptions) {
    this.userId = asUserId(options.userId);
    this.logger = log.child({ component: 'bridge_user', userId: options.userId });
    const { client } = options;
    client.onConnect.addObserver(() => this.onConnect());
    client.onReconnect.addObserver(() => this.onReconnect());
    client.onDisconnect.addObserver(() => this.onDisconnect());
    client.onStreamEvent.addObserver((event) => this.routeEvent(event));
  }

  public get connected(): boolean {
    return this.connectedFlag;
  }

  public get running(): boolean {
    return this.loop !== undefined;
  }

  /** Runs the connection until it is stopped or fails; resolves when it is over. */
  public async start(): Promise<void> {
    if (this.loop) throw new BridgeError(`User ${this.userId} is already running`);
    const loop = this.run().finally(() => {
      if (this.loop === loop) this.loop = undefined;
    });
    this.loop = loop;
    await loop;
  }

  public async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;
    this.intentionalStop = true;
    this.stopController?.abort();
    this.options.client.disconnect();
    await loop;
  }

  /** Restarts the connection, for use after retries were exhausted. */
  public async reconnect(): Promise<void> {
    await this.stop();
    await this.start();
  }

  private async run(): Promise<void> {
    this.intentionalStop = false;
    const controller = new AbortController();
    this.stopController = controller;
    const sleep = this.options.sleep ?? abortableSleep;

    for (;;) {
      try {
        await this.options.client.connect(this.options.maxAgeMs);
      } catch (err) {
        this.connectedFlag = false;
        if (err instanceof LifetimeExpiredError && !this.intentionalStop) {
          const { restartDelayMs } = this.options;
          this.logger.info('connect.lifetime_expired', { restartDelayMs });
          try {
            await sleep(restartDelayMs, controller.signal);
          } catch (sleepErr) {
            if (isAbortError(sleepErr)) return;
            throw sleepErr;
          }
          continue;
        }
        if (this.intentionalStop) return;
        this.logger.error('connect.failed', errorFields(err));
        const reason = err instanceof Error ? err.message : String(err);
        const text = `Exception in Google Chat connection: ${reason}`;
        await this.sendBridgeNotice(text, { important: true, state: 'UNKNOWN_ERROR', error: text });
        return;
      }

      this.connectedFlag = false;
      if (this.intentionalStop) {
        this.logger.info('connect.finished');
        return;
      }
      this.logger.warn('connect.finished_unexpectedly');
      const text = 'Client connection finished unexpectedly';
      await this.sendBridgeNotice(text, { important: true, state: 'UNKNOWN_ERROR', error: text });
      return;
    }
  }

  private async onConnect(): Promise<void> {
    this.connectedFlag = true;
    await this.sendBridgeNotice('Connected to Google Chat', { state: 'CONNECTED' });
  }

  private async onReconnect(): Promise<void> {
    this.connectedFlag = true;
    await this.sendBridgeNotice('Reconnected to Google Chat', { state: 'CONNECTED' });
  }

  private async onDisconnect(): Promise<void> {
    this.connectedFlag = false;
    await this.sendBridgeNotice('Disconnected from Google Chat', {
      state: 'TRANSIENT_DISCONNECT',
      error: DISCONNECTED_ERROR,
    });
  }

  private async routeEvent(event: BackendEvent): Promise<void> {
    let conversationId: ConversationId;
    try {
      conversationId = formatConversationId(parseConversationId(event.groupId));
    } catch (err) {
      this.logger.warn('stream_event.bad_group', { groupId: event.groupId, ...errorFields(err) });
      return;
    }
    const portal = await this.options.registry.getByConversation(conversationId, this.userId);
    portal.enqueue({ userId: this.userId }, event);
  }

  private async sendBridgeNotice(text: string, options: NoticeOptions): Promise<void> {
    const { notifier } = this.options;
    if (options.state) {
      try {
        await notifier.setState(options.state, options.error);
      } catch (err) {
        this.logger.warn('state.failed', { state: options.state, ...errorFields(err) });
      }
    }
    if (this.options.disableBridgeNotices) return;
    const important = options.important ?? false;
    if (!important && !this.options.unimportantBridgeNotices) return;
    try {
      await notifier.sendNotice(text, { important });
    } catch (err) {
      this.logger.warn('notice.failed', { text, ...errorFields(err) });
    }
  }
}
