import { assertNever } from '../util/assert-never.js';
import { log } from '../util/logger.js';
import { Channel, type ChannelOptions, type PendingRequestHandle } from './channel.js';
import { BridgeError } from './errors.js';
import { EventHub } from './events.js';
import { type BackendEvent, parseDataArray, splitEventBodies } from './streamEvents.js';

export type ClientOptions = ChannelOptions;

/**
 * Owns one channel per `connect()` call and turns its data arrays into stream events.
 */
export class Client {
  public readonly onConnect = new EventHub('Client.onConnect');
  public readonly onReconnect = new EventHub('Client.onReconnect');
  public readonly onDisconnect = new EventHub('Client.onDisconnect');
  public readonly onStreamEvent = new EventHub<[BackendEvent]>('Client.onStreamEvent');

  private readonly logger = log.child({ component: 'client' });
  private channel: Channel | undefined;
  private controller: AbortController | undefined;

  public constructor(private readonly options: ClientOptions) {}

  public get isConnected(): boolean {
    return this.channel?.isConnected ?? false;
  }

  /**
   * Listens until retries are exhausted or `disconnect()` is called.
   *
   * @throws LifetimeExpiredError when the channel outlived `maxAgeMs`.
   */
  public async connect(maxAgeMs: number): Promise<void> {
    if (this.controller) throw new BridgeError('Client is already connected');

    const channel = new Channel(this.options);
    channel.onConnect.addObserver(() => this.onConnect.fire());
    channel.onReconnect.addObserver(() => this.onReconnect.fire());
    channel.onDisconnect.addObserver(() => this.onDisconnect.fire());
    channel.onReceiveArray.addObserver((array) => this.receiveArray(array));

    const controller = new AbortController();
    this.channel = channel;
    this.controller = controller;
    try {
      await channel.listen(maxAgeMs, controller.signal);
    } finally {
      if (this.controller === controller) this.controller = undefined;
    }
    this.logger.info('connect.returned', { cancelled: controller.signal.aborted });
  }

  /** Cancels the active `connect()`, which then resolves. */
  public disconnect(): void {
    if (!this.controller) return;
    this.logger.info('disconnect.requested');
    this.controller.abort();
  }

  public enqueueOutbound(payload: unknown): PendingRequestHandle {
    if (!this.channel) throw new BridgeError('Client has never connected');
    return this.channel.enqueueOutbound(payload);
  }

  public async sendStreamEvent(payload: unknown): Promise<void> {
    await this.enqueueOutbound(payload).done;
  }

  private async receiveArray(array: unknown): Promise<void> {
    const parsed = parseDataArray(array);
    switch (parsed.kind) {
      case 'noop':
        return;
      case 'invalid':
        this.logger.warn('stream_event.invalid', { error: parsed.error });
        return;
      case 'event':
        for (const event of splitEventBodies(parsed.event)) {
          this.logger.debug('stream_event.dispatch', { groupId: event.groupId, type: event.type });
          await this.onStreamEvent.fire(event);
        }
        return;
      default:
        assertNever(parsed);
    }
  }
}
