import { errorFields, type Logger, log } from '../util/logger.js';

/**
 * Cooperative gate held while history is being inserted. Holds nest: the gate opens when the last
 * holder finishes.
 */
export class BackfillGate {
  private holders = 0;
  private waiters: (() => void)[] = [];

  public get held(): boolean {
    return this.holders > 0;
  }

  public async runHeld<T>(fn: () => Promise<T>): Promise<T> {
    this.holders += 1;
    try {
      return await fn();
    } finally {
      this.holders -= 1;
      if (this.holders === 0) {
        const waiters = this.waiters;
        this.waiters = [];
        for (const wake of waiters) wake();
      }
    }
  }

  public async waitUntilOpen(): Promise<void> {
    if (this.holders === 0) return;
    await new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }
}

export interface SerialQueueOptions<T> {
  name: string;
  handle: (item: T) => Promise<void>;
  gate?: BackfillGate | undefined;
  logger?: Logger | undefined;
}

/**
 * FIFO queue drained by at most one consumer at a time. `enqueue` never blocks; the consumer is
 * spawned on demand and exits once the queue is empty.
 */
export class SerialQueue<T> {
  private readonly items: T[] = [];
  private consumer: Promise<void> | undefined;
  private readonly logger: Logger;

  public constructor(private readonly options: SerialQueueOptions<T>) {
    this.logger = options.logger ?? log.child({ component: 'dispatch', queue: options.name });
  }

  public get pending(): number {
    return this.items.length;
  }

  public get active(): boolean {
    return this.consumer !== undefined;
  }

  public enqueue(item: T): void {
    this.items.push(item);
    // Spawn and enqueue run in the same synchronous turn, and the consumer clears itself only
    // after observing an empty queue, so no item can be stranded.
    this.consumer ??= this.consume();
  }

  /** Resolves once the current consumer (if any) has drained the queue. */
  public async drained(): Promise<void> {
    while (this.consumer) await this.consumer;
  }

  private async consume(): Promise<void> {
    try {
      await this.options.gate?.waitUntilOpen();
      for (;;) {
        const item = this.items.shift();
        if (item === undefined) return;
        try {
          await this.options.handle(item);
        } catch (err) {
          this.logger.error('dispatch.handler_failed', errorFields(err));
        }
        await this.options.gate?.waitUntilOpen();
      }
    } finally {
      this.consumer = undefined;
    }
  }
}

export interface TypedEvent {
  type: string;
  revision?: number | undefined;
}

export type EventHandler<E> = (event: E) => Promise<void>;

export interface EventDispatcherOptions<E extends TypedEvent> {
  name: string;
  handlers: Readonly<Partial<Record<string, EventHandler<E>>>>;
  /** Called after each handled event that carries a revision. */
  advanceRevision?: ((revision: number, event: E) => Promise<void>) | undefined;
  gate?: BackfillGate | undefined;
  logger?: Logger | undefined;
}

/**
 * Routes events through a {@link SerialQueue} to handlers keyed by event type. Unknown types are
 * logged and skipped.
 */
export class EventDispatcher<E extends TypedEvent> {
  private readonly queue: SerialQueue<E>;
  private readonly logger: Logger;

  public constructor(private readonly options: EventDispatcherOptions<E>) {
    this.logger = options.logger ?? log.child({ component: 'dispatch', queue: options.name });
    this.queue = new SerialQueue<E>({
      name: options.name,
      gate: options.gate,
      logger: this.logger,
      handle: (event) => this.dispatch(event),
    });
  }

  public get pending(): number {
    return this.queue.pending;
  }

  public enqueue(event: E): void {
    this.queue.enqueue(event);
  }

  public async drained(): Promise<void> {
    await this.queue.drained();
  }

  private async dispatch(event: E): Promise<void> {
    const handler = this.options.handlers[event.type];
    if (!handler) {
      this.logger.warn('dispatch.unknown_type', { type: event.type });
      return;
    }
    try {
      await handler(event);
    } finally {
      if (event.revision !== undefined && this.options.advanceRevision) {
        await this.options.advanceRevision(event.revision, event);
      }
    }
  }
}
