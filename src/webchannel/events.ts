import { errorFields, log } from '../util/logger.js';

export type Observer<TArgs extends unknown[]> = (...args: TArgs) => void | Promise<void>;

const logger = log.child({ component: 'events' });

/**
 * Typed observer list. `fire` awaits each observer in registration order; an observer that
 * throws is logged and the rest still run.
 */
export class EventHub<TArgs extends unknown[] = []> {
  private readonly observers: Observer<TArgs>[] = [];

  public constructor(public readonly name: string) {}

  public get size(): number {
    return this.observers.length;
  }

  /** Returns an unsubscribe function. */
  public addObserver(observer: Observer<TArgs>): () => void {
    this.observers.push(observer);
    return () => {
      this.removeObserver(observer);
    };
  }

  public removeObserver(observer: Observer<TArgs>): boolean {
    const idx = this.observers.indexOf(observer);
    if (idx < 0) return false;
    this.observers.splice(idx, 1);
    return true;
  }

  public async fire(...args: TArgs): Promise<void> {
    for (const observer of [...this.observers]) {
      try {
        await observer(...args);
      } catch (err) {
        logger.error('observer.failed', { event: this.name, ...errorFields(err) });
      }
    }
  }
}
