// src/relay_hub.ts

import { Address } from "./address";

/**
 * One broadcast unit: an encoded envelope line plus the address it came
 * from. Links compare `origin` against their own peer so a message is never
 * written back down the link it arrived on.
 */
export interface RelayItem {
  /** Encoded envelope, trailing newline included. */
  line: string;
  /** Local address for self-generated items, else the delivering peer. */
  origin: Address;
}

export interface RelayHubOptions {
  /** Items each subscriber may have queued before the oldest is dropped. Default: 16 */
  capacity: number;
}

export const DEFAULT_RELAY_CAPACITY = 16;

/**
 * A subscriber's view of the hub.
 */
export interface Subscription extends AsyncIterable<RelayItem> {
  /**
   * Resolves with the next item, or null once the subscription or hub is closed.
   */
  next(): Promise<RelayItem | null>;

  /** Number of items dropped because this subscriber fell behind. */
  readonly lagged: number;

  unsubscribe(): void;
}

class HubSubscription implements Subscription {
  private readonly queue: RelayItem[] = [];
  private waiter?: (item: RelayItem | null) => void;
  private closed = false;
  private droppedCount = 0;

  constructor(
    private readonly capacity: number,
    private readonly onUnsubscribe: (sub: HubSubscription) => void,
  ) {}

  get lagged(): number {
    return this.droppedCount;
  }

  deliver(item: RelayItem): void {
    if (this.closed) return;

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = undefined;
      resolve(item);
      return;
    }

    if (this.queue.length >= this.capacity) {
      this.queue.shift();
      this.droppedCount++;
    }
    this.queue.push(item);
  }

  next(): Promise<RelayItem | null> {
    const item = this.queue.shift();
    if (item) return Promise.resolve(item);
    if (this.closed) return Promise.resolve(null);

    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  unsubscribe(): void {
    if (this.closed) return;
    this.closed = true;
    this.queue.length = 0;
    this.onUnsubscribe(this);
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = undefined;
      resolve(null);
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<RelayItem> {
    for (;;) {
      const item = await this.next();
      if (item === null) return;
      yield item;
    }
  }
}

/**
 * Process-wide fan-out channel. Every subscriber gets every item published
 * after it subscribed, in publish order. Publishing is synchronous and never
 * waits on subscribers: a subscriber that falls more than `capacity` items
 * behind loses the oldest ones (best-effort broadcast, no replay).
 */
export class RelayHub {
  private readonly subscribers = new Set<HubSubscription>();
  private readonly capacity: number;
  private closed = false;

  constructor(options: Partial<RelayHubOptions> = {}) {
    this.capacity = options.capacity ?? DEFAULT_RELAY_CAPACITY;
    if (!Number.isInteger(this.capacity) || this.capacity < 1) {
      throw new RangeError(`Relay capacity must be a positive integer`);
    }
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  /**
   * Total items dropped across current subscribers.
   */
  get lagged(): number {
    let total = 0;
    for (const sub of this.subscribers) total += sub.lagged;
    return total;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * @returns the number of subscribers the item was handed to
   */
  publish(item: RelayItem): number {
    if (this.closed) return 0;
    for (const sub of this.subscribers) {
      sub.deliver(item);
    }
    return this.subscribers.size;
  }

  subscribe(): Subscription {
    const sub = new HubSubscription(this.capacity, (s) =>
      this.subscribers.delete(s),
    );
    if (this.closed) {
      sub.unsubscribe();
    } else {
      this.subscribers.add(sub);
    }
    return sub;
  }

  /**
   * Ends every subscription; later publishes go nowhere.
   */
  close(): void {
    this.closed = true;
    for (const sub of Array.from(this.subscribers)) {
      sub.unsubscribe();
    }
  }
}
