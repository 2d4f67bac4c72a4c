// src/dedup_filter.ts

import { EventEmitter } from "events";
import { Address } from "./address";
import { Logger, createLogger } from "./logger";
import { RelayHub, RelayItem, Subscription } from "./relay_hub";
import { RECENCY_WINDOW_SECONDS, SeenCache } from "./seen_cache";
import { Clock, systemClock } from "./time";
import { Message, tryDecode } from "./wire";

export interface DedupFilterOptions {
  /** Oldest accepted message age in seconds. Default: 10 */
  recencyWindowSeconds?: number;
  clock?: Clock;
}

/** Why an item was not surfaced. */
export type DropReason = "self" | "stale" | "duplicate";

/**
 * Turns the hub's traffic into the feed of messages other nodes originated,
 * each shown once.
 *
 * Events:
 * - 'message' (message: Message): a fresh message from another node
 * - 'dropped' (message: Message, reason: DropReason)
 */
export class DedupFilter extends EventEmitter {
  private readonly seen: SeenCache;
  private readonly log: Logger;
  private subscription?: Subscription;
  private surfacedCount = 0;

  constructor(
    private readonly self: Address,
    private readonly hub: RelayHub,
    options: DedupFilterOptions = {},
  ) {
    super();
    this.seen = new SeenCache(
      options.recencyWindowSeconds ?? RECENCY_WINDOW_SECONDS,
      options.clock ?? systemClock,
    );
    this.log = createLogger("DedupFilter", self);
  }

  get surfaced(): number {
    return this.surfacedCount;
  }

  get cacheSize(): number {
    return this.seen.size;
  }

  /**
   * Subscribes to the hub. Items published before this call are not seen.
   */
  start(): void {
    if (this.subscription) return;
    const subscription = this.hub.subscribe();
    this.subscription = subscription;
    void this.consume(subscription);
  }

  stop(): void {
    this.subscription?.unsubscribe();
  }

  /**
   * Applies the filter to one relay item.
   * @returns the message if it was surfaced
   */
  process(item: RelayItem): Message | null {
    const envelope = tryDecode(item.line);
    if (!envelope || envelope.type !== "Message") return null;

    const message = envelope.data;
    const reason = this.check(message);
    if (reason) {
      this.log.debug("Dropped message", {
        content: message.content,
        from: message.from,
        reason,
      });
      this.emit("dropped", message, reason);
      return null;
    }

    this.surfacedCount++;
    this.log.info(
      `Received message [${message.content}] from "${message.from}"`,
    );
    this.emit("message", message);
    return message;
  }

  private check(message: Message): DropReason | null {
    if (message.from === this.self) return "self";
    const verdict = this.seen.observe(message);
    return verdict === "new" ? null : verdict;
  }

  private async consume(subscription: Subscription): Promise<void> {
    for await (const item of subscription) {
      try {
        this.process(item);
      } catch (err) {
        this.log.error(
          "Failed to process relay item",
          err instanceof Error ? err : new Error(String(err)),
        );
      }
    }
  }
}
