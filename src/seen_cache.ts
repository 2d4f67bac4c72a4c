// src/seen_cache.ts

import { Clock, systemClock, unixSeconds } from "./time";
import { Message } from "./wire";

/** Maximum accepted message age, in seconds. */
export const RECENCY_WINDOW_SECONDS = 10;

/**
 * True while `now <= timestamp + windowSeconds`.
 */
export function isRecent(
  timestamp: number,
  nowSeconds: number,
  windowSeconds: number = RECENCY_WINDOW_SECONDS,
): boolean {
  return nowSeconds <= timestamp + windowSeconds;
}

/**
 * Set of (content, timestamp) pairs seen within the recency window.
 *
 * An entry whose timestamp has left the window can never pass the recency
 * check again, so it is swept instead of kept for the process lifetime.
 */
export class SeenCache {
  // timestamp -> contents seen with that timestamp
  private readonly entries = new Map<number, Set<string>>();
  private count = 0;

  constructor(
    private readonly windowSeconds: number = RECENCY_WINDOW_SECONDS,
    private readonly clock: Clock = systemClock,
  ) {}

  get size(): number {
    return this.count;
  }

  /**
   * Records the message if it is fresh and not seen before.
   * @returns "stale", "duplicate" or "new"
   */
  observe(message: Pick<Message, "content" | "timestamp">): "stale" | "duplicate" | "new" {
    const now = unixSeconds(this.clock);
    this.sweep(now);

    if (!isRecent(message.timestamp, now, this.windowSeconds)) {
      return "stale";
    }

    let contents = this.entries.get(message.timestamp);
    if (!contents) {
      contents = new Set();
      this.entries.set(message.timestamp, contents);
    }
    if (contents.has(message.content)) {
      return "duplicate";
    }
    contents.add(message.content);
    this.count++;
    return "new";
  }

  has(message: Pick<Message, "content" | "timestamp">): boolean {
    return this.entries.get(message.timestamp)?.has(message.content) ?? false;
  }

  /**
   * Drops every entry that is no longer recent at `nowSeconds`.
   */
  sweep(nowSeconds: number = unixSeconds(this.clock)): void {
    for (const [timestamp, contents] of this.entries) {
      if (!isRecent(timestamp, nowSeconds, this.windowSeconds)) {
        this.count -= contents.size;
        this.entries.delete(timestamp);
      }
    }
  }
}
