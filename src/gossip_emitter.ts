// src/gossip_emitter.ts

import { randomInt } from "crypto";
import { EventEmitter } from "events";
import { formatAddressSet } from "./address";
import { buildPeerInfo } from "./handshake";
import { Logger, createLogger } from "./logger";
import { PeerDirectory } from "./peer_directory";
import { RelayHub } from "./relay_hub";
import { Clock, systemClock, unixSeconds } from "./time";
import { Message, encode, messageEnvelope, peerInfoEnvelope } from "./wire";

export interface GossipEmitterOptions {
  /** Interval between ticks, in ms. */
  periodMs: number;
  /** Listening port announced in PeerInfo. */
  port: number;
  /** Produces the content of each new message. Default: random u32 as text. */
  contentSource?: () => string;
  clock?: Clock;
}

const U32_RANGE = 2 ** 32;

export function randomContent(): string {
  // randomInt's upper bound must stay below 2^48
  return String(randomInt(0, U32_RANGE));
}

/**
 * Periodically originates a message and re-announces this node's view of
 * the mesh. The first tick runs on start; later ones on a fixed interval,
 * and a late tick is not made up.
 *
 * Events:
 * - 'sent' (message: Message, destinations: Set<Address>)
 */
export class GossipEmitter extends EventEmitter {
  private timer?: NodeJS.Timeout;
  private readonly log: Logger;
  private readonly contentSource: () => string;
  private readonly clock: Clock;
  private tickCount = 0;

  constructor(
    private readonly directory: PeerDirectory,
    private readonly hub: RelayHub,
    private readonly options: GossipEmitterOptions,
  ) {
    super();
    this.log = createLogger("GossipEmitter", directory.self);
    this.contentSource = options.contentSource ?? randomContent;
    this.clock = options.clock ?? systemClock;
  }

  get ticks(): number {
    return this.tickCount;
  }

  get running(): boolean {
    return this.timer !== undefined;
  }

  /**
   * Ticks once right away, then every `periodMs`.
   */
  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.tick(), this.options.periodMs);
    this.tick();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  /**
   * One round: publish a fresh message, then one PeerInfo per known peer.
   * Everything goes out with the local address as origin, so every link
   * writes it.
   */
  tick(): Message {
    this.tickCount++;
    const self = this.directory.self;
    const peers = this.directory.snapshot();

    const message: Message = {
      content: this.contentSource(),
      from: self,
      timestamp: unixSeconds(this.clock),
    };
    this.log.info(
      `Sending message [${message.content}] to ${formatAddressSet(peers)}`,
    );
    this.hub.publish({ line: encode(messageEnvelope(message)), origin: self });

    const info = buildPeerInfo(this.directory, this.options.port);
    const infoLine = encode(peerInfoEnvelope(info));
    for (let i = 0; i < peers.size; i++) {
      this.hub.publish({ line: infoLine, origin: self });
    }

    this.emit("sent", message, peers);
    return message;
  }
}
