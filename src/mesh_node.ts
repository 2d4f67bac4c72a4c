// src/mesh_node.ts

import { EventEmitter } from "events";
import { Address, formatAddress } from "./address";
import { NodeConfig } from "./config";
import { ConnectionHandler, RelayFilter } from "./connection_handler";
import { DedupFilter } from "./dedup_filter";
import { dialPeer } from "./dialer";
import { DialError } from "./errors";
import { GossipEmitter } from "./gossip_emitter";
import { HealthAggregator, HealthReport } from "./health";
import { PeerListener } from "./listener";
import { Logger, createLogger } from "./logger";
import { PeerDirectory } from "./peer_directory";
import { RelayHub } from "./relay_hub";
import { SeenCache } from "./seen_cache";
import { Clock, systemClock } from "./time";
import { Message } from "./wire";

export interface MeshNodeOptions {
  clock?: Clock;
  /** Content generator for gossip messages. */
  contentSource?: () => string;
}

type NodeState = "idle" | "starting" | "running" | "stopping" | "stopped";

/**
 * One member of the mesh: the listener, the optional seed link, the gossip
 * ticker and the dedup feed, all sharing one directory and one relay hub.
 *
 * Events:
 * - 'message' (message: Message): surfaced by the dedup filter
 * - 'link' (handler: ConnectionHandler): a link completed its handshake
 * - 'link_closed' (handler: ConnectionHandler)
 */
export class MeshNode extends EventEmitter {
  readonly address: Address;
  readonly directory: PeerDirectory;
  readonly hub: RelayHub;
  readonly emitter: GossipEmitter;
  readonly filter: DedupFilter;

  private readonly listener: PeerListener;
  private readonly links = new Set<ConnectionHandler>();
  private readonly relayFilter?: RelayFilter;
  private readonly health: HealthAggregator;
  private readonly log: Logger;
  private state: NodeState = "idle";

  constructor(
    readonly config: NodeConfig,
    options: MeshNodeOptions = {},
  ) {
    super();
    const clock = options.clock ?? systemClock;
    this.address = formatAddress(config.host, config.port);
    this.log = createLogger("MeshNode", this.address);
    this.directory = new PeerDirectory(this.address);
    this.hub = new RelayHub({ capacity: config.relayCapacity });

    if (config.suppressDuplicateRelay) {
      const relayed = new SeenCache(config.recencyWindowSeconds, clock);
      this.relayFilter = (message: Message) =>
        message.from !== this.address && relayed.observe(message) === "new";
    }

    this.listener = new PeerListener({
      host: config.host,
      port: config.port,
      handshakeTimeoutMs: config.handshakeTimeoutMs,
      directory: this.directory,
      hub: this.hub,
      relayFilter: this.relayFilter,
    });
    this.listener.on("link", (handler: ConnectionHandler) => this.track(handler));

    this.emitter = new GossipEmitter(this.directory, this.hub, {
      periodMs: config.periodMs,
      port: config.port,
      contentSource: options.contentSource,
      clock,
    });

    this.filter = new DedupFilter(this.address, this.hub, {
      recencyWindowSeconds: config.recencyWindowSeconds,
      clock,
    });
    this.filter.on("message", (message: Message) => this.emit("message", message));

    this.health = new HealthAggregator(this.address);
    this.registerHealthChecks();
  }

  get isRunning(): boolean {
    return this.state === "running";
  }

  /**
   * Links currently open, inbound and outbound.
   */
  getLinks(): ConnectionHandler[] {
    return Array.from(this.links);
  }

  /**
   * Binds the listener, dials the seed (if any) and starts gossiping.
   * @throws BindError if the port cannot be bound
   */
  async start(): Promise<void> {
    if (this.state !== "idle") {
      throw new Error(`Cannot start node in state ${this.state}`);
    }
    this.state = "starting";

    try {
      await this.listener.start();
    } catch (err) {
      this.state = "stopped";
      throw err;
    }
    this.log.info(`My address is "${this.address}"`);

    this.filter.start();

    if (this.config.seed) {
      await this.connect(this.config.seed);
    }

    this.emitter.start();
    this.state = "running";
  }

  /**
   * Dials a peer. Failures are logged and otherwise ignored.
   * @returns the new link, or null if dialing failed
   */
  async connect(peer: Address): Promise<ConnectionHandler | null> {
    try {
      const handler = await dialPeer(peer, {
        directory: this.directory,
        hub: this.hub,
        relayFilter: this.relayFilter,
        localPort: this.config.port,
      });
      this.track(handler);
      return handler;
    } catch (err) {
      if (err instanceof DialError) {
        this.log.warn(err.message);
        return null;
      }
      throw err;
    }
  }

  /**
   * Stops gossiping, closes the listener and every link, and waits for all
   * link duties to finish.
   */
  async stop(): Promise<void> {
    if (this.state === "stopped" || this.state === "stopping") return;
    this.state = "stopping";

    this.emitter.stop();
    const listenerClosed = this.listener.stop();

    const closing = this.getLinks().map((handler) => {
      handler.close();
      return handler.closed;
    });
    await Promise.all(closing);
    await listenerClosed;

    this.filter.stop();
    this.hub.close();
    this.state = "stopped";
    this.log.debug("Stopped");
  }

  getHealth(): HealthReport {
    return this.health.getHealth();
  }

  private track(handler: ConnectionHandler): void {
    if (this.state === "stopping" || this.state === "stopped") {
      handler.close();
      return;
    }
    this.links.add(handler);
    void handler.closed.then(() => {
      this.links.delete(handler);
      this.emit("link_closed", handler);
    });
    this.emit("link", handler);
  }

  private registerHealthChecks(): void {
    this.health.register("listener", {
      getHealth: () => ({
        name: "listener",
        status: this.listener.listening ? "healthy" : "unhealthy",
        details: { address: this.listener.address, links: this.links.size },
      }),
    });
    this.health.register("directory", {
      getHealth: () => ({
        name: "directory",
        status: this.directory.size > 0 ? "healthy" : "degraded",
        message: this.directory.size > 0 ? undefined : "No known peers",
        details: { peers: Array.from(this.directory.snapshot()).sort() },
      }),
    });
    this.health.register("relay", {
      getHealth: () => {
        const lagged = this.hub.lagged;
        return {
          name: "relay",
          status: lagged > 0 ? "degraded" : "healthy",
          message: lagged > 0 ? `${lagged} items dropped by slow subscribers` : undefined,
          details: {
            subscribers: this.hub.subscriberCount,
            lagged,
            seenCacheSize: this.filter.cacheSize,
          },
        };
      },
    });
  }
}
