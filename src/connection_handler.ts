// src/connection_handler.ts

import { EventEmitter } from "events";
import { Duplex } from "stream";
import { v4 as uuidv4 } from "uuid";
import { Address } from "./address";
import { DecodeError, TransportError, toError } from "./errors";
import { LineReader } from "./line_reader";
import { Logger, createLogger } from "./logger";
import { PeerDirectory } from "./peer_directory";
import { RelayHub, RelayItem, Subscription } from "./relay_hub";
import { Message, WireEnvelope, decode } from "./wire";

export type LinkDirection = "inbound" | "outbound";

/**
 * Why a reader duty ended.
 */
export type ReaderExit = "eof" | "error" | "malformed" | "closed";

/**
 * Decides whether an inbound message is republished to the hub. Returning
 * false keeps the message off every other link.
 */
export type RelayFilter = (message: Message) => boolean;

/**
 * Everything a link needs from the node that owns it.
 */
export interface LinkContext {
  directory: PeerDirectory;
  hub: RelayHub;
  relayFilter?: RelayFilter;
}

export interface ConnectionHandlerOptions extends LinkContext {
  socket: Duplex;
  lines: LineReader;
  /** Listening address of the remote node. */
  peer: Address;
  direction: LinkDirection;
}

/**
 * Owns one established link. The reader duty turns inbound lines into
 * directory updates and relay items; the writer duty copies relay items that
 * did not come from this link onto the socket. The two run independently:
 * a write failure leaves the reader running and vice versa, although a
 * closed socket ends both.
 *
 * Events:
 * - 'reader_exit' (reason: ReaderExit)
 * - 'closed': both duties have finished
 */
export class ConnectionHandler extends EventEmitter {
  readonly id = uuidv4();
  readonly peer: Address;
  readonly direction: LinkDirection;
  /** Resolves once both duties have finished. */
  readonly closed: Promise<void>;

  private readonly socket: Duplex;
  private readonly lines: LineReader;
  private readonly directory: PeerDirectory;
  private readonly hub: RelayHub;
  private readonly relayFilter?: RelayFilter;
  private readonly log: Logger;
  private subscription?: Subscription;
  private started = false;
  private closing = false;
  private readonly resolveClosed: () => void;
  private received = 0;
  private written = 0;

  constructor(options: ConnectionHandlerOptions) {
    super();
    this.socket = options.socket;
    this.lines = options.lines;
    this.peer = options.peer;
    this.direction = options.direction;
    this.directory = options.directory;
    this.hub = options.hub;
    this.relayFilter = options.relayFilter;
    this.log = createLogger("ConnectionHandler", this.directory.self).child({
      peer: this.peer,
      linkId: this.id,
    });
    let resolveClosed = () => {};
    this.closed = new Promise((resolve) => {
      resolveClosed = () => resolve();
    });
    this.resolveClosed = resolveClosed;

    this.socket.on("error", (err) => {
      this.log.debug("Socket error", { error: err.message });
    });
    // A reset socket never emits 'end', so readline would not finish on its own.
    this.socket.once("close", () => {
      this.lines.close();
      this.subscription?.unsubscribe();
    });
  }

  get stats(): { received: number; written: number; lagged: number } {
    return {
      received: this.received,
      written: this.written,
      lagged: this.subscription?.lagged ?? 0,
    };
  }

  /**
   * Starts both duties. The hub subscription is taken synchronously so every
   * item published after this call is eligible for this link.
   */
  start(): void {
    if (this.started) return;
    this.started = true;
    this.subscription = this.hub.subscribe();
    if (this.socket.destroyed) {
      this.subscription.unsubscribe();
    }

    void this.run(this.subscription);
  }

  /**
   * Tears the link down. The peer stays in the directory only if some other
   * path re-adds it.
   */
  close(): void {
    if (this.closing) return;
    this.closing = true;
    this.lines.close();
    this.subscription?.unsubscribe();
    this.socket.destroy();
    if (!this.started) {
      this.directory.remove(this.peer);
      this.resolveClosed();
    }
  }

  private async run(subscription: Subscription): Promise<void> {
    try {
      await Promise.all([this.runReader(), this.runWriter(subscription)]);
    } catch (err) {
      this.log.error("Link failed", toError(err));
    } finally {
      this.emit("closed");
      this.resolveClosed();
    }
  }

  private async runReader(): Promise<void> {
    let reason: ReaderExit = "eof";

    try {
      for (;;) {
        const line = await this.lines.next();
        if (line === null) {
          if (this.closing) reason = "closed";
          break;
        }
        if (!this.handleLine(line)) {
          reason = "malformed";
          this.socket.destroy();
          break;
        }
      }
    } catch (err) {
      reason = this.closing ? "closed" : "error";
      if (!this.closing) {
        this.log.debug("Read failed", { error: toError(err).message });
      }
    }

    this.lines.close();
    if (this.directory.remove(this.peer)) {
      this.log.info(`Disconnected from the peer at "${this.peer}"`, { reason });
    }
    this.emit("reader_exit", reason);
  }

  /**
   * @returns false if the line is malformed and the link must be dropped
   */
  private handleLine(raw: string): boolean {
    const line = raw.trim();
    if (line === "") return true;

    let envelope: WireEnvelope;
    try {
      envelope = decode(line);
    } catch (err) {
      if (err instanceof DecodeError) {
        this.log.warn("Dropping link after malformed line", {
          error: err.message,
        });
        return false;
      }
      throw err;
    }

    this.received++;

    switch (envelope.type) {
      case "Message": {
        const message = envelope.data;
        this.directory.insert(message.from);
        if (!this.relayFilter || this.relayFilter(message)) {
          this.hub.publish({ line: line + "\n", origin: this.peer });
        }
        break;
      }
      case "PeerInfo": {
        const added = this.directory.merge(envelope.data.known_peers);
        if (added.length > 0) {
          this.log.debug("Learned peers", { added: added.join(",") });
        }
        break;
      }
    }
    return true;
  }

  private async runWriter(subscription: Subscription): Promise<void> {
    for await (const item of subscription) {
      if (item.origin === this.peer) continue;
      try {
        await this.write(item);
      } catch (err) {
        this.log.debug("Writer stopped", { error: toError(err).message });
        subscription.unsubscribe();
        return;
      }
    }
  }

  private write(item: RelayItem): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.socket.destroyed || !this.socket.writable) {
        reject(new TransportError("Socket is not writable", this.peer));
        return;
      }
      this.socket.write(item.line, (err) => {
        if (err) {
          reject(new TransportError("Write failed", this.peer, err));
        } else {
          this.written++;
          resolve();
        }
      });
    });
  }
}
