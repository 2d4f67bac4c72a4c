// src/listener.ts

import { EventEmitter } from "events";
import * as net from "net";
import { Address, formatAddress, formatAddressSet } from "./address";
import { ConnectionHandler, LinkContext } from "./connection_handler";
import { BindError, HandshakeError, toError } from "./errors";
import { DEFAULT_HANDSHAKE_TIMEOUT_MS, acceptPeerInfo, readHandshake } from "./handshake";
import { createLineReader } from "./line_reader";
import { Logger, createLogger } from "./logger";

export interface PeerListenerOptions extends LinkContext {
  /** Interface to bind. */
  host: string;
  port: number;
  /** Time an accepted socket has to send its PeerInfo. Default: 5000 */
  handshakeTimeoutMs?: number;
}

/**
 * Accept loop for inbound links. Each accepted socket must open with a
 * PeerInfo line; anything else (or nothing, within the timeout) drops the
 * socket without touching the directory.
 *
 * Events:
 * - 'link' (handler: ConnectionHandler): handshake completed, handler started
 * - 'handshake_failed' (error: HandshakeError, remote: string)
 */
export class PeerListener extends EventEmitter {
  private server?: net.Server;
  private readonly pending = new Set<net.Socket>();
  private readonly log: Logger;
  private stopped = false;

  constructor(private readonly options: PeerListenerOptions) {
    super();
    this.log = createLogger("PeerListener", options.directory.self);
  }

  get listening(): boolean {
    return this.server?.listening ?? false;
  }

  /**
   * Bound address, once listening.
   */
  get address(): Address | null {
    const addr = this.server?.address();
    if (!addr || typeof addr === "string") return null;
    return formatAddress(addr.address, addr.port);
  }

  /**
   * Binds and starts accepting.
   * @throws BindError if the port cannot be bound
   */
  async start(): Promise<Address> {
    const { host, port } = this.options;
    const server = net.createServer((socket) => {
      this.handleSocket(socket).catch((err) => {
        this.log.error("Failed to set up inbound link", toError(err));
        socket.destroy();
      });
    });

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => {
        server.close();
        reject(new BindError(formatAddress(host, port), err));
      };
      server.once("error", onError);
      server.listen(port, host, () => {
        server.off("error", onError);
        resolve();
      });
    });

    server.on("error", (err) => {
      this.log.error("Listener error", err);
    });
    this.server = server;
    this.stopped = false;

    const bound = this.address ?? formatAddress(host, port);
    this.log.debug("Listening", { bind: bound });
    return bound;
  }

  /**
   * Stops accepting and drops sockets still in their handshake. Links that
   * already completed the handshake are owned by their handlers.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    for (const socket of this.pending) {
      socket.destroy();
    }
    this.pending.clear();

    const server = this.server;
    this.server = undefined;
    if (!server) return;

    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
  }

  private async handleSocket(socket: net.Socket): Promise<void> {
    const remote = `${socket.remoteAddress}:${socket.remotePort}`;
    socket.on("error", (err) => {
      this.log.debug("Inbound socket error", { remote, error: err.message });
    });

    const lines = createLineReader(socket);
    this.pending.add(socket);

    const { directory } = this.options;
    let peer: Address | null = null;
    try {
      const info = await readHandshake(
        lines,
        this.options.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS,
        remote,
      );
      if (!this.stopped) {
        peer = acceptPeerInfo(directory, info, remote);
      }
    } catch (err) {
      lines.close();
      socket.destroy();
      if (err instanceof HandshakeError) {
        this.log.debug("Dropping connection", { remote, error: err.message });
        this.emit("handshake_failed", err, remote);
        return;
      }
      throw err;
    } finally {
      this.pending.delete(socket);
    }

    if (peer === null) {
      lines.close();
      socket.destroy();
      return;
    }

    this.log.info(`Connected to the peer at "${peer}"`);
    this.log.info(`Known peers: ${formatAddressSet(directory.snapshot())}`);

    const handler = new ConnectionHandler({
      directory,
      hub: this.options.hub,
      relayFilter: this.options.relayFilter,
      socket,
      lines,
      peer,
      direction: "inbound",
    });
    handler.start();
    this.emit("link", handler);
  }
}
