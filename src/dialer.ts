// src/dialer.ts

import * as net from "net";
import { Address, formatAddress, formatAddressSet, parseAddress } from "./address";
import { ConnectionHandler, LinkContext } from "./connection_handler";
import { DialError, toError } from "./errors";
import { buildPeerInfo } from "./handshake";
import { createLineReader } from "./line_reader";
import { createLogger } from "./logger";
import { encode, peerInfoEnvelope } from "./wire";

export interface DialOptions extends LinkContext {
  /** Our listening port, announced in the PeerInfo. */
  localPort: number;
  /** Give up connecting after this long. Default: 5000 */
  connectTimeoutMs?: number;
}

function connect(host: string, port: number, timeoutMs: number): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.connect({ host, port });
    const fail = (err: Error) => {
      socket.destroy();
      reject(err);
    };
    socket.setTimeout(timeoutMs, () => fail(new Error(`timed out after ${timeoutMs}ms`)));
    socket.once("error", fail);
    socket.once("connect", () => {
      socket.setTimeout(0);
      socket.off("error", fail);
      resolve(socket);
    });
  });
}

function writeLine(socket: net.Socket, line: string): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.write(line, (err) => (err ? reject(err) : resolve()));
  });
}

/**
 * Opens the outbound link to a seed peer: connect, announce our PeerInfo,
 * record the seed and hand the socket to a started ConnectionHandler.
 * Nothing is recorded if any step fails.
 * @throws DialError
 */
export async function dialPeer(
  seed: Address,
  options: DialOptions,
): Promise<ConnectionHandler> {
  const { directory, hub, relayFilter } = options;
  const log = createLogger("Dialer", directory.self);
  const endpoint = parseAddress(seed);
  if (!endpoint) {
    throw new DialError(seed, new Error("not an ip:port address"));
  }
  const peer = formatAddress(endpoint.host, endpoint.port);

  let socket: net.Socket;
  try {
    socket = await connect(endpoint.host, endpoint.port, options.connectTimeoutMs ?? 5000);
  } catch (err) {
    throw new DialError(peer, toError(err));
  }
  socket.on("error", (err) => {
    log.debug("Outbound socket error", { peer, error: err.message });
  });

  const lines = createLineReader(socket);
  try {
    const info = buildPeerInfo(directory, options.localPort);
    await writeLine(socket, encode(peerInfoEnvelope(info)));
  } catch (err) {
    lines.close();
    socket.destroy();
    throw new DialError(peer, toError(err));
  }

  directory.insert(peer);
  log.info(`Connected to the peer at "${peer}"`);
  log.info(`Known peers: ${formatAddressSet(directory.snapshot())}`);

  const handler = new ConnectionHandler({
    directory,
    hub,
    relayFilter,
    socket,
    lines,
    peer,
    direction: "outbound",
  });
  handler.start();
  return handler;
}
