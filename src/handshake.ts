// src/handshake.ts

import { Address, loopbackAddress } from "./address";
import { DecodeError, HandshakeError } from "./errors";
import { LineReader } from "./line_reader";
import { PeerDirectory } from "./peer_directory";
import { PeerInfo, WireEnvelope, decode } from "./wire";

export const DEFAULT_HANDSHAKE_TIMEOUT_MS = 5000;

/**
 * The PeerInfo this node opens a link with: its listening port and every
 * peer it knows except itself.
 */
export function buildPeerInfo(directory: PeerDirectory, port: number): PeerInfo {
  const known = Array.from(directory.snapshot()).filter(
    (address) => address !== directory.self,
  );
  return { port, known_peers: known };
}

/**
 * Address under which a handshaking peer is recorded. The declared listening
 * port is kept and the observed source IP is replaced by loopback, which
 * assumes every node of the mesh runs on the same host.
 */
export function peerAddressFromHandshake(info: PeerInfo): Address {
  return loopbackAddress(info.port);
}

/**
 * Reads the first line of an accepted connection and requires it to be a
 * PeerInfo envelope.
 * @throws HandshakeError on EOF, timeout, a malformed line or a Message
 */
export async function readHandshake(
  lines: LineReader,
  timeoutMs: number = DEFAULT_HANDSHAKE_TIMEOUT_MS,
  remote?: string,
): Promise<PeerInfo> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new HandshakeError(`no PeerInfo within ${timeoutMs}ms`, remote)),
      timeoutMs,
    );
  });

  try {
    const line = await Promise.race([lines.next(), timeout]);
    if (line === null) {
      throw new HandshakeError("connection closed before PeerInfo", remote);
    }

    let envelope: WireEnvelope;
    try {
      envelope = decode(line);
    } catch (err) {
      if (err instanceof DecodeError) {
        throw new HandshakeError(err.message, remote);
      }
      throw err;
    }

    if (envelope.type !== "PeerInfo") {
      throw new HandshakeError(
        `expected PeerInfo as first line, got ${envelope.type}`,
        remote,
      );
    }
    return envelope.data;
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Records an accepted peer: its loopback address plus everything it
 * reported knowing, minus ourselves.
 * @returns the peer's address
 * @throws HandshakeError if the peer declares our own listening address
 */
export function acceptPeerInfo(
  directory: PeerDirectory,
  info: PeerInfo,
  remote?: string,
): Address {
  const peer = peerAddressFromHandshake(info);
  if (peer === directory.self) {
    throw new HandshakeError(`peer declared our own address ${peer}`, remote);
  }
  directory.insert(peer);
  directory.merge(info.known_peers);
  return peer;
}
