// test/listener.test.ts

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as net from "net";
import {
  BindError,
  ConnectionHandler,
  DialError,
  HandshakeError,
  PeerDirectory,
  PeerListener,
  RelayHub,
  dialPeer,
  encode,
  loggerConfig,
  messageEnvelope,
  peerInfoEnvelope,
} from "../src";
import { captureLogs, findAvailableTcpPort, waitFor } from "./helpers";

function connectRaw(port: number): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.connect({ host: "127.0.0.1", port }, () => resolve(socket));
    socket.once("error", reject);
  });
}

function nextLink(listener: PeerListener): Promise<ConnectionHandler> {
  return new Promise((resolve) => listener.once("link", resolve));
}

describe("PeerListener", () => {
  let port: number;
  let self: string;
  let directory: PeerDirectory;
  let hub: RelayHub;
  let listener: PeerListener;
  const cleanup: Array<() => Promise<void> | void> = [];

  beforeEach(async () => {
    captureLogs();
    port = await findAvailableTcpPort();
    self = `127.0.0.1:${port}`;
    directory = new PeerDirectory(self);
    hub = new RelayHub();
    listener = new PeerListener({
      host: "127.0.0.1",
      port,
      directory,
      hub,
      handshakeTimeoutMs: 500,
    });
    await listener.start();
  });

  afterEach(async () => {
    for (const fn of cleanup.splice(0)) await fn();
    await listener.stop();
    hub.close();
    loggerConfig.reset();
  });

  it("should report its bound address", () => {
    expect(listener.listening).toBe(true);
    expect(listener.address).toBe(self);
  });

  it("should record the declared port rather than the source port", async () => {
    const client = await connectRaw(port);
    cleanup.push(() => {
      client.destroy();
    });
    const link = nextLink(listener);

    client.write(
      encode(peerInfoEnvelope({ port: 9901, known_peers: ["127.0.0.1:9902", self] })),
    );
    const handler = await link;
    cleanup.push(async () => {
      handler.close();
      await handler.closed;
    });

    expect(handler.peer).toBe("127.0.0.1:9901");
    expect(handler.direction).toBe("inbound");
    expect(directory.snapshot()).toEqual(new Set(["127.0.0.1:9901", "127.0.0.1:9902"]));
  });

  it("should relay hub traffic to an accepted peer", async () => {
    const client = await connectRaw(port);
    cleanup.push(() => {
      client.destroy();
    });
    const link = nextLink(listener);
    client.write(encode(peerInfoEnvelope({ port: 9901, known_peers: [] })));
    const handler = await link;
    cleanup.push(async () => {
      handler.close();
      await handler.closed;
    });

    let received = "";
    client.on("data", (chunk) => {
      received += chunk.toString();
    });
    const line = encode(messageEnvelope({ content: "9", from: self, timestamp: 1 }));
    hub.publish({ line, origin: self });

    await waitFor(() => received === line);
  });

  it("should drop a connection whose first line is a Message", async () => {
    const failures: HandshakeError[] = [];
    listener.on("handshake_failed", (err: HandshakeError) => failures.push(err));
    const client = await connectRaw(port);
    const closed = new Promise<void>((resolve) => client.once("close", () => resolve()));
    client.on("error", () => {});

    client.write(
      encode(messageEnvelope({ content: "1", from: "127.0.0.1:9901", timestamp: 1 })),
    );
    await closed;

    expect(failures).toHaveLength(1);
    expect(failures[0].message).toContain("expected PeerInfo as first line, got Message");
    expect(directory.size).toBe(0);
  });

  it("should drop a connection that declares our own port", async () => {
    const failures: HandshakeError[] = [];
    listener.on("handshake_failed", (err: HandshakeError) => failures.push(err));
    const client = await connectRaw(port);
    const closed = new Promise<void>((resolve) => client.once("close", () => resolve()));
    client.on("error", () => {});

    client.write(encode(peerInfoEnvelope({ port, known_peers: ["127.0.0.1:9902"] })));
    await closed;

    expect(failures).toHaveLength(1);
    expect(failures[0].message).toContain(`peer declared our own address ${self}`);
    expect(directory.size).toBe(0);
  });

  it("should drop a connection that never handshakes", async () => {
    const client = await connectRaw(port);
    client.on("error", () => {});
    const closed = new Promise<void>((resolve) => client.once("close", () => resolve()));

    await closed;
    expect(directory.size).toBe(0);
  });

  it("should fail to start on a port already in use", async () => {
    const second = new PeerListener({
      host: "127.0.0.1",
      port,
      directory: new PeerDirectory(self),
      hub: new RelayHub(),
    });
    await expect(second.start()).rejects.toBeInstanceOf(BindError);
    expect(second.listening).toBe(false);
  });
});

describe("dialPeer", () => {
  let seedPort: number;
  let seedDirectory: PeerDirectory;
  let seedHub: RelayHub;
  let seedListener: PeerListener;

  beforeEach(async () => {
    captureLogs();
    seedPort = await findAvailableTcpPort();
    seedDirectory = new PeerDirectory(`127.0.0.1:${seedPort}`);
    seedHub = new RelayHub();
    seedListener = new PeerListener({
      host: "127.0.0.1",
      port: seedPort,
      directory: seedDirectory,
      hub: seedHub,
    });
    await seedListener.start();
  });

  afterEach(async () => {
    await seedListener.stop();
    seedHub.close();
    loggerConfig.reset();
  });

  it("should announce our listening port and record the seed", async () => {
    const directory = new PeerDirectory("127.0.0.1:9801");
    directory.insert("127.0.0.1:9802");
    const hub = new RelayHub();
    const accepted = nextLink(seedListener);

    const handler = await dialPeer(`127.0.0.1:${seedPort}`, {
      directory,
      hub,
      localPort: 9801,
    });
    const inbound = await accepted;

    expect(handler.direction).toBe("outbound");
    expect(handler.peer).toBe(`127.0.0.1:${seedPort}`);
    expect(directory.has(`127.0.0.1:${seedPort}`)).toBe(true);
    expect(inbound.peer).toBe("127.0.0.1:9801");
    expect(seedDirectory.snapshot()).toEqual(
      new Set(["127.0.0.1:9801", "127.0.0.1:9802"]),
    );

    handler.close();
    inbound.close();
    await Promise.all([handler.closed, inbound.closed]);
    hub.close();
  });

  it("should raise DialError and leave the directory alone when nobody listens", async () => {
    const freePort = await findAvailableTcpPort();
    const directory = new PeerDirectory("127.0.0.1:9801");

    await expect(
      dialPeer(`127.0.0.1:${freePort}`, {
        directory,
        hub: new RelayHub(),
        localPort: 9801,
      }),
    ).rejects.toBeInstanceOf(DialError);
    expect(directory.size).toBe(0);
  });
});
