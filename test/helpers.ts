// test/helpers.ts

import * as net from "net";
import { Duplex } from "stream";
import { LogEntry, loggerConfig } from "../src/logger";

/**
 * In-process stand-in for a TCP socket. Lines fed with `feed` arrive on the
 * readable side; everything the code under test writes lands in `written`.
 * Like a net.Socket, the writable side ends when the remote side does.
 */
export class FakeSocket extends Duplex {
  readonly written: string[] = [];
  failWrites = false;

  constructor() {
    super({ allowHalfOpen: false });
  }

  _read(): void {}

  _write(
    chunk: Buffer | string,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    if (this.failWrites) {
      callback(new Error("EPIPE"));
      return;
    }
    this.written.push(chunk.toString());
    callback();
  }

  feed(...lines: string[]): void {
    for (const line of lines) {
      this.push(line);
    }
  }

  /** Simulates the remote side closing the connection. */
  remoteEnd(): void {
    this.push(null);
  }
}

export async function waitFor(
  predicate: () => boolean,
  timeoutMs = 2000,
  intervalMs = 10,
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, intervalMs));
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Routes log output into an array for the duration of a test.
 */
export function captureLogs(): LogEntry[] {
  const entries: LogEntry[] = [];
  loggerConfig.configure({
    level: "debug",
    handler: (entry) => entries.push(entry),
  });
  return entries;
}

export async function findAvailableTcpPort(): Promise<number> {
  return new Promise((resolve, reject) => {
    const server = net.createServer();
    server.on("error", (err) => {
      server.close();
      reject(err);
    });
    server.listen(0, "127.0.0.1", () => {
      const addr = server.address();
      if (!addr || typeof addr === "string") {
        server.close();
        reject(new Error("Unexpected server address"));
        return;
      }
      const port = addr.port;
      server.close(() => resolve(port));
    });
  });
}
