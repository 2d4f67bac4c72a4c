// src/errors.ts

/**
 * Base error class for all mesh errors.
 */
export class MeshError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "MeshError";
  }
}

/**
 * Error thrown when startup configuration is invalid.
 */
export class ConfigError extends MeshError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`, "CONFIG_INVALID", {
      issues,
    });
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Error thrown when the listening socket cannot be bound.
 */
export class BindError extends MeshError {
  readonly originalCause?: Error;

  constructor(address: string, cause?: Error) {
    super(
      `Failed to listen on ${address}${cause ? `: ${cause.message}` : ""}`,
      "BIND_FAILED",
      { address, cause: cause?.message },
    );
    this.name = "BindError";
    this.originalCause = cause;
  }
}

/**
 * Error thrown when the seed peer cannot be reached.
 */
export class DialError extends MeshError {
  readonly originalCause?: Error;

  constructor(address: string, cause?: Error) {
    super(
      `Failed to connect to peer at ${address}${cause ? `: ${cause.message}` : ""}`,
      "DIAL_FAILED",
      { address, cause: cause?.message },
    );
    this.name = "DialError";
    this.originalCause = cause;
  }
}

/**
 * Error thrown when a line is not a well-formed wire envelope.
 */
export class DecodeError extends MeshError {
  constructor(reason: string, line: string) {
    super(`Malformed envelope: ${reason}`, "DECODE_FAILED", {
      line: line.length > 200 ? `${line.slice(0, 200)}...` : line,
    });
    this.name = "DecodeError";
  }
}

/**
 * Error thrown when a new connection does not open with a valid PeerInfo.
 */
export class HandshakeError extends MeshError {
  constructor(reason: string, remote?: string) {
    super(
      `Handshake failed${remote ? ` with ${remote}` : ""}: ${reason}`,
      "HANDSHAKE_FAILED",
      { remote },
    );
    this.name = "HandshakeError";
  }
}

/**
 * Error thrown when a socket operation on an established link fails.
 */
export class TransportError extends MeshError {
  readonly originalCause?: Error;

  constructor(message: string, peer?: string, cause?: Error) {
    super(message, "TRANSPORT_ERROR", { peer, cause: cause?.message });
    this.name = "TransportError";
    this.originalCause = cause;
  }
}

/**
 * Normalizes an unknown thrown value into an Error.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
