// src/wire.ts

import { z } from "zod";
import { Address, isValidPort, normalizeAddress } from "./address";
import { DecodeError } from "./errors";

/**
 * A gossip message. Immutable once created.
 */
export interface Message {
  /** Application payload. */
  content: string;
  /** Listening address of the originating node. */
  from: Address;
  /** Origination time, seconds since the Unix epoch. */
  timestamp: number;
}

/**
 * Sent first on every link, in both directions.
 */
export interface PeerInfo {
  /** The sender's listening port (not its ephemeral source port). */
  port: number;
  /** The sender's known peers, without itself. */
  known_peers: Address[];
}

export type WireEnvelope =
  | { type: "Message"; data: Message }
  | { type: "PeerInfo"; data: PeerInfo };

export type MessageEnvelope = Extract<WireEnvelope, { type: "Message" }>;
export type PeerInfoEnvelope = Extract<WireEnvelope, { type: "PeerInfo" }>;

const addressSchema = z.string().transform((value, ctx) => {
  const address = normalizeAddress(value);
  if (address === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "expected an ip:port address" });
    return z.NEVER;
  }
  return address;
});

const portSchema = z.number().int().refine(isValidPort, {
  message: "expected a port between 0 and 65535",
});

const messageSchema = z.object({
  content: z.string(),
  from: addressSchema,
  timestamp: z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
});

const peerInfoSchema = z.object({
  port: portSchema,
  known_peers: z.array(addressSchema),
});

const envelopeSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("Message"), data: messageSchema }),
  z.object({ type: z.literal("PeerInfo"), data: peerInfoSchema }),
]);

export function messageEnvelope(message: Message): MessageEnvelope {
  return { type: "Message", data: message };
}

export function peerInfoEnvelope(info: PeerInfo): PeerInfoEnvelope {
  return { type: "PeerInfo", data: info };
}

export function isMessage(envelope: WireEnvelope): envelope is MessageEnvelope {
  return envelope.type === "Message";
}

export function isPeerInfo(
  envelope: WireEnvelope,
): envelope is PeerInfoEnvelope {
  return envelope.type === "PeerInfo";
}

/**
 * Serializes an envelope as one line, newline included. JSON escapes
 * control characters inside strings, so the only raw newline is the
 * terminator.
 */
export function encode(envelope: WireEnvelope): string {
  const data =
    envelope.type === "Message"
      ? {
          content: envelope.data.content,
          from: envelope.data.from,
          timestamp: envelope.data.timestamp,
        }
      : { port: envelope.data.port, known_peers: envelope.data.known_peers };
  return JSON.stringify({ type: envelope.type, data }) + "\n";
}

/**
 * Parses one line into an envelope. A trailing line terminator is ignored.
 * @throws DecodeError if the line is not JSON or matches neither variant.
 */
export function decode(line: string): WireEnvelope {
  const text = line.replace(/\r?\n$/, "");

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new DecodeError(
      err instanceof Error ? err.message : "invalid JSON",
      text,
    );
  }

  const result = envelopeSchema.safeParse(raw);
  if (!result.success) {
    const reason = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join(", ");
    throw new DecodeError(reason, text);
  }
  return result.data;
}

/**
 * Like decode, but returns null instead of throwing.
 */
export function tryDecode(line: string): WireEnvelope | null {
  try {
    return decode(line);
  } catch (err) {
    if (err instanceof DecodeError) return null;
    throw err;
  }
}
