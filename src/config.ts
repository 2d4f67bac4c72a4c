// src/config.ts

import { z } from "zod";
import { Address, LOOPBACK_HOST, normalizeAddress } from "./address";
import { ConfigError } from "./errors";
import { DEFAULT_HANDSHAKE_TIMEOUT_MS } from "./handshake";
import { LOG_LEVEL_NAMES, LogLevel } from "./logger";
import { DEFAULT_RELAY_CAPACITY } from "./relay_hub";
import { RECENCY_WINDOW_SECONDS } from "./seen_cache";

/**
 * Everything a node needs to start.
 */
export interface NodeConfig {
  /** Listening port on the loopback interface. */
  port: number;
  /** Gossip period in ms. */
  periodMs: number;
  /** Peer dialed once at startup. */
  seed?: Address;
  /** Interface to bind. Default: 127.0.0.1 */
  host: string;
  /** Time an inbound socket has to send its PeerInfo. Default: 5000 */
  handshakeTimeoutMs: number;
  /** Per-subscriber queue length of the relay hub. Default: 16 */
  relayCapacity: number;
  /** Oldest accepted message age in seconds. Default: 10 */
  recencyWindowSeconds: number;
  /** Drop inbound messages already relayed instead of flooding them again. Default: true */
  suppressDuplicateRelay: boolean;
  logLevel: LogLevel;
}

export const DEFAULT_NODE_CONFIG: Omit<NodeConfig, "port" | "periodMs"> = {
  host: LOOPBACK_HOST,
  handshakeTimeoutMs: DEFAULT_HANDSHAKE_TIMEOUT_MS,
  relayCapacity: DEFAULT_RELAY_CAPACITY,
  recencyWindowSeconds: RECENCY_WINDOW_SECONDS,
  suppressDuplicateRelay: true,
  logLevel: "info",
};

/**
 * Raw option values as the CLI collects them.
 */
export interface RawCliOptions {
  period?: string;
  port?: string;
  connect?: string;
  logLevel?: string;
}

const integerString = (name: string) =>
  z
    .string({ required_error: `--${name} is required` })
    .trim()
    .regex(/^\d+$/, `--${name} must be a whole number`)
    .transform((value) => parseInt(value, 10));

const cliSchema = z.object({
  period: integerString("period").refine((n) => n > 0, {
    message: "--period must be a positive number of seconds",
  }),
  port: integerString("port").refine((n) => n >= 1 && n <= 65535, {
    message: "--port must be between 1 and 65535",
  }),
  connect: z
    .string()
    .trim()
    .transform((value, ctx) => {
      const address = normalizeAddress(value);
      if (address === null) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "--connect must be an ip:port address",
        });
        return z.NEVER;
      }
      return address;
    })
    .optional(),
  logLevel: z.enum(LOG_LEVEL_NAMES).optional(),
});

/**
 * Validates CLI option strings into a full NodeConfig.
 * @param env source of LOG_LEVEL when --log-level is absent
 * @throws ConfigError listing every invalid option
 */
export function parseCliOptions(
  raw: RawCliOptions,
  env: NodeJS.ProcessEnv = process.env,
): NodeConfig {
  const result = cliSchema.safeParse({
    ...raw,
    logLevel: raw.logLevel ?? env.LOG_LEVEL,
  });
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => issue.message));
  }

  const { period, port, connect, logLevel } = result.data;
  return {
    ...DEFAULT_NODE_CONFIG,
    port,
    periodMs: period * 1000,
    seed: connect,
    logLevel: logLevel ?? DEFAULT_NODE_CONFIG.logLevel,
  };
}

/**
 * Fills defaults and checks a programmatic config.
 * @throws ConfigError
 */
export function resolveNodeConfig(
  config: Pick<NodeConfig, "port" | "periodMs"> & Partial<NodeConfig>,
): NodeConfig {
  const resolved: NodeConfig = { ...DEFAULT_NODE_CONFIG, ...config };
  const issues: string[] = [];

  if (!Number.isInteger(resolved.port) || resolved.port < 1 || resolved.port > 65535) {
    issues.push("port must be between 1 and 65535");
  }
  if (!Number.isFinite(resolved.periodMs) || resolved.periodMs <= 0) {
    issues.push("periodMs must be positive");
  }
  if (resolved.seed !== undefined) {
    const seed = normalizeAddress(resolved.seed);
    if (seed === null) {
      issues.push("seed must be an ip:port address");
    } else {
      resolved.seed = seed;
    }
  }
  if (!Number.isInteger(resolved.relayCapacity) || resolved.relayCapacity < 1) {
    issues.push("relayCapacity must be a positive integer");
  }
  if (resolved.handshakeTimeoutMs <= 0) {
    issues.push("handshakeTimeoutMs must be positive");
  }
  if (resolved.recencyWindowSeconds < 0) {
    issues.push("recencyWindowSeconds must not be negative");
  }

  if (issues.length > 0) {
    throw new ConfigError(issues);
  }
  return resolved;
}
