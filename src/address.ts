// src/address.ts

import { isIP } from "net";

/**
 * Endpoint identifier of a node: `ip:port`, with IPv6 hosts in brackets
 * (`[::1]:9000`). This is the only notion of peer identity in the mesh.
 */
export type Address = string;

/** Every node binds here; peer addresses learned in handshakes use it too. */
export const LOOPBACK_HOST = "127.0.0.1";

export interface Endpoint {
  host: string;
  port: number;
}

const ADDRESS_PATTERN = /^(?:\[([0-9a-fA-F:.]+)\]|([0-9.]+)):(\d{1,5})$/;

export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 0 && port <= 65535;
}

// Compressed lowercase form, so equal IPv6 hosts compare equal as strings.
function canonicalHost(host: string): string {
  if (isIP(host) !== 6) return host;
  return new URL(`http://[${host}]/`).hostname.slice(1, -1);
}

/**
 * Parses `ip:port` into its canonical parts (no leading zeros in the port,
 * compressed IPv6). Returns null for hostnames, bad IPs or out-of-range ports.
 */
export function parseAddress(address: string): Endpoint | null {
  const match = ADDRESS_PATTERN.exec(address);
  if (!match) return null;

  const host = match[1] ?? match[2];
  const port = parseInt(match[3], 10);
  const family = isIP(host);

  if (!isValidPort(port)) return null;
  if (match[1] !== undefined ? family !== 6 : family !== 4) return null;

  return { host: canonicalHost(host), port };
}

export function isAddress(value: string): boolean {
  return parseAddress(value) !== null;
}

/**
 * Rewrites an address into the one form used for identity checks:
 * `127.0.0.1:09000` becomes `127.0.0.1:9000`, `[0:0::1]:9000` becomes `[::1]:9000`.
 * @returns null if the value is not an ip:port address
 */
export function normalizeAddress(value: string): Address | null {
  const endpoint = parseAddress(value);
  return endpoint ? formatAddress(endpoint.host, endpoint.port) : null;
}

export function formatAddress(host: string, port: number): Address {
  return isIP(host) === 6 ? `[${host}]:${port}` : `${host}:${port}`;
}

export function loopbackAddress(port: number): Address {
  return formatAddress(LOOPBACK_HOST, port);
}

/**
 * Renders a set of addresses the way the node's log lines show them:
 * `{"127.0.0.1:9001", "127.0.0.1:9002"}`, sorted for stable output.
 */
export function formatAddressSet(addresses: Iterable<Address>): string {
  const sorted = Array.from(addresses).sort();
  return `{${sorted.map((a) => `"${a}"`).join(", ")}}`;
}
