// src/peer_directory.ts

import { EventEmitter } from "events";
import { Address } from "./address";

/**
 * The node's set of known peer addresses.
 *
 * One instance is owned by the node and handed by reference to every
 * component that learns about or loses peers. All mutation goes through
 * insert/remove/merge, which is where the rule "a node never lists itself"
 * is enforced. Each call runs to completion on the event loop, so callers
 * never observe a half-applied merge.
 *
 * Events:
 * - 'peer_added' (address): an address entered the directory
 * - 'peer_removed' (address): an address left the directory
 */
export class PeerDirectory extends EventEmitter {
  private readonly peers = new Set<Address>();

  constructor(readonly self: Address) {
    super();
  }

  get size(): number {
    return this.peers.size;
  }

  has(address: Address): boolean {
    return this.peers.has(address);
  }

  /**
   * Adds an address unless it is the local one.
   * @returns true if the directory changed
   */
  insert(address: Address): boolean {
    if (address === this.self || this.peers.has(address)) {
      return false;
    }
    this.peers.add(address);
    this.emit("peer_added", address);
    return true;
  }

  /**
   * @returns true if the address was present
   */
  remove(address: Address): boolean {
    if (!this.peers.delete(address)) {
      return false;
    }
    this.emit("peer_removed", address);
    return true;
  }

  /**
   * Inserts every address except `exclude` (and never the local address).
   * @returns the addresses that were new
   */
  merge(addresses: Iterable<Address>, exclude: Address = this.self): Address[] {
    const added: Address[] = [];
    for (const address of addresses) {
      if (address !== exclude && this.insert(address)) {
        added.push(address);
      }
    }
    return added;
  }

  /**
   * Point-in-time copy; later changes to the directory do not show up in it.
   */
  snapshot(): Set<Address> {
    return new Set(this.peers);
  }
}
