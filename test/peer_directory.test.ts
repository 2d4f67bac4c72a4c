// test/peer_directory.test.ts

import { describe, it, expect, beforeEach } from "vitest";
import { PeerDirectory } from "../src";

const SELF = "127.0.0.1:9000";
const B = "127.0.0.1:9001";
const C = "127.0.0.1:9002";

describe("PeerDirectory", () => {
  let directory: PeerDirectory;

  beforeEach(() => {
    directory = new PeerDirectory(SELF);
  });

  it("should never insert the local address", () => {
    expect(directory.insert(SELF)).toBe(false);
    expect(directory.has(SELF)).toBe(false);
    expect(directory.size).toBe(0);
  });

  it("should insert idempotently", () => {
    expect(directory.insert(B)).toBe(true);
    expect(directory.insert(B)).toBe(false);
    expect(directory.size).toBe(1);
  });

  it("should remove idempotently", () => {
    directory.insert(B);
    expect(directory.remove(B)).toBe(true);
    expect(directory.remove(B)).toBe(false);
    expect(directory.size).toBe(0);
  });

  it("should merge every address except the excluded one and self", () => {
    const added = directory.merge([B, SELF, C, B]);
    expect(added).toEqual([B, C]);
    expect(directory.snapshot()).toEqual(new Set([B, C]));

    const other = new PeerDirectory(SELF);
    expect(other.merge([B, C], C)).toEqual([B]);
    expect(other.snapshot()).toEqual(new Set([B]));
  });

  it("should hand out snapshots that do not track later changes", () => {
    directory.insert(B);
    const snapshot = directory.snapshot();
    directory.insert(C);
    directory.remove(B);
    expect(snapshot).toEqual(new Set([B]));
    expect(directory.snapshot()).toEqual(new Set([C]));
  });

  it("should emit membership events only on change", () => {
    const added: string[] = [];
    const removed: string[] = [];
    directory.on("peer_added", (a: string) => added.push(a));
    directory.on("peer_removed", (a: string) => removed.push(a));

    directory.insert(B);
    directory.insert(B);
    directory.merge([B, C]);
    directory.remove(C);
    directory.remove(C);

    expect(added).toEqual([B, C]);
    expect(removed).toEqual([C]);
  });
});
