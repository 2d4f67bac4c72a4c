// test/config.test.ts

import { describe, it, expect } from "vitest";
import {
  ConfigError,
  DEFAULT_NODE_CONFIG,
  parseCliOptions,
  resolveNodeConfig,
} from "../src";

describe("parseCliOptions", () => {
  it("should build a node config from valid options", () => {
    expect(
      parseCliOptions({ period: "2", port: "9001", connect: "127.0.0.1:9000" }, {}),
    ).toEqual({
      ...DEFAULT_NODE_CONFIG,
      port: 9001,
      periodMs: 2000,
      seed: "127.0.0.1:9000",
    });
  });

  it("should leave the seed out when --connect is absent", () => {
    const config = parseCliOptions({ period: "5", port: "9000" }, {});
    expect(config.seed).toBeUndefined();
    expect(config.host).toBe("127.0.0.1");
  });

  it("should store the seed in canonical form", () => {
    expect(
      parseCliOptions({ period: "1", port: "9001", connect: "127.0.0.1:09000" }, {}).seed,
    ).toBe("127.0.0.1:9000");
  });

  it("should take the log level from the option before LOG_LEVEL", () => {
    expect(
      parseCliOptions({ period: "1", port: "9000" }, { LOG_LEVEL: "debug" }).logLevel,
    ).toBe("debug");
    expect(
      parseCliOptions(
        { period: "1", port: "9000", logLevel: "warn" },
        { LOG_LEVEL: "debug" },
      ).logLevel,
    ).toBe("warn");
  });

  it("should require period and port", () => {
    expect(() => parseCliOptions({}, {})).toThrow(ConfigError);
    try {
      parseCliOptions({}, {});
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues).toEqual(["--period is required", "--port is required"]);
        expect(err.code).toBe("CONFIG_INVALID");
      }
    }
  });

  it("should reject a zero period and out-of-range port", () => {
    try {
      parseCliOptions({ period: "0", port: "70000" }, {});
      expect.unreachable();
    } catch (err) {
      if (!(err instanceof ConfigError)) throw err;
      expect(err.issues).toEqual([
        "--period must be a positive number of seconds",
        "--port must be between 1 and 65535",
      ]);
    }
  });

  it("should reject non-numeric values and bad addresses", () => {
    try {
      parseCliOptions({ period: "soon", port: "9000", connect: "localhost:9000" }, {});
      expect.unreachable();
    } catch (err) {
      if (!(err instanceof ConfigError)) throw err;
      expect(err.issues).toContain("--period must be a whole number");
      expect(err.issues).toContain("--connect must be an ip:port address");
    }
  });

  it("should reject an unknown log level", () => {
    expect(() =>
      parseCliOptions({ period: "1", port: "9000" }, { LOG_LEVEL: "loud" }),
    ).toThrow(ConfigError);
  });
});

describe("resolveNodeConfig", () => {
  it("should fill defaults", () => {
    expect(resolveNodeConfig({ port: 9000, periodMs: 1000 })).toEqual({
      ...DEFAULT_NODE_CONFIG,
      port: 9000,
      periodMs: 1000,
    });
  });

  it("should normalize a programmatic seed", () => {
    expect(
      resolveNodeConfig({ port: 9001, periodMs: 1000, seed: "[0:0::1]:9000" }).seed,
    ).toBe("[::1]:9000");
  });

  it("should collect every problem", () => {
    try {
      resolveNodeConfig({ port: 0, periodMs: 0, seed: "nowhere", relayCapacity: 0 });
      expect.unreachable();
    } catch (err) {
      if (!(err instanceof ConfigError)) throw err;
      expect(err.issues).toEqual([
        "port must be between 1 and 65535",
        "periodMs must be positive",
        "seed must be an ip:port address",
        "relayCapacity must be a positive integer",
      ]);
    }
  });
});
