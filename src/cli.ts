#!/usr/bin/env node
// src/cli.ts

import { Command } from "commander";
import { NodeConfig, RawCliOptions, parseCliOptions } from "./config";
import { ConfigError, MeshError } from "./errors";
import { createElapsedLogHandler, loggerConfig } from "./logger";
import { MeshNode } from "./mesh_node";

/**
 * Starts a node and keeps it running until SIGINT/SIGTERM.
 */
export async function runNode(config: NodeConfig): Promise<MeshNode> {
  loggerConfig.configure({
    level: config.logLevel,
    handler: createElapsedLogHandler(Date.now()),
  });

  const node = new MeshNode(config);
  await node.start();

  const shutdown = (signal: NodeJS.Signals) => {
    process.off("SIGINT", shutdown);
    process.off("SIGTERM", shutdown);
    node.stop().then(
      () => process.exit(0),
      (err) => {
        console.error(`Error while stopping after ${signal}:`, err);
        process.exit(1);
      },
    );
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  return node;
}

export function buildProgram(
  start: (config: NodeConfig) => Promise<unknown> = runNode,
): Command {
  const program = new Command();

  program
    .name("gossip-mesh")
    .description("Peer-to-peer gossip node: floods periodic messages through a TCP mesh")
    .version("0.1.0")
    .requiredOption("--period <seconds>", "gossip period in seconds")
    .requiredOption("--port <port>", "port to listen on (127.0.0.1)")
    .option("--connect <address>", "peer to connect to at startup, as ip:port")
    .option("--log-level <level>", "debug, info, warn, error or none (default: $LOG_LEVEL or info)")
    .action(async (options: RawCliOptions) => {
      await start(parseCliOptions(options));
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await buildProgram().parseAsync(argv);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
    } else if (err instanceof MeshError) {
      console.error(`Error: ${err.message}`);
    } else {
      console.error("Error:", err);
    }
    process.exit(1);
  }
}

if (require.main === module) {
  void main();
}
