// examples/three_node_mesh.ts
//
// Demonstrates: a seed node and two peers forming a mesh in one process
// Prerequisites: ports 9000-9002 free on 127.0.0.1
// Run: npm run build && node dist/examples/three_node_mesh.js
//
// Node B and node C both dial node A. After A's first gossip round each of
// them learns about the other, and every message reaches every node once.

import {
  MeshNode,
  Message,
  createElapsedLogHandler,
  loggerConfig,
  resolveNodeConfig,
} from "../src";

async function main() {
  loggerConfig.configure({
    level: "info",
    handler: createElapsedLogHandler(Date.now()),
  });

  const a = new MeshNode(resolveNodeConfig({ port: 9000, periodMs: 2000 }));
  await a.start();

  const b = new MeshNode(
    resolveNodeConfig({ port: 9001, periodMs: 3000, seed: a.address }),
  );
  const c = new MeshNode(
    resolveNodeConfig({ port: 9002, periodMs: 5000, seed: a.address }),
  );
  await b.start();
  await c.start();

  c.on("message", (message: Message) => {
    console.log(`[C] surfaced ${message.content} from ${message.from}`);
  });

  await new Promise((resolve) => setTimeout(resolve, 12_000));

  for (const node of [a, b, c]) {
    const peers = Array.from(node.directory.snapshot()).sort();
    console.log(`${node.address} knows ${peers.join(", ")}`);
  }

  await Promise.all([c.stop(), b.stop(), a.stop()]);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
