// examples/health_report.ts

import { MeshNode, resolveNodeConfig } from "../src";

async function main() {
  const seed = new MeshNode(resolveNodeConfig({ port: 9100, periodMs: 1000 }));
  await seed.start();
  console.log("alone:", JSON.stringify(seed.getHealth(), null, 2));

  const peer = new MeshNode(
    resolveNodeConfig({ port: 9101, periodMs: 1000, seed: seed.address }),
  );
  await peer.start();
  await new Promise((resolve) => setTimeout(resolve, 1500));
  console.log("with a peer:", JSON.stringify(seed.getHealth(), null, 2));

  await peer.stop();
  await seed.stop();
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
