import { ClientLibrary } from "@simlab-sdk/lab-client";

/**
 * Imports the topology named by TOPOLOGY (defaults to the bundled sample),
 * starts it and waits for convergence. Credentials come from VIRL2_URL,
 * VIRL2_USER and VIRL2_PASS.
 */
export async function runLabDemo(): Promise<void> {
  const client = await ClientLibrary.connect({ verbose: true });
  console.log(String(client));

  try {
    const info = await client.systemInformation();
    console.log("controller version:", info.version);

    const topology =
      process.env.TOPOLOGY || new URL("../data/sample.yaml", import.meta.url).pathname;
    const lab = await client.importLabFromPath(topology);
    console.log(`imported ${lab.title} (${lab.nodeCount} nodes, ${lab.linkCount} links)`);

    await lab.start();
    await lab.waitUntilConverged({ intervalMs: 2_000, maxIterations: 150 });
    await client.waitForLldConnected();
    console.log("lab state:", await lab.state());
  } finally {
    await client.auth.logout();
    await client.close();
  }
}
