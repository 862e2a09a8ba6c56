import { runLabDemo } from "./lab-demo.js";

async function main() {
  console.log("--- Running lab demo ---");
  await runLabDemo();
}

await main().catch((err) => {
  console.error("Example failed:", err);
  process.exit(1);
});
