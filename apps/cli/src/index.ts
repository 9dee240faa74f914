import { loadConfig } from "./config/configManager";
import { run } from "./run";

(async function main() {
  const cfg = loadConfig();
  await run(cfg);
  console.log("[accuracy] done");
})().catch((err: unknown) => {
  const label = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
  console.error(`[accuracy] FAILED: ${label}`);
  process.exit(1);
});
