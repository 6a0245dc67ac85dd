/**
 * Process entry point: load configuration, start the scheduled jobs and shut
 * down cleanly on SIGINT/SIGTERM.
 */

import { errorMessage } from "@roadrisk/ingestion";
import { loadConfig } from "./config.js";
import { Pipeline } from "./pipeline.js";

function main(): void {
  const pipeline = new Pipeline(loadConfig());
  pipeline.start();

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`\n[pipeline] ${signal} received — finishing in-flight work`);
    pipeline.stop().then(
      () => console.log("[pipeline] Shutdown complete"),
      (err: unknown) => {
        console.error(`[pipeline] Shutdown failed: ${errorMessage(err)}`);
        process.exitCode = 1;
      },
    );
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

try {
  main();
} catch (err) {
  console.error(`[pipeline] Failed to start: ${errorMessage(err)}`);
  process.exitCode = 1;
}
