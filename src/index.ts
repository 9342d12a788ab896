#!/usr/bin/env node
import "dotenv/config";

import { EXIT_FAILURE, EXIT_INTERRUPTED, runCli } from "./cli";
import { consoleLogger, errorMessage } from "./logger";

async function main() {
  const controller = new AbortController();

  const onSignal = (signal: NodeJS.Signals) => {
    // Second Ctrl+C: give up on saving.
    if (controller.signal.aborted) process.exit(EXIT_INTERRUPTED);
    consoleLogger.warn(`\n[!] ${signal} received, saving results...`);
    controller.abort();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  try {
    return await runCli(process.argv.slice(2), { signal: controller.signal });
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e) => {
    consoleLogger.error(`Error: ${errorMessage(e)}`);
    process.exit(EXIT_FAILURE);
  });
