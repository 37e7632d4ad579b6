#!/usr/bin/env node
import { EXIT_FAILURE, runCli } from "./controllers/mosaic.controller";
import logger from "./utils/logger";

const controller = new AbortController();

// Graceful shutdown
for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    logger.info(`${signal} received, stopping the run...`);
    controller.abort(`${signal} received`);
  });
}

runCli(process.argv.slice(2), controller.signal)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error("Mosaic run crashed:", error);
    process.exitCode = EXIT_FAILURE;
  });
