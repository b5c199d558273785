#!/usr/bin/env tsx
import { runCli } from "./cli";
import { logger } from "./logger";

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error("Fatal error", error);
    process.exit(1);
  });
