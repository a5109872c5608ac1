#!/usr/bin/env node
import { logger } from "../config/logger.js";
import { runCli } from "./run.js";

process.on("unhandledRejection", (reason: unknown) => {
  logger.error("Unhandled promise rejection", {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
  });
});

process.on("uncaughtException", (err: Error, origin: string) => {
  logger.error("Uncaught exception", { error: err.message, stack: err.stack, origin });
  // Winston's Console transport is synchronous, so the line is out before we exit.
  process.exit(1);
});

// First Ctrl-C cancels an in-flight serve and cleans up; a second one exits immediately.
const controller = new AbortController();
process.once("SIGINT", () => {
  controller.abort();
  process.once("SIGINT", () => process.exit(130));
});

runCli(process.argv.slice(2), { signal: controller.signal }).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    logger.error("aiserve failed", { err });
    process.exitCode = 1;
  },
);
