#!/usr/bin/env node
/**
 * tether CLI entry point.
 */

import { map } from "@tether/core";

import { runCli } from "./cli/program.js";
import { loadConfig } from "./config.js";
import { createSupervisor } from "./factory.js";

process.on("uncaughtException", (error) => {
  console.error("[tether] Uncaught exception:", error);
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  console.error("[tether] Unhandled rejection:", reason);
  process.exit(1);
});

const exitCode = await runCli(process.argv.slice(2), {
  io: {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
  },
  load: (configPath) =>
    map(loadConfig({ configPath }), (config) => createSupervisor(config, { taskOutput: "inherit" })),
});

process.exitCode = exitCode;
