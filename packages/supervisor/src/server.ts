#!/usr/bin/env node
/**
 * tether-mcp: the supervisor's operations as MCP tools over stdio.
 *
 * Configuration comes from the working directory (or TETHER_CONFIG), like the
 * CLI. Task output is sent to stderr because stdout carries the protocol.
 */

import { runServer } from "@tether/core";

import { loadConfig } from "./config.js";
import { createSupervisor } from "./factory.js";
import { registerAllTools, type Services } from "./tools/index.js";
import { VERSION } from "./version.js";

runServer<Services>({
  config: { name: "tether-mcp", version: VERSION },
  createServices: () => {
    const config = loadConfig();
    if (!config.ok) {
      throw config.error;
    }
    console.error(`[tether-mcp] Supervising ${config.value.name} (${config.value.binary})`);
    return { supervisor: createSupervisor(config.value, { taskOutput: "stderr" }) };
  },
  registerTools: registerAllTools,
});
