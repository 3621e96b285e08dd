import type { McpServer } from "@tether/core";

import type { Services, ToolRegistrar } from "./types.js";
import { registerWorkerStart } from "./start.js";
import { registerWorkerStop } from "./stop.js";
import { registerWorkerStatus } from "./status.js";
import { registerWorkerLog } from "./log.js";

const allTools: ToolRegistrar[] = [
  registerWorkerStart,
  registerWorkerStop,
  registerWorkerStatus,
  registerWorkerLog,
];

export function registerAllTools(server: McpServer, services: Services): void {
  for (const register of allTools) {
    register(server, services);
  }
}

export { handleWorkerStart, type WorkerStartInput } from "./start.js";
export { handleWorkerStop } from "./stop.js";
export { handleWorkerStatus } from "./status.js";
export { handleWorkerLog, type WorkerLogInput } from "./log.js";
export type { Services, ToolRegistrar } from "./types.js";
