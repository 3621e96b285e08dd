import type { McpServer } from "@tether/core";

import type { Supervisor } from "../core/services/Supervisor.js";

export interface Services {
  supervisor: Supervisor;
}

export interface ToolRegistrar {
  (server: McpServer, services: Services): void;
}
