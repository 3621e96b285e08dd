import { textResponse, type CallToolResult } from "@tether/core";

import type { Supervisor } from "../core/services/Supervisor.js";
import type { ToolRegistrar } from "./types.js";

export function handleWorkerStatus(supervisor: Supervisor): CallToolResult {
  const status = supervisor.status();
  if (status.state === "not-running") {
    return textResponse(`${supervisor.name} is not running`);
  }

  const { pid, logPath, startedAt } = status.process;
  const lines = [`${supervisor.name} is running (PID: ${pid})`, `Logs: ${logPath}`];
  if (startedAt) {
    lines.push(`Started: ${startedAt}`);
  }
  return textResponse(lines.join("\n"));
}

export const registerWorkerStatus: ToolRegistrar = (server, { supervisor }) => {
  server.registerTool(
    "worker_status",
    {
      title: "Worker status",
      description: "Check whether the background worker is running and where it logs.",
      inputSchema: {},
    },
    () => handleWorkerStatus(supervisor)
  );
};
