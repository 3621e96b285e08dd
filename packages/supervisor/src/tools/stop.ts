import { resultToResponse, type CallToolResult } from "@tether/core";

import type { StopResult } from "../core/model.js";
import type { Supervisor } from "../core/services/Supervisor.js";
import { describeError } from "../format.js";
import type { ToolRegistrar } from "./types.js";

export async function handleWorkerStop(supervisor: Supervisor): Promise<CallToolResult> {
  const result = await supervisor.stop();
  return resultToResponse(
    result,
    (stopped) => formatStop(supervisor.name, stopped),
    (error) => describeError(supervisor.name, error)
  );
}

function formatStop(name: string, stopped: StopResult): string {
  if (stopped.kind === "not-running") {
    return `No running ${name} process found`;
  }
  switch (stopped.outcome) {
    case "stopped":
      return `${name} stopped (PID: ${stopped.pid})`;
    case "killed":
      return `${name} killed after ignoring SIGTERM (PID: ${stopped.pid})`;
    case "already-gone":
      return `Process already stopped (PID: ${stopped.pid})`;
  }
}

export const registerWorkerStop: ToolRegistrar = (server, { supervisor }) => {
  server.registerTool(
    "worker_stop",
    {
      title: "Stop worker",
      description: `Stop the background worker.

Sends SIGTERM and waits; a worker that ignores it gets SIGKILL. Safe to call when nothing is running.`,
      inputSchema: {},
    },
    () => handleWorkerStop(supervisor)
  );
};
